// ═══════════════════════════════════════════════════════════════════════════════
// REPAIR STRATEGIES — Text Transforms that Recover a JSON Array
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each strategy starts again from the raw response and applies progressively
// more aggressive repairs before a strict parse. None of them truncates or pads.
// The free-text strategy stops at expectedCount only when it matches against a
// vocabulary; without one every piece counts.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { NormalizeOptions, RepairStrategy, RepairStrategyName } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// STRICT PARSE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * JSON.parse yielding an array of primitives. Strings are kept verbatim,
 * numbers and booleans stringified, null becomes ''. Anything else fails.
 */
export function strictParse(text: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  if (!Array.isArray(parsed)) {
    return null;
  }

  const values: string[] = [];
  for (const element of parsed) {
    if (typeof element === 'string') {
      values.push(element);
    } else if (typeof element === 'number' || typeof element === 'boolean') {
      values.push(String(element));
    } else if (element === null) {
      values.push('');
    } else {
      return null;
    }
  }
  return values;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TEXT TRANSFORMS
// ─────────────────────────────────────────────────────────────────────────────────

const FENCED_BLOCK = /```[\w-]*[^\S\n]*\n?([\s\S]*?)```/;
const FENCE_MARKER = /```[\w-]*/g;

/**
 * Content of the first fenced block, or the text with stray fence markers dropped.
 */
export function stripFences(raw: string): string {
  const text = raw.replace(/^\uFEFF/, '');
  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) {
    return (fenced[1] ?? '').trim();
  }
  return text.replace(FENCE_MARKER, '').trim();
}

/**
 * Greedy first '[' … last ']'. Without brackets, quoted text is wrapped in brackets.
 */
export function extractBracketed(text: string): string | null {
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start !== -1 && end > start) {
    return text.slice(start, end + 1);
  }
  if (text.includes('"')) {
    return `[${text.trim().replace(/,\s*$/, '')}]`;
  }
  return null;
}

// Opening quote after start, '[', ',' or whitespace; closing quote before ',' or ']' or the end.
// Apostrophes followed by a word character stay inside the string.
const SINGLE_QUOTED = /(^|[[,\s])'((?:[^'\\\n]|\\.|'(?=\w))*)'(?=\s*(?:[,\]]|$))/g;

/**
 * Curly quotes to straight quotes, single-quoted strings to double-quoted strings.
 */
export function normalizeQuotes(text: string): string {
  const straight = text
    .replace(/[“”„‟]/g, '"')
    .replace(/[‘’‚‛]/g, "'");

  return straight.replace(SINGLE_QUOTED, (_match, prefix: string, content: string) => {
    const unescaped = content.replace(/\\'/g, "'");
    return `${prefix}${JSON.stringify(unescaped)}`;
  });
}

/**
 * Split on commas outside double-quoted strings.
 */
function splitTopLevel(inner: string): string[] {
  const pieces: string[] = [];
  let current = '';
  let inString = false;

  for (let i = 0; i < inner.length; i++) {
    const char = inner.charAt(i);
    if (inString) {
      current += char;
      if (char === '\\' && i + 1 < inner.length) {
        current += inner.charAt(i + 1);
        i++;
      } else if (char === '"') {
        inString = false;
      }
    } else if (char === '"') {
      inString = true;
      current += char;
    } else if (char === ',') {
      pieces.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  pieces.push(current);
  return pieces;
}

const JSON_LITERAL = /^(?:-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|true|false|null)$/;

/**
 * Strip trailing commas before ']' and quote bare element tokens.
 */
export function quoteBareWords(bracketed: string): string {
  const inner = bracketed.slice(1, -1).replace(/,\s*$/, '');
  if (inner.trim() === '') {
    return '[]';
  }

  const elements = splitTopLevel(inner).map((piece) => {
    const token = piece.trim();
    if (token.startsWith('"') || JSON_LITERAL.test(token)) {
      return token;
    }
    return JSON.stringify(token);
  });
  return `[${elements.join(',')}]`;
}

const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s+/;
const QUOTE_NOISE = /^["'`“”‘’]+|["'`“”‘’]+$/g;

function countOf(text: string, char: string): number {
  return text.split(char).length - 1;
}

/**
 * Drop leading '[' and trailing ']' that have no partner inside the piece.
 */
function trimUnbalancedBrackets(piece: string): string {
  let text = piece;
  while (text.startsWith('[') && countOf(text, '[') > countOf(text, ']')) {
    text = text.slice(1).trim();
  }
  while (text.endsWith(']') && countOf(text, ']') > countOf(text, '[')) {
    text = text.slice(0, -1).trim();
  }
  return text;
}

/**
 * Clean one comma/newline separated piece of free text.
 */
export function cleanPiece(piece: string): string {
  let text = piece.trim().replace(LIST_MARKER, '');
  text = trimUnbalancedBrackets(text);
  text = text.replace(QUOTE_NOISE, '').trim();
  return trimUnbalancedBrackets(text);
}

// ─────────────────────────────────────────────────────────────────────────────────
// STRATEGIES
// ─────────────────────────────────────────────────────────────────────────────────

const stripFencesStrategy: RepairStrategy = (raw) => strictParse(stripFences(raw));

const extractBracketedStrategy: RepairStrategy = (raw) => {
  const bracketed = extractBracketed(stripFences(raw));
  return bracketed === null ? null : strictParse(bracketed);
};

const normalizeQuotesStrategy: RepairStrategy = (raw) => {
  const bracketed = extractBracketed(normalizeQuotes(stripFences(raw)));
  return bracketed === null ? null : strictParse(bracketed);
};

const quoteBareWordsStrategy: RepairStrategy = (raw) => {
  const text = normalizeQuotes(stripFences(raw));
  if (text === '') {
    return null;
  }
  const bracketed = extractBracketed(text) ?? `[${text}]`;
  return strictParse(quoteBareWords(bracketed));
};

const freeTextStrategy: RepairStrategy = (raw, expectedCount, options: NormalizeOptions) => {
  // Stopping at zero would accept any text
  if (expectedCount === 0) {
    return null;
  }

  const canonical = new Map<string, string>();
  for (const label of options.vocabulary ?? []) {
    canonical.set(label.toLowerCase(), label);
  }

  const values: string[] = [];
  for (const piece of stripFences(raw).split(/[,\n]/)) {
    const cleaned = cleanPiece(piece);
    if (cleaned === '') continue;

    if (options.vocabulary) {
      const match = canonical.get(cleaned.toLowerCase());
      if (match === undefined) continue;
      values.push(match);
    } else {
      values.push(cleaned);
    }

    if (options.vocabulary && values.length === expectedCount) break;
  }
  return values;
};

/**
 * Strategies in attempt order.
 */
export const STRATEGY_PIPELINE: ReadonlyArray<readonly [RepairStrategyName, RepairStrategy]> = [
  ['StripFences', stripFencesStrategy],
  ['ExtractBracketed', extractBracketedStrategy],
  ['NormalizeQuotes', normalizeQuotesStrategy],
  ['QuoteBareWords', quoteBareWordsStrategy],
  ['FreeTextVocabularyMatch', freeTextStrategy],
];
