// ═══════════════════════════════════════════════════════════════════════════════
// FORMULA VARIABLES — Per-Unit-System Tables and Formula Validation
// ═══════════════════════════════════════════════════════════════════════════════
//
// A formula is an arithmetic expression over bracketed measurement variables:
//   [Area_m2] * 1.1
//   ([Length_m] + 0.3) * [Count]
//
// Variable names are looked up case-insensitively and rewritten to the spelling
// of the active table. Anything else (unknown names, stray symbols, unbalanced
// parentheses, dangling operators) rejects the formula.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { TakeoffType, UnitSystem } from '../types/records.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TABLES
// ─────────────────────────────────────────────────────────────────────────────────

export interface VariableTable {
  readonly area: string;
  readonly length: string;
  readonly count: string;
  readonly volume: string;
  readonly perimeter: string;
  readonly height: string;
  readonly width: string;
  readonly depth: string;
  readonly segments: string;
}

export const FORMULA_VARIABLES: Readonly<Record<UnitSystem, VariableTable>> = {
  metric: {
    area: 'Area_m2',
    length: 'Length_m',
    count: 'Count',
    volume: 'Volume_m3',
    perimeter: 'Perimeter_m',
    height: 'Height_m',
    width: 'Width_m',
    depth: 'Depth_m',
    segments: 'Segments',
  },
  imperial: {
    area: 'AREA_SF',
    length: 'LENGTH_LF',
    count: 'COUNT',
    volume: 'VOLUME_CY',
    perimeter: 'PERIMETER_LF',
    height: 'HEIGHT_FT',
    width: 'WIDTH_FT',
    depth: 'DEPTH_FT',
    segments: 'SEGMENTS',
  },
};

export function variableNames(unitSystem: UnitSystem): string[] {
  return Object.values(FORMULA_VARIABLES[unitSystem]);
}

export function bracket(name: string): string {
  return `[${name}]`;
}

/**
 * Canonical formula for a takeoff type. Rows without a type count.
 */
export function defaultFormula(takeoffType: TakeoffType | '', unitSystem: UnitSystem): string {
  const table = FORMULA_VARIABLES[unitSystem];
  switch (takeoffType) {
    case 'Area':
      return bracket(table.area);
    case 'Linear':
    case 'Segment':
      return bracket(table.length);
    case 'Volume':
      return bracket(table.volume);
    case 'Count':
    case '':
      return bracket(table.count);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// TOKENIZER
// ─────────────────────────────────────────────────────────────────────────────────

type Token =
  | { readonly kind: 'variable'; readonly name: string }
  | { readonly kind: 'number'; readonly text: string }
  | { readonly kind: 'operator'; readonly op: '+' | '-' | '*' | '/' }
  | { readonly kind: 'open' }
  | { readonly kind: 'close' };

const NUMBER = /^\d+(?:\.\d+)?|^\.\d+/;
const BARE_NAME = /^[A-Za-z_][A-Za-z0-9_]*/;
const BRACKETED_NAME = /^\[\s*([A-Za-z_][A-Za-z0-9_]*)\s*\]/;

function isOperator(char: string): char is '+' | '-' | '*' | '/' {
  return char === '+' || char === '-' || char === '*' || char === '/';
}

/**
 * Split a formula into tokens, or null on any character outside the grammar.
 */
function tokenize(formula: string): Token[] | null {
  const tokens: Token[] = [];
  let rest = formula;

  while (rest.length > 0) {
    const char = rest.charAt(0);

    if (/\s/.test(char)) {
      rest = rest.slice(1);
      continue;
    }
    if (isOperator(char)) {
      tokens.push({ kind: 'operator', op: char });
      rest = rest.slice(1);
      continue;
    }
    if (char === '(' || char === ')') {
      tokens.push({ kind: char === '(' ? 'open' : 'close' });
      rest = rest.slice(1);
      continue;
    }

    const bracketed = BRACKETED_NAME.exec(rest);
    if (bracketed?.[1] !== undefined) {
      tokens.push({ kind: 'variable', name: bracketed[1] });
      rest = rest.slice(bracketed[0].length);
      continue;
    }
    const number = NUMBER.exec(rest);
    if (number) {
      tokens.push({ kind: 'number', text: number[0] });
      rest = rest.slice(number[0].length);
      continue;
    }
    const bare = BARE_NAME.exec(rest);
    if (bare) {
      tokens.push({ kind: 'variable', name: bare[0] });
      rest = rest.slice(bare[0].length);
      continue;
    }
    return null;
  }
  return tokens;
}

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Validate a formula against the active variable table.
 *
 * Returns the formula rewritten in canonical form (table spelling, bracketed
 * variables, spaced binary operators), or null when it is not a valid formula.
 * A leading minus on an operand is accepted.
 */
export function validateFormula(formula: string, unitSystem: UnitSystem): string | null {
  const tokens = tokenize(formula);
  if (!tokens || tokens.length === 0) {
    return null;
  }

  const lookup = new Map(variableNames(unitSystem).map((name) => [name.toLowerCase(), name]));
  let expectOperand = true;
  let depth = 0;
  let out = '';

  for (const token of tokens) {
    switch (token.kind) {
      case 'variable': {
        const name = lookup.get(token.name.toLowerCase());
        if (!expectOperand || name === undefined) return null;
        out += bracket(name);
        expectOperand = false;
        break;
      }
      case 'number':
        if (!expectOperand) return null;
        out += token.text;
        expectOperand = false;
        break;
      case 'open':
        if (!expectOperand) return null;
        out += '(';
        depth++;
        break;
      case 'close':
        if (expectOperand || depth === 0) return null;
        out += ')';
        depth--;
        break;
      case 'operator':
        if (expectOperand) {
          // unary minus only, and not twice in a row
          if (token.op !== '-' || out.endsWith('-')) return null;
          out += '-';
        } else {
          out += ` ${token.op} `;
          expectOperand = true;
        }
        break;
    }
  }

  if (expectOperand || depth !== 0) {
    return null;
  }
  return out;
}

export function isValidFormula(formula: string, unitSystem: UnitSystem): boolean {
  return validateFormula(formula, unitSystem) !== null;
}
