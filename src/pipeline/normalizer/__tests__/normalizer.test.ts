// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE NORMALIZER TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { COST_TYPES, TAKEOFF_TYPES } from '../../../types/records.js';
import { UnparsableResponse } from '../../errors.js';
import {
  normalizeResponse,
  parseResponse,
  strictParse,
  stripFences,
  extractBracketed,
  normalizeQuotes,
  quoteBareWords,
  cleanPiece,
} from '../index.js';

const costVocabulary = { vocabulary: COST_TYPES };
const takeoffVocabulary = { vocabulary: TAKEOFF_TYPES };

// ─────────────────────────────────────────────────────────────────────────────────
// TEXT TRANSFORMS
// ─────────────────────────────────────────────────────────────────────────────────

describe('strictParse', () => {
  it('should keep strings verbatim and stringify other primitives', () => {
    expect(strictParse('[" a ", 1.5, true, null]')).toEqual([' a ', '1.5', 'true', '']);
  });

  it('should reject non-arrays and nested values', () => {
    expect(strictParse('{"a": 1}')).toBeNull();
    expect(strictParse('[["a"]]')).toBeNull();
    expect(strictParse('not json')).toBeNull();
  });
});

describe('stripFences', () => {
  it('should take the content of a fenced block', () => {
    expect(stripFences('\uFEFF ["Count"] ')).toBe('["Count"]');
  });
});

describe('extractBracketed', () => {
  it('should take the first opening to the last closing bracket', () => {
    expect(extractBracketed('Result: ["a", "b"] thanks')).toBe('["a", "b"]');
  });

  it('should wrap quoted text without brackets', () => {
    expect(extractBracketed('"a", "b",')).toBe('["a", "b"]');
  });

  it('should give up on text without brackets or quotes', () => {
    expect(extractBracketed('a, b')).toBeNull();
  });
});

describe('normalizeQuotes', () => {
  it('should straighten curly quotes', () => {
    expect(normalizeQuotes('[“Area”, “Count”]')).toBe('["Area", "Count"]');
  });

  it('should turn single-quoted strings into double-quoted strings', () => {
    expect(normalizeQuotes("['Material', 'Labor']")).toBe('["Material", "Labor"]');
  });

  it('should keep apostrophes inside words', () => {
    expect(normalizeQuotes("['Plasterer's labour']")).toBe('["Plasterer\'s labour"]');
    expect(normalizeQuotes('["Plasterer\'s labour"]')).toBe('["Plasterer\'s labour"]');
  });
});

describe('quoteBareWords', () => {
  it('should quote bare tokens and keep literals', () => {
    expect(quoteBareWords('[Material, "Labor", 2, null]')).toBe('["Material","Labor",2,null]');
  });

  it('should strip a trailing comma', () => {
    expect(quoteBareWords('["Area", "Count",]')).toBe('["Area","Count"]');
  });

  it('should handle an empty array', () => {
    expect(quoteBareWords('[ ]')).toBe('[]');
  });
});

describe('cleanPiece', () => {
  it('should strip list markers, quotes and unpaired brackets', () => {
    expect(cleanPiece(' 1. "Material"')).toBe('Material');
    expect(cleanPiece('["Labor"')).toBe('Labor');
    expect(cleanPiece('- Equipment]')).toBe('Equipment');
  });

  it('should keep balanced brackets', () => {
    expect(cleanPiece('"[Area_m2] * 1.1"')).toBe('[Area_m2] * 1.1');
    expect(cleanPiece('[[Length_m]')).toBe('[Length_m]');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZE RESPONSE
// ─────────────────────────────────────────────────────────────────────────────────

describe('normalizeResponse', () => {
  it('should return a well-formed array unchanged', () => {
    const result = normalizeResponse('["Material", "Labor", "Other"]', 3, costVocabulary);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.values).toEqual(['Material', 'Labor', 'Other']);
      expect(result.value.strategy).toBe('StripFences');
    }
  });

  it('should recover a fenced array', () => {
    const result = normalizeResponse('```json\n["Area","Count"]\n```', 2, takeoffVocabulary);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.values).toEqual(['Area', 'Count']);
    }
  });

  it('should recover bare comma-separated labels', () => {
    const result = normalizeResponse('Material, Labor, Material', 3, costVocabulary);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.values).toEqual(['Material', 'Labor', 'Material']);
      expect(result.value.strategy).toBe('QuoteBareWords');
    }
  });

  it('should extract an array surrounded by prose', () => {
    const result = normalizeResponse('Here you go:\n["Area", "Linear"]\nLet me know.', 2);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.strategy).toBe('ExtractBracketed');
      expect(result.value.values).toEqual(['Area', 'Linear']);
    }
  });

  it('should repair single-quoted arrays', () => {
    const result = normalizeResponse("['Material', 'Plasterer's labour']", 2);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.strategy).toBe('NormalizeQuotes');
      expect(result.value.values).toEqual(['Material', "Plasterer's labour"]);
    }
  });

  it('should repair trailing commas', () => {
    const result = normalizeResponse('["Area", "Count",]', 2);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.strategy).toBe('QuoteBareWords');
      expect(result.value.values).toEqual(['Area', 'Count']);
    }
  });

  it('should quote bare formulas', () => {
    expect(parseResponse('[[Area_m2] * 1.1, [Length_m]]', 2)).toEqual(['[Area_m2] * 1.1', '[Length_m]']);
  });

  it('should match a numbered list against the vocabulary', () => {
    const result = normalizeResponse('1. Material\n2. Labor\n3. Equipment', 3, costVocabulary);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.strategy).toBe('FreeTextVocabularyMatch');
      expect(result.value.values).toEqual(['Material', 'Labor', 'Equipment']);
    }
  });

  it('should return the canonical vocabulary spelling', () => {
    expect(parseResponse('labor\nMATERIAL', 2, costVocabulary)).toEqual(['Labor', 'Material']);
  });

  it('should reject a parsed array with too many labels', () => {
    const result = normalizeResponse('["Material","Labor","Other","Equipment"]', 3, costVocabulary);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.bestEffortCount).toBe(4);
      expect(result.error.strategies).toEqual(['StripFences', 'ExtractBracketed', 'NormalizeQuotes', 'QuoteBareWords']);
    }
  });

  it('should reject a parsed array with too many formulas', () => {
    const result = normalizeResponse('["[Area_m2]","[Count]","[Length_m]"]', 2);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.bestEffortCount).toBe(3);
    }
  });

  it('should reject an unbracketed label list longer than expected', () => {
    expect(normalizeResponse('Area, Linear, Count', 2, takeoffVocabulary).ok).toBe(false);
  });

  it('should keep every free-text piece without a vocabulary', () => {
    const text = '[Area_m2] * 2\n[Count]\n[Length_m]';

    expect(normalizeResponse(text, 2).ok).toBe(false);

    const result = normalizeResponse(text, 3);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.strategy).toBe('FreeTextVocabularyMatch');
      expect(result.value.values).toEqual(['[Area_m2] * 2', '[Count]', '[Length_m]']);
    }
  });

  it('should pick vocabulary labels out of prose', () => {
    expect(parseResponse('Material\nLabor\nOther is used when unsure', 2, costVocabulary)).toEqual(['Material', 'Labor']);
  });

  it('should accept only an empty array when zero values are expected', () => {
    expect(parseResponse('[]', 0)).toEqual([]);

    const result = normalizeResponse('nothing here', 0);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.bestEffortCount).toBe(1);
    }
  });

  it('should report too few labels as unparsable', () => {
    const result = normalizeResponse('["Material", "Labor"]', 5, costVocabulary);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnparsableResponse);
      expect(result.error.expectedCount).toBe(5);
      expect(result.error.bestEffortCount).toBe(2);
      expect(result.error.strategies).toEqual([
        'StripFences',
        'ExtractBracketed',
        'NormalizeQuotes',
        'QuoteBareWords',
        'FreeTextVocabularyMatch',
      ]);
    }
  });

  it('should truncate the snippet to 200 characters', () => {
    const raw = 'x'.repeat(300);
    const result = normalizeResponse(raw, 2);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.snippet).toBe(`${'x'.repeat(200)}…`);
      expect(result.error.bestEffortCount).toBe(1);
    }
  });
});

describe('parseResponse', () => {
  it('should throw UnparsableResponse on failure', () => {
    expect(() => parseResponse('["Area"]', 3, takeoffVocabulary)).toThrow(UnparsableResponse);
  });
});
