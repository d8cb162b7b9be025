// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZER TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Repair strategies, in the order they are attempted.
 */
export const REPAIR_STRATEGIES = [
  'StripFences',
  'ExtractBracketed',
  'NormalizeQuotes',
  'QuoteBareWords',
  'FreeTextVocabularyMatch',
] as const;

export type RepairStrategyName = typeof REPAIR_STRATEGIES[number];

export interface NormalizeOptions {
  /** Closed label set; enables vocabulary matching in the free-text strategy */
  readonly vocabulary?: readonly string[];
}

export interface NormalizedResponse {
  /** Exactly expectedCount values, in response order */
  readonly values: string[];
  /** Strategy that produced the values */
  readonly strategy: RepairStrategyName;
}

/**
 * A strategy returns the recovered elements, or null when its input does not parse.
 */
export type RepairStrategy = (raw: string, expectedCount: number, options: NormalizeOptions) => string[] | null;
