// ═══════════════════════════════════════════════════════════════════════════════
// BATCH SIZER — Chunk Size from a Model's Context Window
// ═══════════════════════════════════════════════════════════════════════════════

import type { BatchConfig } from '../../config/schema.js';

export type BatchSizingOptions = BatchConfig;

export const DEFAULT_BATCH_SIZING: Readonly<BatchSizingOptions> = {
  charsPerToken: 4,
  sampleSize: 50,
  reservedTokens: 5000,
  safetyFactor: 0.6,
  minBatchSize: 10,
  maxBatchSize: 100,
  defaultBatchSize: 50,
};

/**
 * Average tokens per item, estimated from the JSON size of a leading sample.
 * Returns 0 for no items.
 */
export function estimateRowTokens(
  items: readonly unknown[],
  options: BatchSizingOptions = DEFAULT_BATCH_SIZING
): number {
  const sample = items.slice(0, options.sampleSize);
  if (sample.length === 0) {
    return 0;
  }
  return JSON.stringify(sample).length / options.charsPerToken / sample.length;
}

/**
 * Rows per chunk: (window - reserve) * safety / rowTokens, clamped to [min, max].
 * A non-positive estimate yields the default size; a non-positive budget the minimum.
 */
export function computeBatchSize(
  contextWindow: number,
  avgRowTokens: number,
  options: BatchSizingOptions = DEFAULT_BATCH_SIZING
): number {
  if (!Number.isFinite(avgRowTokens) || avgRowTokens <= 0) {
    return options.defaultBatchSize;
  }

  const budget = (contextWindow - options.reservedTokens) * options.safetyFactor;
  if (!(budget > 0)) {
    return options.minBatchSize;
  }

  const size = Math.floor(budget / avgRowTokens);
  return Math.min(options.maxBatchSize, Math.max(options.minBatchSize, size));
}

export function sizeBatch(
  items: readonly unknown[],
  contextWindow: number,
  options: BatchSizingOptions = DEFAULT_BATCH_SIZING
): number {
  return computeBatchSize(contextWindow, estimateRowTokens(items, options), options);
}
