// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE NORMALIZER — Exact-Length Arrays from Unreliable Provider Text
// ═══════════════════════════════════════════════════════════════════════════════
//
// Strategies run in order; the first whose element count equals the expected
// count wins. A strategy that parses to the wrong count falls through. Once a
// strict parse has produced more elements than expected, free-text matching is
// skipped: picking labels out of that array would drop rows.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';
import { err, ok, type Result } from '../../types/result.js';
import { UnparsableResponse } from '../errors.js';
import { STRATEGY_PIPELINE } from './strategies.js';
import type { NormalizedResponse, NormalizeOptions, RepairStrategyName } from './types.js';

const logger = getLogger({ component: 'normalizer' });

/**
 * Recover exactly `expectedCount` values from a provider response.
 */
export function normalizeResponse(
  raw: string,
  expectedCount: number,
  options: NormalizeOptions = {}
): Result<NormalizedResponse, UnparsableResponse> {
  const tried: RepairStrategyName[] = [];
  let bestEffort: number | null = null;
  let longestParse = 0;

  for (const [name, strategy] of STRATEGY_PIPELINE) {
    if (name === 'FreeTextVocabularyMatch' && longestParse > expectedCount) {
      continue;
    }
    tried.push(name);
    const values = strategy(raw, expectedCount, options);
    if (values === null) {
      continue;
    }

    if (values.length === expectedCount) {
      if (name !== 'StripFences') {
        logger.debug('Response repaired', { strategy: name, expectedCount });
      }
      return ok({ values, strategy: name });
    }

    longestParse = Math.max(longestParse, values.length);
    if (bestEffort === null || Math.abs(values.length - expectedCount) < Math.abs(bestEffort - expectedCount)) {
      bestEffort = values.length;
    }
  }

  const error = new UnparsableResponse(raw, expectedCount, bestEffort ?? 0, tried);
  logger.warn('Response could not be normalized', {
    expectedCount,
    bestEffortCount: error.bestEffortCount,
    snippet: error.snippet,
  });
  return err(error);
}

/**
 * Throwing variant of normalizeResponse().
 * @throws UnparsableResponse
 */
export function parseResponse(raw: string, expectedCount: number, options: NormalizeOptions = {}): string[] {
  const result = normalizeResponse(raw, expectedCount, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.value.values;
}
