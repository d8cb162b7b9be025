// ═══════════════════════════════════════════════════════════════════════════════
// LEARNED PATTERNS — Fallback Layers Derived from Mapping History
// ═══════════════════════════════════════════════════════════════════════════════

import type { CostType, TakeoffType } from '../types/records.js';
import type { MappingHistoryEntry } from '../types/templates.js';

export type KeywordWeights = ReadonlyMap<string, ReadonlyMap<CostType, number>>;

/** Words this short carry no signal */
const MIN_KEYWORD_LENGTH = 4;

export function nameWords(name: string): string[] {
  return name.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Per-keyword cost type counts over the labeled sample.
 */
export function learnKeywordWeights(history: readonly MappingHistoryEntry[]): KeywordWeights {
  const weights = new Map<string, Map<CostType, number>>();

  for (const entry of history) {
    if (!entry.costType) continue;
    for (const word of nameWords(entry.name)) {
      if (word.length < MIN_KEYWORD_LENGTH) continue;
      let counts = weights.get(word);
      if (!counts) {
        counts = new Map();
        weights.set(word, counts);
      }
      counts.set(entry.costType, (counts.get(entry.costType) ?? 0) + 1);
    }
  }
  return weights;
}

export function normalizeUnit(unit: string): string {
  return unit.trim().toUpperCase();
}

/**
 * Unit → takeoff type seen in the labeled sample. Later entries win.
 */
export function learnUnitMap(history: readonly MappingHistoryEntry[]): ReadonlyMap<string, TakeoffType> {
  const units = new Map<string, TakeoffType>();
  for (const entry of history) {
    const unit = normalizeUnit(entry.unit);
    if (unit && entry.takeoffType) {
      units.set(unit, entry.takeoffType);
    }
  }
  return units;
}

/**
 * Most frequent formula per takeoff type. Ties keep the formula seen first.
 * Entries failing `accept` are skipped.
 */
export function learnCommonFormulas(
  history: readonly MappingHistoryEntry[],
  accept: (formula: string) => boolean
): ReadonlyMap<TakeoffType, string> {
  const counts = new Map<TakeoffType, Map<string, number>>();

  for (const entry of history) {
    if (!entry.takeoffType || !entry.formula || !accept(entry.formula)) continue;
    let perType = counts.get(entry.takeoffType);
    if (!perType) {
      perType = new Map();
      counts.set(entry.takeoffType, perType);
    }
    perType.set(entry.formula, (perType.get(entry.formula) ?? 0) + 1);
  }

  const common = new Map<TakeoffType, string>();
  for (const [takeoffType, formulas] of counts) {
    let best: string | null = null;
    let bestCount = 0;
    for (const [formula, count] of formulas) {
      if (count > bestCount) {
        best = formula;
        bestCount = count;
      }
    }
    if (best !== null) {
      common.set(takeoffType, best);
    }
  }
  return common;
}
