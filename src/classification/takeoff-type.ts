// ═══════════════════════════════════════════════════════════════════════════════
// TAKEOFF TYPE ENGINE — Area / Linear / Count / Segment / Volume
// ═══════════════════════════════════════════════════════════════════════════════

import type { ConversionSession } from '../conversion/session.js';
import { TAKEOFF_TYPES, type TakeoffType } from '../types/records.js';
import type { EngineContext, RuleEngine } from './engine.js';
import { learnUnitMap, normalizeUnit } from './learned.js';

export interface TakeoffTypeItem {
  readonly name: string;
  readonly unit: string;
  readonly quantity: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// UNIT TABLE
// ─────────────────────────────────────────────────────────────────────────────────

const UNIT_TABLE: ReadonlyArray<readonly [TakeoffType, readonly string[]]> = [
  ['Area', ['SM', 'SQ M', 'M2', 'SQM', 'SQUARE', 'SF', 'SQ FT', 'FT2']],
  ['Linear', ['M', 'LM', 'METRES', 'METERS', 'LF', 'LIN M']],
  ['Volume', ['M3', 'CU M', 'CUM', 'CY', 'CF', 'CU FT']],
  ['Count', ['EA', 'EACH', 'NO', 'NR', 'THOUS', 'BAG', 'TONNE', 'PACKET', 'PACKETS']],
];

const UNIT_LOOKUP: ReadonlyMap<string, TakeoffType> = new Map(
  UNIT_TABLE.flatMap(([takeoffType, units]) => units.map((unit) => [unit, takeoffType] as const))
);

/**
 * Takeoff type for a unit of measure; unknown and blank units count.
 */
export function takeoffTypeForUnit(unit: string): TakeoffType {
  return UNIT_LOOKUP.get(normalizeUnit(unit)) ?? 'Count';
}

export function canonicalTakeoffType(value: string): TakeoffType {
  const lower = value.trim().toLowerCase();
  return TAKEOFF_TYPES.find((label) => label.toLowerCase() === lower) ?? 'Count';
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROMPT
// ─────────────────────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You determine how construction line items are measured in a quantity takeoff.
You answer with a JSON array only, no commentary.`;

function buildPrompt(items: readonly TakeoffTypeItem[]): string {
  return `Analyze these construction items and determine the Takeoff Type for each:
- Area: measured in square units (walls, floors, ceilings, roofing)
- Linear: measured in length (pipes, trims, skirting, edging)
- Count: individual units (fixtures, fittings, bags, packs)
- Segment: runs counted by length segments
- Volume: measured in cubic units (concrete, fill, excavation)

Items to classify:
${JSON.stringify(items, null, 2)}

Rules:
- SM, Sm, m2, SQ M, SQUARE → Area
- M, Lm, LM, meters, metres → Linear
- EA, each, THOUS, bag, TONNE, PACKETS → Count
- m3, CU M → Volume
- If the unit is unclear, look at the item name

Return ONLY a JSON array of exactly ${items.length} labels, in the same order as the items. Format:
["Area", "Linear", "Count", ...]`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

export const takeoffTypeEngine: RuleEngine<'takeoffType', TakeoffTypeItem> = {
  task: 'takeoffType',
  label: 'Takeoff types',
  vocabulary: TAKEOFF_TYPES,
  systemPrompt: SYSTEM_PROMPT,

  toItems(session: ConversionSession): TakeoffTypeItem[] {
    return session.rows.map((_row, index) => ({
      name: session.sourceText(index, 'name'),
      unit: session.sourceText(index, 'units'),
      quantity: session.sourceText(index, 'quantity'),
    }));
  },

  buildPrompt(items: readonly TakeoffTypeItem[]): string {
    return buildPrompt(items);
  },

  canonicalize(value: string): TakeoffType {
    return canonicalTakeoffType(value);
  },

  fallback(items: readonly TakeoffTypeItem[], context: EngineContext): TakeoffType[] {
    const learned = learnUnitMap(context.history);
    return items.map((item) => learned.get(normalizeUnit(item.unit)) ?? takeoffTypeForUnit(item.unit));
  },
};
