// ═══════════════════════════════════════════════════════════════════════════════
// COST TYPE ENGINE — Material / Labor / Equipment / Subcontract / Other
// ═══════════════════════════════════════════════════════════════════════════════

import type { ConversionSession } from '../conversion/session.js';
import { COST_TYPES, type CostType } from '../types/records.js';
import type { EngineContext, RuleEngine } from './engine.js';
import { learnKeywordWeights, nameWords, type KeywordWeights } from './learned.js';

export interface CostTypeItem {
  readonly name: string;
  readonly supplier: string;
  readonly code: string;
  readonly unit: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROMPT
// ─────────────────────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You classify construction estimating line items for a quantity takeoff import.
You answer with a JSON array only, no commentary.`;

function buildPrompt(items: readonly CostTypeItem[]): string {
  return `Analyze these construction items and classify each into one of these Cost Types:
${COST_TYPES.map((label) => `- ${label}`).join('\n')}

Items to classify:
${JSON.stringify(items, null, 2)}

Classification rules:
1. If the supplier reference names a trade (plumber, carpenter, installer) → Labor or Subcontract
2. If the description mentions "Supply" → Material; "Fix" → Labor
3. Rental or hire → Equipment
4. Fixtures, fittings, raw materials → Material
5. Installation, fixing, painting work → Labor

Return ONLY a JSON array of exactly ${items.length} labels, in the same order as the items. Format:
["Material", "Labor", "Material", ...]

Use the exact category names.`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CANONICALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

const ALIASES: Readonly<Record<string, CostType>> = {
  labour: 'Labor',
  subcontractor: 'Subcontract',
};

/**
 * Case-insensitive vocabulary match with spelling aliases; anything else is Other.
 */
export function canonicalCostType(value: string): CostType {
  const lower = value.trim().toLowerCase();
  const match = COST_TYPES.find((label) => label.toLowerCase() === lower);
  return match ?? ALIASES[lower] ?? 'Other';
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOCAL FALLBACK
// ─────────────────────────────────────────────────────────────────────────────────

const LABOR_WORDS = ['fix', 'install', 'paint', 'render', 'laying'];
const EQUIPMENT_WORDS = ['hire', 'rental', 'equipment'];

/**
 * Keyword scoring plus learned keyword weights. Highest score wins in
 * vocabulary order; all-zero scores give Other.
 */
export function scoreCostType(item: CostTypeItem, weights: KeywordWeights): CostType {
  const scores: Record<CostType, number> = {
    Material: 0,
    Labor: 0,
    Equipment: 0,
    Subcontract: 0,
    Other: 0,
  };
  const name = item.name.toLowerCase();

  if (item.supplier.trim() !== '') {
    scores.Subcontract += 3;
    scores.Labor += 2;
  }
  if (name.includes('supply')) {
    scores.Material += 3;
  }
  if (LABOR_WORDS.some((word) => name.includes(word))) {
    scores.Labor += 3;
  }
  if (EQUIPMENT_WORDS.some((word) => name.includes(word))) {
    scores.Equipment += 3;
  }

  for (const word of nameWords(item.name)) {
    const learned = weights.get(word);
    if (!learned) continue;
    for (const [label, count] of learned) {
      scores[label] += count;
    }
  }

  let best: CostType = 'Other';
  let bestScore = 0;
  for (const label of COST_TYPES) {
    if (scores[label] > bestScore) {
      best = label;
      bestScore = scores[label];
    }
  }
  return best;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

export const costTypeEngine: RuleEngine<'costType', CostTypeItem> = {
  task: 'costType',
  label: 'Cost types',
  vocabulary: COST_TYPES,
  systemPrompt: SYSTEM_PROMPT,

  toItems(session: ConversionSession): CostTypeItem[] {
    return session.rows.map((_row, index) => ({
      name: session.sourceText(index, 'name'),
      supplier: session.sourceText(index, 'supplier'),
      code: session.sourceText(index, 'sku'),
      unit: session.sourceText(index, 'units'),
    }));
  },

  buildPrompt(items: readonly CostTypeItem[]): string {
    return buildPrompt(items);
  },

  canonicalize(value: string): CostType {
    return canonicalCostType(value);
  },

  fallback(items: readonly CostTypeItem[], context: EngineContext): CostType[] {
    const weights = learnKeywordWeights(context.history);
    return items.map((item) => scoreCostType(item, weights));
  },
};
