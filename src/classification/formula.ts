// ═══════════════════════════════════════════════════════════════════════════════
// FORMULA ENGINE — Per-Row Quantity Formulas
// ═══════════════════════════════════════════════════════════════════════════════

import type { ConversionSession } from '../conversion/session.js';
import type { TakeoffType, UnitSystem } from '../types/records.js';
import type { FormulaTemplate } from '../types/templates.js';
import type { EngineContext, RuleEngine } from './engine.js';
import {
  FORMULA_VARIABLES,
  bracket,
  defaultFormula,
  isValidFormula,
  validateFormula,
  variableNames,
} from './formula-variables.js';
import { learnCommonFormulas } from './learned.js';
import { takeoffTypeForUnit } from './takeoff-type.js';

export interface FormulaItem {
  readonly name: string;
  readonly unit: string;
  readonly quantity: string;
  /** Committed takeoff type, or the one implied by the unit */
  readonly takeoffType: TakeoffType;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROMPT
// ─────────────────────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You write quantity formulas for a construction takeoff import.
You answer with a JSON array only, no commentary.`;

function templateLines(templates: readonly FormulaTemplate[], unitSystem: UnitSystem): string {
  const usable = templates.filter((template) => isValidFormula(template.formula, unitSystem));
  if (usable.length === 0) {
    return '(none saved)';
  }
  return usable
    .map((template) => {
      const type = template.takeoffType ? ` [${template.takeoffType}]` : '';
      const description = template.description ? ` (${template.description})` : '';
      return `- ${template.name}${type}: ${template.formula}${description}`;
    })
    .join('\n');
}

function buildPrompt(items: readonly FormulaItem[], context: EngineContext): string {
  const table = FORMULA_VARIABLES[context.unitSystem];
  const serialized = items.map((item) => ({
    name: item.name,
    unit: item.unit,
    quantity: item.quantity,
    takeoff_type: item.takeoffType,
  }));

  return `Generate a quantity formula for each construction item of a takeoff import.

Items with their Takeoff Types:
${JSON.stringify(serialized, null, 2)}

Available variables (${context.unitSystem}):
${variableNames(context.unitSystem).map(bracket).join(' ')}

Formula rules:
1. Use only the variables above, numbers and the operators + - * / ( )
2. Area items: ${bracket(table.area)}, or ${bracket(table.length)} * ${bracket(table.height)} for walls
3. Linear and Segment items: ${bracket(table.length)} or ${bracket(table.perimeter)}
4. Count items: ${bracket(table.count)}
5. Volume items: ${bracket(table.volume)}, or ${bracket(table.area)} * ${bracket(table.depth)}
6. Keep formulas simple and practical

Saved formula templates:
${templateLines(context.templates, context.unitSystem)}

When an item is similar to a saved template, reuse that template's formula exactly.

Return ONLY a JSON array of exactly ${items.length} formulas, in the same order as the items. Format:
["${bracket(table.area)}", "${bracket(table.count)}", "${bracket(table.length)} * 1.1", ...]`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

export const formulaEngine: RuleEngine<'formula', FormulaItem> = {
  task: 'formula',
  label: 'Formulas',
  systemPrompt: SYSTEM_PROMPT,

  toItems(session: ConversionSession): FormulaItem[] {
    const committed = session.fieldValues('takeoffType');
    return session.rows.map((_row, index) => {
      const unit = session.sourceText(index, 'units');
      return {
        name: session.sourceText(index, 'name'),
        unit,
        quantity: session.sourceText(index, 'quantity'),
        takeoffType: committed[index] || takeoffTypeForUnit(unit),
      };
    });
  },

  buildPrompt,

  canonicalize(value: string, item: FormulaItem, context: EngineContext): string {
    return validateFormula(value, context.unitSystem) ?? defaultFormula(item.takeoffType, context.unitSystem);
  },

  fallback(items: readonly FormulaItem[], context: EngineContext): string[] {
    const { unitSystem } = context;
    const learned = learnCommonFormulas(context.history, (formula) => isValidFormula(formula, unitSystem));
    return items.map((item) => {
      const formula = learned.get(item.takeoffType);
      return (formula !== undefined ? validateFormula(formula, unitSystem) : null)
        ?? defaultFormula(item.takeoffType, unitSystem);
    });
  },
};
