// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFICATION MODULE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type EngineMode,
  type EngineContext,
  type RuleEngine,
  type EngineRunOptions,
  type EngineRunSummary,
  runEngine,
} from './engine.js';

export {
  type CostTypeItem,
  costTypeEngine,
  canonicalCostType,
  scoreCostType,
} from './cost-type.js';

export {
  type TakeoffTypeItem,
  takeoffTypeEngine,
  canonicalTakeoffType,
  takeoffTypeForUnit,
} from './takeoff-type.js';

export {
  type FormulaItem,
  formulaEngine,
} from './formula.js';

export {
  type VariableTable,
  FORMULA_VARIABLES,
  defaultFormula,
  validateFormula,
  isValidFormula,
  variableNames,
} from './formula-variables.js';

export {
  type KeywordWeights,
  learnKeywordWeights,
  learnUnitMap,
  learnCommonFormulas,
} from './learned.js';
