export { normalizeResponse, parseResponse } from './normalizer.js';
export {
  strictParse,
  stripFences,
  extractBracketed,
  normalizeQuotes,
  quoteBareWords,
  cleanPiece,
  STRATEGY_PIPELINE,
} from './strategies.js';
export {
  REPAIR_STRATEGIES,
  type NormalizeOptions,
  type NormalizedResponse,
  type RepairStrategy,
  type RepairStrategyName,
} from './types.js';
