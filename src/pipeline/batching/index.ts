export {
  DEFAULT_BATCH_SIZING,
  estimateRowTokens,
  computeBatchSize,
  sizeBatch,
  type BatchSizingOptions,
} from './sizer.js';
export {
  BatchOrchestrator,
  planBatches,
  type BatchRange,
  type BatchProgress,
  type BatchOrchestratorOptions,
  type ChunkProcessor,
  type ProgressListener,
} from './orchestrator.js';
