// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DOCUMENT_FILES,
  StorageError,
  type DocumentName,
  type DocumentStore,
  type StorageErrorCode,
} from './types.js';

export { MemoryDocumentStore } from './memory.js';
export { FileDocumentStore } from './file.js';

export {
  StateStore,
  type FormulaTemplateInput,
  type ImportTemplateInput,
  type MappingUpdate,
} from './state.js';
