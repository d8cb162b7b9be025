// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION MODULE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type FieldMapping,
  type SourceField,
  SOURCE_FIELDS,
  DEFAULT_FIELD_MAPPING,
  FieldReader,
  resolveColumn,
  mergeFieldMapping,
  buildMappedRecords,
  remapRecords,
} from './mapping.js';

export {
  type SourceTable,
  type SessionSettings,
  type SessionOptions,
  ConversionSession,
  SessionBusyError,
} from './session.js';

export {
  SNAPSHOT_VERSION,
  WorkInProgressSnapshotSchema,
  MappedRecordSchema,
  type WorkInProgressSnapshot,
} from './snapshot.js';

export {
  type WorkbookFormat,
  type WorkbookErrorCode,
  WorkbookError,
  detectFormat,
  normalizeHeaders,
  readWorkbook,
} from './workbook.js';

export {
  type ProviderFactory,
  type ConversionServiceOptions,
  type CreateSessionRequest,
  type SettingsUpdate,
  type RunTaskRequest,
  type SessionStatus,
  type TaskRunResult,
  ConversionService,
  ResourceNotFoundError,
  describeSession,
} from './service.js';
