// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT MODULE — Takeoff Import Files
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type { ExportFormat, ExportTable, ExportFile } from './types.js';

// Constants
export { EXPORT_FORMATS, MIME_TYPES, FILE_EXTENSIONS } from './types.js';

// Formatters
export {
  CsvFormatter,
  XlsxFormatter,
  EXPORT_SHEET_NAME,
  getFormatter,
  type ExportFormatter,
} from './formatters.js';

// Service
export { buildExportTable, exportFileName, exportRecords } from './service.js';
