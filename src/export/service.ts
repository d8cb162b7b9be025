// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT SERVICE — Mapped Records → Takeoff Import File
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../logging/index.js';
import { EXPORT_COLUMNS, type MappedRecord } from '../types/records.js';
import { getFormatter } from './formatters.js';
import { FILE_EXTENSIONS, MIME_TYPES, type ExportFile, type ExportFormat, type ExportTable } from './types.js';

const logger = getLogger({ component: 'export' });

/**
 * Fixed columns first, then the extension columns in the given order.
 */
export function buildExportTable(records: readonly MappedRecord[], extensionColumns: readonly string[]): ExportTable {
  return {
    headers: [...EXPORT_COLUMNS.map((column) => column.header), ...extensionColumns],
    rows: records.map((record) => [
      ...EXPORT_COLUMNS.map((column) => record[column.field]),
      ...extensionColumns.map((column) => record.extensions[column] ?? ''),
    ]),
  };
}

/**
 * "estimate.xlsx" → "estimate_takeoff_import.csv"
 */
export function exportFileName(sourceName: string, format: ExportFormat): string {
  const base = sourceName.replace(/\.[^./\\]+$/, '').trim() || 'export';
  return `${base}_takeoff_import${FILE_EXTENSIONS[format]}`;
}

export function exportRecords(
  records: readonly MappedRecord[],
  extensionColumns: readonly string[],
  format: ExportFormat,
  sourceName: string
): ExportFile {
  const table = buildExportTable(records, extensionColumns);
  const content = getFormatter(format).format(table);
  const file: ExportFile = {
    filename: exportFileName(sourceName, format),
    mimeType: MIME_TYPES[format],
    content,
    rowCount: table.rows.length,
  };
  logger.info('Export written', { format, rows: file.rowCount, bytes: content.length });
  return file;
}
