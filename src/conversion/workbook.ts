// ═══════════════════════════════════════════════════════════════════════════════
// WORKBOOK READER — CSV / XLSX / XLS Bytes → Source Table
// ═══════════════════════════════════════════════════════════════════════════════
//
// First sheet only. The first non-blank row is the header row; blank rows are
// dropped and missing cells become ''. CSV values stay text, so codes like
// "00120" keep their leading zeros.
//
// ═══════════════════════════════════════════════════════════════════════════════

import * as XLSX from 'xlsx';
import { getLogger } from '../logging/index.js';
import type { CellValue, RowRecord } from '../types/records.js';
import type { SourceTable } from './session.js';

const logger = getLogger({ component: 'workbook' });

export type WorkbookFormat = 'csv' | 'xlsx';

export type WorkbookErrorCode = 'UNSUPPORTED_FORMAT' | 'UNREADABLE_WORKBOOK' | 'EMPTY_WORKBOOK';

export class WorkbookError extends Error {
  readonly name = 'WorkbookError';
  readonly code: WorkbookErrorCode;

  constructor(code: WorkbookErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMAT DETECTION
// ─────────────────────────────────────────────────────────────────────────────────

const EXTENSION_FORMATS: Readonly<Record<string, WorkbookFormat>> = {
  csv: 'csv',
  xlsx: 'xlsx',
  xls: 'xlsx',
};

/**
 * @throws WorkbookError for extensions other than csv, xlsx and xls
 */
export function detectFormat(fileName: string): WorkbookFormat {
  const extension = fileName.split('.').pop()?.toLowerCase() ?? '';
  const format = fileName.includes('.') ? EXTENSION_FORMATS[extension] : undefined;
  if (!format) {
    throw new WorkbookError('UNSUPPORTED_FORMAT', `Unsupported file type: ${fileName}`);
  }
  return format;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CELLS & HEADERS
// ─────────────────────────────────────────────────────────────────────────────────

function toCellValue(value: unknown): CellValue {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : '';
  if (typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  return '';
}

/**
 * Trimmed header names; blanks become "Column N" and repeats get a numeric suffix.
 */
export function normalizeHeaders(raw: readonly unknown[]): string[] {
  const seen = new Map<string, number>();
  return raw.map((value, index) => {
    const text = String(toCellValue(value)).trim();
    const base = text === '' ? `Column ${index + 1}` : text;
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base} (${count})`;
  });
}

function isBlankRow(row: readonly unknown[]): boolean {
  return row.every((cell) => cell === '' || cell === null || cell === undefined);
}

// ─────────────────────────────────────────────────────────────────────────────────
// READ
// ─────────────────────────────────────────────────────────────────────────────────

function readSheetMatrix(buffer: Buffer, format: WorkbookFormat): unknown[][] {
  const workbook = format === 'csv'
    ? XLSX.read(buffer.toString('utf8').replace(/^\uFEFF/, ''), { type: 'string', raw: true })
    : XLSX.read(buffer, { type: 'buffer' });

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    return [];
  }
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', raw: true, blankrows: false });
}

/**
 * Load a source table from uploaded bytes.
 * @throws WorkbookError
 */
export function readWorkbook(buffer: Buffer, fileName: string): SourceTable {
  const format = detectFormat(fileName);

  let matrix: unknown[][];
  try {
    matrix = readSheetMatrix(buffer, format);
  } catch (error) {
    throw new WorkbookError('UNREADABLE_WORKBOOK', `Could not read ${fileName}`, { cause: error });
  }

  const [headerRow, ...dataRows] = matrix.filter((row) => !isBlankRow(row));
  if (!headerRow) {
    throw new WorkbookError('EMPTY_WORKBOOK', `${fileName} has no header row`);
  }

  const columns = normalizeHeaders(headerRow);
  const rows: RowRecord[] = dataRows.map((cells) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((column, index) => {
      row[column] = toCellValue(cells[index]);
    });
    return row;
  });

  logger.info('Workbook loaded', { fileName, format, columns: columns.length, rows: rows.length });
  return { sourceName: fileName, columns, rows };
}
