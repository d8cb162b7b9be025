// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT FORMATTERS — Export Table to CSV / XLSX Bytes
// ═══════════════════════════════════════════════════════════════════════════════

import * as XLSX from 'xlsx';
import type { ExportFormat, ExportTable } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BASE FORMATTER INTERFACE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ExportFormatter {
  format(table: ExportTable): Buffer;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CSV FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * RFC 4180: CRLF line breaks; fields holding a comma, quote or line break are
 * quoted with inner quotes doubled.
 */
export class CsvFormatter implements ExportFormatter {
  format(table: ExportTable): Buffer {
    const lines = [table.headers, ...table.rows].map((row) => row.map((value) => this.escapeCsv(value)).join(','));
    return Buffer.from(`${lines.join('\r\n')}\r\n`, 'utf8');
  }

  private escapeCsv(value: string): string {
    if (/[",\r\n]/.test(value)) {
      return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// XLSX FORMATTER
// ─────────────────────────────────────────────────────────────────────────────────

export const EXPORT_SHEET_NAME = 'Takeoff Import';

/**
 * Single sheet; every cell is written as a text cell.
 */
export class XlsxFormatter implements ExportFormatter {
  format(table: ExportTable): Buffer {
    const sheet = XLSX.utils.aoa_to_sheet([[...table.headers], ...table.rows.map((row) => [...row])]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, EXPORT_SHEET_NAME);

    const content: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(content)) {
      throw new Error('XLSX writer did not return a buffer');
    }
    return content;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function getFormatter(format: ExportFormat): ExportFormatter {
  switch (format) {
    case 'csv':
      return new CsvFormatter();
    case 'xlsx':
      return new XlsxFormatter();
  }
}
