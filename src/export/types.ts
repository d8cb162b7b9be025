// ═══════════════════════════════════════════════════════════════════════════════
// EXPORT TYPES — Takeoff Import Files
// ═══════════════════════════════════════════════════════════════════════════════

export const EXPORT_FORMATS = ['csv', 'xlsx'] as const;

export type ExportFormat = typeof EXPORT_FORMATS[number];

export const MIME_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  csv: '.csv',
  xlsx: '.xlsx',
};

/**
 * Header row plus text rows, in export column order.
 */
export interface ExportTable {
  readonly headers: readonly string[];
  readonly rows: ReadonlyArray<readonly string[]>;
}

export interface ExportFile {
  readonly filename: string;
  readonly mimeType: string;
  readonly content: Buffer;
  readonly rowCount: number;
}
