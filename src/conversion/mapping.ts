// ═══════════════════════════════════════════════════════════════════════════════
// FIELD MAPPING — Source Columns → Mapped Record Fields
// ═══════════════════════════════════════════════════════════════════════════════

import {
  cellToText,
  emptyMappedRecord,
  type CustomMappings,
  type MappedRecord,
  type RowRecord,
} from '../types/records.js';
import { FieldMappingSchema, type FieldMapping } from '../types/templates.js';

export type { FieldMapping };

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type SourceField = keyof FieldMapping;

export const SOURCE_FIELDS: readonly SourceField[] = FieldMappingSchema.keyof().options;

/**
 * Databuild-style export column names.
 */
export const DEFAULT_FIELD_MAPPING: Readonly<FieldMapping> = {
  name: 'Name',
  sku: 'Databuild Code',
  costEach: 'Unit Price',
  units: 'Units',
  supplier: 'Supplier Reference',
  quantity: 'Quantity',
};

/**
 * Record fields copied straight from a source column.
 */
const COPIED_FIELDS = [
  'usage',
  'wastePercent',
  'roundUpTo',
  'sku',
  'costEach',
  'markupPercent',
  'units',
] as const satisfies ReadonlyArray<SourceField & keyof MappedRecord>;

// ─────────────────────────────────────────────────────────────────────────────────
// COLUMN RESOLUTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Find the actual column for a wanted name: exact match first, then case-insensitive.
 */
export function resolveColumn(columns: readonly string[], wanted: string | undefined): string | undefined {
  if (!wanted) return undefined;
  if (columns.includes(wanted)) return wanted;
  const lower = wanted.trim().toLowerCase();
  return columns.find((column) => column.toLowerCase() === lower);
}

/**
 * Merge a partial mapping over the defaults. Empty strings unmap a field.
 */
export function mergeFieldMapping(overrides: FieldMapping = {}): FieldMapping {
  const merged: FieldMapping = { ...DEFAULT_FIELD_MAPPING };
  for (const key of SOURCE_FIELDS) {
    const column = overrides[key];
    if (column === undefined) continue;
    if (column.trim() === '') {
      delete merged[key];
    } else {
      merged[key] = column.trim();
    }
  }
  return merged;
}

/**
 * Reads source fields off row records through a field mapping.
 */
export class FieldReader {
  private readonly resolved: Partial<Record<SourceField, string>>;
  private readonly firstColumn: string | undefined;

  constructor(columns: readonly string[], mapping: FieldMapping) {
    this.firstColumn = columns[0];
    this.resolved = {};
    for (const field of SOURCE_FIELDS) {
      const column = resolveColumn(columns, mapping[field]);
      if (column !== undefined) {
        this.resolved[field] = column;
      }
    }
  }

  columnFor(field: SourceField): string | undefined {
    if (field === 'name') {
      return this.resolved.name ?? this.firstColumn;
    }
    return this.resolved[field];
  }

  read(row: RowRecord, field: SourceField): string {
    const column = this.columnFor(field);
    return column === undefined ? '' : cellToText(row[column]);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RECORD BUILDING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Build one mapped record per row. Engine fields start empty; the
 * description defaults to the name; extension columns follow mapping order.
 */
export function buildMappedRecords(
  rows: readonly RowRecord[],
  columns: readonly string[],
  mapping: FieldMapping,
  customMappings: CustomMappings = {}
): MappedRecord[] {
  const reader = new FieldReader(columns, mapping);
  const extensionColumns = Object.entries(customMappings).map(
    ([target, source]) => [target, resolveColumn(columns, source)] as const
  );

  return rows.map((row) => {
    const record = emptyMappedRecord();
    record.name = reader.read(row, 'name');
    record.description = reader.columnFor('description') ? reader.read(row, 'description') : record.name;
    for (const field of COPIED_FIELDS) {
      record[field] = reader.read(row, field);
    }
    for (const [target, source] of extensionColumns) {
      record.extensions[target] = source === undefined ? '' : cellToText(row[source]);
    }
    return record;
  });
}

/**
 * Re-derive the copied fields from the rows, keeping the engine fields of `current`.
 */
export function remapRecords(
  current: readonly MappedRecord[],
  rows: readonly RowRecord[],
  columns: readonly string[],
  mapping: FieldMapping,
  customMappings: CustomMappings
): MappedRecord[] {
  return buildMappedRecords(rows, columns, mapping, customMappings).map((record, index) => {
    const previous = current[index];
    if (!previous) return record;
    return {
      ...record,
      costType: previous.costType,
      takeoffType: previous.takeoffType,
      formula: previous.formula,
    };
  });
}
