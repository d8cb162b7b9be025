import { ConversionSession } from '../../conversion/session.js';
import type { RowRecord, UnitSystem } from '../../types/records.js';
import type { FormulaTemplate, MappingHistoryEntry } from '../../types/templates.js';
import type { EngineContext } from '../engine.js';

export const COLUMNS = ['Name', 'Supplier Reference', 'Databuild Code', 'Units', 'Quantity', 'Unit Price'];

export const ROWS: RowRecord[] = [
  { 'Name': 'Supply timber stud 90x45', 'Supplier Reference': '', 'Databuild Code': 'T100', 'Units': 'LM', 'Quantity': 12, 'Unit Price': 4.5 },
  { 'Name': 'Fix plasterboard lining', 'Supplier Reference': '', 'Databuild Code': 'P200', 'Units': 'SM', 'Quantity': 40, 'Unit Price': 18 },
  { 'Name': 'Scaffold hire', 'Supplier Reference': '', 'Databuild Code': 'S300', 'Units': 'EA', 'Quantity': 1, 'Unit Price': 950 },
  { 'Name': 'Plumbing rough-in', 'Supplier Reference': 'Acme Plumbing', 'Databuild Code': 'PL400', 'Units': 'EA', 'Quantity': 3, 'Unit Price': 420 },
  { 'Name': 'Concrete 25MPa', 'Supplier Reference': '', 'Databuild Code': 'C500', 'Units': 'M3', 'Quantity': 6, 'Unit Price': 310 },
];

export function createSession(unitSystem: UnitSystem = 'metric'): ConversionSession {
  return new ConversionSession(
    { sourceName: 'estimate.csv', columns: COLUMNS, rows: ROWS },
    { unitSystem, fieldMapping: {}, customMappings: {} }
  );
}

export const UPDATED_AT = '2026-01-15T09:30:00.000Z';

export function historyEntry(entry: Omit<MappingHistoryEntry, 'updatedAt' | 'unit'> & { unit?: string }): MappingHistoryEntry {
  return { unit: '', ...entry, updatedAt: UPDATED_AT };
}

export function contextFor(
  unitSystem: UnitSystem = 'metric',
  history: MappingHistoryEntry[] = [],
  templates: FormulaTemplate[] = []
): EngineContext {
  return { unitSystem, history, templates };
}
