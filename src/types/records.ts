// ═══════════════════════════════════════════════════════════════════════════════
// RECORD TYPES — Source Rows, Mapped Takeoff Records, Label Vocabularies
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// SOURCE ROWS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A single spreadsheet cell as loaded from the source file.
 */
export type CellValue = string | number | boolean | null;

/**
 * One untouched input row: column name → cell value, in source column order.
 * Frozen on load; the position of a row in its array is its identity.
 */
export type RowRecord = Readonly<Record<string, CellValue>>;

// ─────────────────────────────────────────────────────────────────────────────────
// LABEL VOCABULARIES
// ─────────────────────────────────────────────────────────────────────────────────

export const COST_TYPES = ['Material', 'Labor', 'Equipment', 'Subcontract', 'Other'] as const;

export type CostType = typeof COST_TYPES[number];

export const TAKEOFF_TYPES = ['Area', 'Linear', 'Count', 'Segment', 'Volume'] as const;

export type TakeoffType = typeof TAKEOFF_TYPES[number];

export const UNIT_SYSTEMS = ['metric', 'imperial'] as const;

export type UnitSystem = typeof UNIT_SYSTEMS[number];

// ─────────────────────────────────────────────────────────────────────────────────
// MAPPED RECORDS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * The per-row output being assembled for the takeoff import.
 * Created in lockstep with the source rows; engine runs fill one field each.
 */
export interface MappedRecord {
  costType: CostType | '';
  name: string;
  usage: string;
  takeoffType: TakeoffType | '';
  formula: string;
  wastePercent: string;
  roundUpTo: string;
  sku: string;
  description: string;
  costEach: string;
  markupPercent: string;
  units: string;

  /** User-mapped extension columns (target column → text value), in mapping order */
  extensions: Record<string, string>;
}

/**
 * Fields an engine run is allowed to commit.
 */
export type EngineField = 'costType' | 'takeoffType' | 'formula';

/**
 * Fixed fields of a mapped record, excluding extensions.
 */
export type MappedField = Exclude<keyof MappedRecord, 'extensions'>;

/**
 * Export column order of the takeoff import file.
 */
export const EXPORT_COLUMNS: ReadonlyArray<{ readonly header: string; readonly field: MappedField }> = [
  { header: 'Cost Type', field: 'costType' },
  { header: 'Name', field: 'name' },
  { header: 'Usage', field: 'usage' },
  { header: 'Takeoff Type', field: 'takeoffType' },
  { header: 'Formula', field: 'formula' },
  { header: 'Waste %', field: 'wastePercent' },
  { header: 'Round Up to Nearest', field: 'roundUpTo' },
  { header: 'SKU', field: 'sku' },
  { header: 'Description', field: 'description' },
  { header: 'Cost Each', field: 'costEach' },
  { header: 'Markup %', field: 'markupPercent' },
  { header: 'Units', field: 'units' },
];

/**
 * Custom property mapping: extension column header → source column name.
 */
export type CustomMappings = Readonly<Record<string, string>>;

/**
 * Create an empty mapped record.
 */
export function emptyMappedRecord(): MappedRecord {
  return {
    costType: '',
    name: '',
    usage: '',
    takeoffType: '',
    formula: '',
    wastePercent: '',
    roundUpTo: '',
    sku: '',
    description: '',
    costEach: '',
    markupPercent: '',
    units: '',
    extensions: {},
  };
}

/**
 * Render a cell as text. Numbers keep their natural representation, empty cells become ''.
 */
export function cellToText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  return String(value).trim();
}
