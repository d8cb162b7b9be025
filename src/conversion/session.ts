// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION SESSION — Rows, Mapped Records and Settings of One Loaded File
// ═══════════════════════════════════════════════════════════════════════════════
//
// The session owns the row/record pair. Rows are frozen on load; records are
// only changed through commitField() (one engine field, full length) or a
// settings change that re-derives the copied columns.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import type { BatchProgress } from '../pipeline/batching/index.js';
import { AlignmentError } from '../pipeline/errors.js';
import type {
  CustomMappings,
  EngineField,
  MappedRecord,
  RowRecord,
  UnitSystem,
} from '../types/records.js';
import {
  FieldReader,
  buildMappedRecords,
  mergeFieldMapping,
  remapRecords,
  type FieldMapping,
  type SourceField,
} from './mapping.js';
import { SNAPSHOT_VERSION, type WorkInProgressSnapshot } from './snapshot.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface SourceTable {
  readonly sourceName: string;
  readonly columns: readonly string[];
  readonly rows: readonly RowRecord[];
}

export interface SessionSettings {
  readonly unitSystem: UnitSystem;
  readonly fieldMapping: FieldMapping;
  readonly customMappings: CustomMappings;
}

export interface SessionOptions {
  id?: string;
  /** Existing records, e.g. from a snapshot; built from the rows when absent */
  records?: readonly MappedRecord[];
  createdAt?: Date;
}

/**
 * Raised when an engine run is requested while another is active on the session.
 */
export class SessionBusyError extends Error {
  readonly name = 'SessionBusyError';
  readonly code = 'SESSION_BUSY';
  readonly sessionId: string;
  readonly activeTask: EngineField;

  constructor(sessionId: string, activeTask: EngineField) {
    super(`Session ${sessionId} is already running ${activeTask}`);
    this.sessionId = sessionId;
    this.activeTask = activeTask;
  }
}

function copyRecord(record: MappedRecord): MappedRecord {
  return { ...record, extensions: { ...record.extensions } };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SESSION
// ─────────────────────────────────────────────────────────────────────────────────

export class ConversionSession {
  readonly id: string;
  readonly sourceName: string;
  readonly columns: readonly string[];
  readonly rows: readonly RowRecord[];
  readonly createdAt: Date;

  private records: MappedRecord[];
  private settings: SessionSettings;
  private reader: FieldReader;
  private activeTask: EngineField | null = null;
  private lastProgress: BatchProgress | null = null;
  private touchedAt: Date;

  constructor(table: SourceTable, settings: SessionSettings, options: SessionOptions = {}) {
    this.id = options.id ?? uuidv4();
    this.sourceName = table.sourceName;
    this.columns = Object.freeze([...table.columns]);
    this.rows = Object.freeze(table.rows.map((row) => Object.freeze({ ...row })));
    this.createdAt = options.createdAt ?? new Date();
    this.touchedAt = this.createdAt;

    this.settings = {
      unitSystem: settings.unitSystem,
      fieldMapping: mergeFieldMapping(settings.fieldMapping),
      customMappings: { ...settings.customMappings },
    };
    this.reader = new FieldReader(this.columns, this.settings.fieldMapping);

    if (options.records) {
      if (options.records.length !== this.rows.length) {
        throw new AlignmentError(this.rows.length, options.records.length);
      }
      this.records = options.records.map(copyRecord);
    } else {
      this.records = buildMappedRecords(
        this.rows,
        this.columns,
        this.settings.fieldMapping,
        this.settings.customMappings
      );
    }
  }

  /**
   * Restore a session from a saved snapshot.
   */
  static fromSnapshot(snapshot: WorkInProgressSnapshot, id?: string): ConversionSession {
    return new ConversionSession(
      { sourceName: snapshot.sourceName, columns: snapshot.columns, rows: snapshot.rows },
      {
        unitSystem: snapshot.unitSystem,
        fieldMapping: snapshot.fieldMapping,
        customMappings: snapshot.customMappings,
      },
      { id, records: snapshot.records }
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // READ ACCESS
  // ─────────────────────────────────────────────────────────────────────────────

  get rowCount(): number {
    return this.rows.length;
  }

  get unitSystem(): UnitSystem {
    return this.settings.unitSystem;
  }

  get fieldMapping(): FieldMapping {
    return { ...this.settings.fieldMapping };
  }

  get customMappings(): CustomMappings {
    return { ...this.settings.customMappings };
  }

  get updatedAt(): Date {
    return this.touchedAt;
  }

  /** Copies; changing them does not touch the session */
  getRecords(): MappedRecord[] {
    return this.records.map(copyRecord);
  }

  getRecord(index: number): MappedRecord | undefined {
    const record = this.records[index];
    return record ? copyRecord(record) : undefined;
  }

  /**
   * Text of a source field for one row, read through the field mapping.
   */
  sourceText(index: number, field: SourceField): string {
    const row = this.rows[index];
    return row ? this.reader.read(row, field) : '';
  }

  fieldValues<F extends EngineField>(field: F): MappedRecord[F][] {
    return this.records.map((record) => record[field]);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // MUTATION
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Write one engine field on every record.
   * @throws AlignmentError when values and rows differ in length
   */
  commitField<F extends EngineField>(field: F, values: readonly MappedRecord[F][]): void {
    if (values.length !== this.records.length) {
      throw new AlignmentError(this.records.length, values.length);
    }
    values.forEach((value, index) => {
      const record = this.records[index];
      if (record) {
        record[field] = value;
      }
    });
    this.touch();
  }

  /**
   * Change settings. A new field mapping or custom mapping re-derives the copied
   * columns; engine fields are kept.
   */
  updateSettings(patch: Partial<SessionSettings>): void {
    const remap = patch.fieldMapping !== undefined || patch.customMappings !== undefined;
    this.settings = {
      unitSystem: patch.unitSystem ?? this.settings.unitSystem,
      fieldMapping: patch.fieldMapping ? mergeFieldMapping(patch.fieldMapping) : this.settings.fieldMapping,
      customMappings: patch.customMappings ? { ...patch.customMappings } : this.settings.customMappings,
    };

    if (remap) {
      this.reader = new FieldReader(this.columns, this.settings.fieldMapping);
      this.records = remapRecords(
        this.records,
        this.rows,
        this.columns,
        this.settings.fieldMapping,
        this.settings.customMappings
      );
    }
    this.touch();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // RUN STATE
  // ─────────────────────────────────────────────────────────────────────────────

  get activeRun(): EngineField | null {
    return this.activeTask;
  }

  get progress(): BatchProgress | null {
    return this.lastProgress;
  }

  /**
   * @throws SessionBusyError when another run is active
   */
  beginRun(task: EngineField): void {
    if (this.activeTask !== null) {
      throw new SessionBusyError(this.id, this.activeTask);
    }
    this.activeTask = task;
    this.lastProgress = null;
  }

  recordProgress(progress: BatchProgress): void {
    this.lastProgress = progress;
  }

  endRun(): void {
    this.activeTask = null;
    this.lastProgress = null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SNAPSHOT
  // ─────────────────────────────────────────────────────────────────────────────

  toSnapshot(savedAt: Date = new Date()): WorkInProgressSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      savedAt: savedAt.toISOString(),
      sourceName: this.sourceName,
      columns: [...this.columns],
      rows: this.rows.map((row) => ({ ...row })),
      records: this.getRecords(),
      fieldMapping: this.fieldMapping,
      customMappings: this.customMappings,
      unitSystem: this.unitSystem,
    };
  }

  private touch(): void {
    this.touchedAt = new Date();
  }
}
