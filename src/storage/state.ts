// ═══════════════════════════════════════════════════════════════════════════════
// STATE STORE — Mapping History, Templates and the Work-in-Progress Snapshot
// ═══════════════════════════════════════════════════════════════════════════════
//
// Typed access over a DocumentStore. Every read is validated with zod; a
// document that fails validation raises StorageError('INVALID_DOCUMENT') and
// is never overwritten implicitly. Read-modify-write operations are queued so
// concurrent requests cannot interleave.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { getLogger } from '../logging/index.js';
import {
  WorkInProgressSnapshotSchema,
  type WorkInProgressSnapshot,
} from '../conversion/snapshot.js';
import {
  FormulaTemplateSchema,
  ImportTemplateSchema,
  MappingHistoryEntrySchema,
  historyKey,
  type FormulaTemplate,
  type ImportTemplate,
  type MappingHistoryEntry,
} from '../types/templates.js';
import { DOCUMENT_FILES, StorageError, type DocumentName, type DocumentStore } from './types.js';

const logger = getLogger({ component: 'storage' });

const MappingHistorySchema = z.record(MappingHistoryEntrySchema);
const FormulaTemplatesSchema = z.array(FormulaTemplateSchema);
const ImportTemplatesSchema = z.array(ImportTemplateSchema);

// ─────────────────────────────────────────────────────────────────────────────────
// TEMPLATE INPUTS
// ─────────────────────────────────────────────────────────────────────────────────

export type FormulaTemplateInput = Omit<FormulaTemplate, 'id' | 'createdAt'>;
export type ImportTemplateInput = Omit<z.input<typeof ImportTemplateSchema>, 'id' | 'createdAt'>;

/**
 * Fields an AI run learned about one item.
 */
export type MappingUpdate = Omit<MappingHistoryEntry, 'updatedAt'>;

// ─────────────────────────────────────────────────────────────────────────────────
// STORE
// ─────────────────────────────────────────────────────────────────────────────────

export class StateStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly documents: DocumentStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  get location(): string {
    return this.documents.location;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // MAPPING HISTORY
  // ─────────────────────────────────────────────────────────────────────────────

  /** Entries in insertion order */
  async getMappingHistory(): Promise<MappingHistoryEntry[]> {
    const history = await this.readDocument('mappingHistory', MappingHistorySchema);
    return Object.values(history ?? {});
  }

  /**
   * Merge learned fields into the history, keyed by normalized item name.
   * Fields an update leaves undefined keep their stored value.
   */
  recordMappings(updates: readonly MappingUpdate[]): Promise<number> {
    return this.exclusive(async () => {
      if (updates.length === 0) return 0;

      const history = (await this.readDocument('mappingHistory', MappingHistorySchema)) ?? {};
      const updatedAt = this.now().toISOString();
      let written = 0;

      for (const update of updates) {
        const key = historyKey(update.name);
        if (key === '') continue;
        const previous = history[key];
        history[key] = {
          name: update.name.trim(),
          unit: update.unit || previous?.unit || '',
          costType: update.costType ?? previous?.costType,
          takeoffType: update.takeoffType ?? previous?.takeoffType,
          formula: update.formula ?? previous?.formula,
          unitSystem: update.unitSystem ?? previous?.unitSystem,
          updatedAt,
        };
        written++;
      }

      if (written > 0) {
        await this.writeDocument('mappingHistory', history);
      }
      logger.debug('Mapping history updated', { entries: written });
      return written;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // FORMULA TEMPLATES
  // ─────────────────────────────────────────────────────────────────────────────

  async listFormulaTemplates(): Promise<FormulaTemplate[]> {
    return (await this.readDocument('formulaTemplates', FormulaTemplatesSchema)) ?? [];
  }

  async getFormulaTemplate(id: string): Promise<FormulaTemplate | null> {
    return (await this.listFormulaTemplates()).find((template) => template.id === id) ?? null;
  }

  createFormulaTemplate(input: FormulaTemplateInput): Promise<FormulaTemplate> {
    return this.exclusive(async () => {
      const templates = await this.listFormulaTemplates();
      const template = FormulaTemplateSchema.parse({ ...input, id: uuidv4(), createdAt: this.now().toISOString() });
      await this.writeDocument('formulaTemplates', [...templates, template]);
      return template;
    });
  }

  updateFormulaTemplate(id: string, patch: Partial<FormulaTemplateInput>): Promise<FormulaTemplate | null> {
    return this.exclusive(async () => {
      const templates = await this.listFormulaTemplates();
      const index = templates.findIndex((template) => template.id === id);
      const current = templates[index];
      if (!current) return null;

      const updated = FormulaTemplateSchema.parse({ ...current, ...patch, id, createdAt: current.createdAt });
      templates[index] = updated;
      await this.writeDocument('formulaTemplates', templates);
      return updated;
    });
  }

  deleteFormulaTemplate(id: string): Promise<boolean> {
    return this.exclusive(async () => {
      const templates = await this.listFormulaTemplates();
      const remaining = templates.filter((template) => template.id !== id);
      if (remaining.length === templates.length) return false;
      await this.writeDocument('formulaTemplates', remaining);
      return true;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // IMPORT TEMPLATES
  // ─────────────────────────────────────────────────────────────────────────────

  async listImportTemplates(): Promise<ImportTemplate[]> {
    return (await this.readDocument('importTemplates', ImportTemplatesSchema)) ?? [];
  }

  async getImportTemplate(id: string): Promise<ImportTemplate | null> {
    return (await this.listImportTemplates()).find((template) => template.id === id) ?? null;
  }

  createImportTemplate(input: ImportTemplateInput): Promise<ImportTemplate> {
    return this.exclusive(async () => {
      const templates = await this.listImportTemplates();
      const template = ImportTemplateSchema.parse({ ...input, id: uuidv4(), createdAt: this.now().toISOString() });
      await this.writeDocument('importTemplates', [...templates, template]);
      return template;
    });
  }

  deleteImportTemplate(id: string): Promise<boolean> {
    return this.exclusive(async () => {
      const templates = await this.listImportTemplates();
      const remaining = templates.filter((template) => template.id !== id);
      if (remaining.length === templates.length) return false;
      await this.writeDocument('importTemplates', remaining);
      return true;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // WORK-IN-PROGRESS SNAPSHOT
  // ─────────────────────────────────────────────────────────────────────────────

  loadSnapshot(): Promise<WorkInProgressSnapshot | null> {
    return this.readDocument('workInProgress', WorkInProgressSnapshotSchema);
  }

  saveSnapshot(snapshot: WorkInProgressSnapshot): Promise<void> {
    return this.exclusive(async () => {
      await this.writeDocument('workInProgress', WorkInProgressSnapshotSchema.parse(snapshot));
      logger.info('Work in progress saved', { sourceName: snapshot.sourceName, rows: snapshot.rows.length });
    });
  }

  clearSnapshot(): Promise<boolean> {
    return this.exclusive(() => this.documents.delete('workInProgress'));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ─────────────────────────────────────────────────────────────────────────────

  private async readDocument<T>(name: DocumentName, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const content = await this.documents.read(name);
    if (content === null) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new StorageError('INVALID_DOCUMENT', name, `${DOCUMENT_FILES[name]} is not valid JSON`, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      logger.warn('Stored document failed validation', { document: DOCUMENT_FILES[name], issues: parsed.error.issues.length });
      throw new StorageError('INVALID_DOCUMENT', name, `${DOCUMENT_FILES[name]} failed validation`, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async writeDocument(name: DocumentName, value: unknown): Promise<void> {
    await this.documents.write(name, `${JSON.stringify(value, null, 2)}\n`);
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
