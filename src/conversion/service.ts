// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION SERVICE — Sessions, Engine Runs, Export and Snapshots
// ═══════════════════════════════════════════════════════════════════════════════
//
// The service owns the live sessions and everything around an engine run:
// the labeled sample and templates from storage, the provider for the run,
// and the mapping-history update after AI results were committed.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  costTypeEngine,
  formulaEngine,
  runEngine,
  takeoffTypeEngine,
  type EngineContext,
  type EngineMode,
  type EngineRunOptions,
  type EngineRunSummary,
} from '../classification/index.js';
import type { ProviderName } from '../config/schema.js';
import { exportRecords, type ExportFile, type ExportFormat } from '../export/index.js';
import { getLogger } from '../logging/index.js';
import type { BatchProgress, BatchSizingOptions } from '../pipeline/batching/index.js';
import type { ProviderSettings } from '../providers/index.js';
import type { TextProvider } from '../providers/types.js';
import type { MappingUpdate, StateStore } from '../storage/index.js';
import type { CustomMappings, EngineField, MappedRecord, UnitSystem } from '../types/records.js';
import type { FieldMapping, ImportTemplate } from '../types/templates.js';
import { ConversionSession } from './session.js';
import { readWorkbook } from './workbook.js';

const logger = getLogger({ component: 'conversion' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type ProviderFactory = (settings: ProviderSettings) => TextProvider;

export interface ConversionServiceOptions {
  store: StateStore;
  /** Provider used when a run names none */
  llm: ProviderSettings;
  batch: BatchSizingOptions;
  defaultUnitSystem: UnitSystem;
  providerFactory: ProviderFactory;
}

export interface CreateSessionRequest {
  unitSystem?: UnitSystem;
  importTemplateId?: string;
}

export interface SettingsUpdate {
  unitSystem?: UnitSystem;
  fieldMapping?: FieldMapping;
  customMappings?: CustomMappings;
  /** Applied first; explicit fields above win over the template */
  importTemplateId?: string;
}

export interface RunTaskRequest {
  mode: EngineMode;
  provider?: ProviderName;
  model?: string;
}

export interface TaskRunResult extends EngineRunSummary<EngineField> {
  /** False for local and mock runs, and when the history write failed */
  readonly historyUpdated: boolean;
}

export interface SessionStatus {
  readonly id: string;
  readonly sourceName: string;
  readonly rowCount: number;
  readonly columns: readonly string[];
  readonly unitSystem: UnitSystem;
  readonly fieldMapping: FieldMapping;
  readonly customMappings: CustomMappings;
  readonly activeRun: EngineField | null;
  readonly progress: BatchProgress | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export class ResourceNotFoundError extends Error {
  readonly name = 'ResourceNotFoundError';
  readonly code = 'NOT_FOUND';
  readonly resource: string;
  readonly resourceId: string;

  constructor(resource: string, resourceId: string) {
    super(`${resource} not found: ${resourceId}`);
    this.resource = resource;
    this.resourceId = resourceId;
  }
}

export function describeSession(session: ConversionSession): SessionStatus {
  return {
    id: session.id,
    sourceName: session.sourceName,
    rowCount: session.rowCount,
    columns: session.columns,
    unitSystem: session.unitSystem,
    fieldMapping: session.fieldMapping,
    customMappings: session.customMappings,
    activeRun: session.activeRun,
    progress: session.progress,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
  };
}

/**
 * History updates for one committed AI field. Formulas carry their unit system.
 */
function mappingUpdates(records: readonly MappedRecord[], task: EngineField, unitSystem: UnitSystem): MappingUpdate[] {
  return records
    .filter((record) => record.name.trim() !== '')
    .map((record): MappingUpdate => {
      const base = { name: record.name, unit: record.units };
      switch (task) {
        case 'costType':
          return record.costType ? { ...base, costType: record.costType } : base;
        case 'takeoffType':
          return record.takeoffType ? { ...base, takeoffType: record.takeoffType } : base;
        case 'formula':
          return { ...base, formula: record.formula, unitSystem };
      }
    });
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export class ConversionService {
  private readonly sessions = new Map<string, ConversionSession>();
  private readonly store: StateStore;
  private readonly options: ConversionServiceOptions;

  constructor(options: ConversionServiceOptions) {
    this.options = options;
    this.store = options.store;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SESSIONS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Load an uploaded file into a new session.
   * @throws WorkbookError, ResourceNotFoundError for an unknown import template
   */
  async createSession(buffer: Buffer, fileName: string, request: CreateSessionRequest = {}): Promise<ConversionSession> {
    const table = readWorkbook(buffer, fileName);
    const template = request.importTemplateId ? await this.requireImportTemplate(request.importTemplateId) : null;

    const session = new ConversionSession(table, {
      unitSystem: request.unitSystem ?? template?.unitSystem ?? this.options.defaultUnitSystem,
      fieldMapping: template?.fieldMapping ?? {},
      customMappings: template?.customMappings ?? {},
    });
    this.sessions.set(session.id, session);

    logger.info('Session created', { sessionId: session.id, sourceName: fileName, rows: session.rowCount });
    return session;
  }

  /**
   * @throws ResourceNotFoundError
   */
  getSession(id: string): ConversionSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new ResourceNotFoundError('Session', id);
    }
    return session;
  }

  listSessions(): ConversionSession[] {
    return [...this.sessions.values()];
  }

  deleteSession(id: string): boolean {
    return this.sessions.delete(id);
  }

  async updateSettings(id: string, update: SettingsUpdate): Promise<ConversionSession> {
    const session = this.getSession(id);
    const template = update.importTemplateId ? await this.requireImportTemplate(update.importTemplateId) : null;

    session.updateSettings({
      unitSystem: update.unitSystem ?? template?.unitSystem,
      fieldMapping: update.fieldMapping ?? template?.fieldMapping,
      customMappings: update.customMappings ?? template?.customMappings,
    });
    return session;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // ENGINE RUNS
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run one engine over a session. AI results also update the mapping history,
   * except those of the offline mock provider. The field is committed before the
   * history write, so a failed write is logged and reported, not thrown.
   * @throws SessionBusyError, ProviderCallFailed, UnparsableResponse, BatchAbort, UnknownModelError
   */
  async runTask(id: string, task: EngineField, request: RunTaskRequest): Promise<TaskRunResult> {
    const session = this.getSession(id);
    const context = await this.engineContext(session.unitSystem);
    const options = this.runOptions(context, request);

    const summary = await this.dispatch(task, session, options);

    if (summary.mode !== 'ai' || (request.provider ?? this.options.llm.provider) === 'mock') {
      return { ...summary, historyUpdated: false };
    }

    const updates = mappingUpdates(session.getRecords(), task, session.unitSystem);
    try {
      await this.store.recordMappings(updates);
      return { ...summary, historyUpdated: true };
    } catch (error) {
      logger.error('Mapping history update failed', error, { sessionId: id, task, entries: updates.length });
      return { ...summary, historyUpdated: false };
    }
  }

  private dispatch(
    task: EngineField,
    session: ConversionSession,
    options: EngineRunOptions
  ): Promise<EngineRunSummary<EngineField>> {
    switch (task) {
      case 'costType':
        return runEngine(costTypeEngine, session, options);
      case 'takeoffType':
        return runEngine(takeoffTypeEngine, session, options);
      case 'formula':
        return runEngine(formulaEngine, session, options);
    }
  }

  private runOptions(context: EngineContext, request: RunTaskRequest): EngineRunOptions {
    if (request.mode === 'local') {
      return { mode: 'local', context, batch: this.options.batch };
    }

    const defaults = this.options.llm;
    const providerName = request.provider ?? defaults.provider;
    const provider = this.options.providerFactory({
      ...defaults,
      provider: providerName,
      // A model only applies to the provider it was configured for
      model: request.model ?? (providerName === defaults.provider ? defaults.model : undefined),
    });
    return { mode: 'ai', provider, context, batch: this.options.batch };
  }

  private async engineContext(unitSystem: UnitSystem): Promise<EngineContext> {
    const [history, templates] = await Promise.all([
      this.store.getMappingHistory(),
      this.store.listFormulaTemplates(),
    ]);
    return { unitSystem, history, templates };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // EXPORT & SNAPSHOTS
  // ─────────────────────────────────────────────────────────────────────────────

  exportSession(id: string, format: ExportFormat): ExportFile {
    const session = this.getSession(id);
    return exportRecords(session.getRecords(), Object.keys(session.customMappings), format, session.sourceName);
  }

  async saveSnapshot(id: string): Promise<void> {
    await this.store.saveSnapshot(this.getSession(id).toSnapshot());
  }

  /**
   * Restore the saved work in progress as a new session.
   * @throws ResourceNotFoundError when nothing was saved
   */
  async restoreSnapshot(): Promise<ConversionSession> {
    const snapshot = await this.store.loadSnapshot();
    if (!snapshot) {
      throw new ResourceNotFoundError('Snapshot', 'work-in-progress');
    }
    const session = ConversionSession.fromSnapshot(snapshot);
    this.sessions.set(session.id, session);
    logger.info('Session restored', { sessionId: session.id, sourceName: session.sourceName, savedAt: snapshot.savedAt });
    return session;
  }

  private async requireImportTemplate(id: string): Promise<ImportTemplate> {
    const template = await this.store.getImportTemplate(id);
    if (!template) {
      throw new ResourceNotFoundError('Import template', id);
    }
    return template;
  }
}
