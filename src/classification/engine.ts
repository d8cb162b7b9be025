// ═══════════════════════════════════════════════════════════════════════════════
// RULE ENGINE — Shared Run Loop for Classification and Formula Engines
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each engine supplies items, a prompt, canonicalization and a deterministic
// local fallback. runEngine() drives either path and commits to the session
// only after the whole run succeeded; a failed run leaves the session as it was.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../logging/index.js';
import {
  BatchOrchestrator,
  DEFAULT_BATCH_SIZING,
  sizeBatch,
  type BatchProgress,
  type BatchSizingOptions,
} from '../pipeline/batching/index.js';
import { normalizeResponse } from '../pipeline/normalizer/index.js';
import type { TextProvider } from '../providers/types.js';
import type { ConversionSession } from '../conversion/session.js';
import type { EngineField, MappedRecord, UnitSystem } from '../types/records.js';
import type { FormulaTemplate, MappingHistoryEntry } from '../types/templates.js';

const logger = getLogger({ component: 'engine' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type EngineMode = 'ai' | 'local';

/**
 * Read-only inputs shared by every engine.
 */
export interface EngineContext {
  readonly unitSystem: UnitSystem;
  /** Labeled sample for the learned fallback layers */
  readonly history: readonly MappingHistoryEntry[];
  readonly templates: readonly FormulaTemplate[];
}

export interface RuleEngine<F extends EngineField, Item> {
  readonly task: F;
  /** Progress/log label */
  readonly label: string;
  /** Closed label set, absent for open output */
  readonly vocabulary?: readonly string[];
  readonly systemPrompt: string;

  toItems(session: ConversionSession): Item[];
  buildPrompt(items: readonly Item[], context: EngineContext): string;
  canonicalize(value: string, item: Item, context: EngineContext): MappedRecord[F];
  fallback(items: readonly Item[], context: EngineContext): MappedRecord[F][];
}

interface RunOptionsBase {
  context: EngineContext;
  batch?: BatchSizingOptions;
  onProgress?: (progress: BatchProgress) => void;
}

export type EngineRunOptions =
  | (RunOptionsBase & { mode: 'local' })
  | (RunOptionsBase & { mode: 'ai'; provider: TextProvider });

export interface EngineRunSummary<F extends EngineField> {
  readonly task: F;
  readonly mode: EngineMode;
  readonly values: MappedRecord[F][];
  /** Provider calls made (0 in local mode) */
  readonly chunks: number;
  readonly batchSize: number;
  readonly durationMs: number;
  /** Chunks whose response needed a repair beyond fence stripping */
  readonly repairedCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RUN
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Run one engine over a session and commit its field.
 * @throws SessionBusyError, ProviderCallFailed, UnparsableResponse, BatchAbort
 */
export async function runEngine<F extends EngineField, Item>(
  engine: RuleEngine<F, Item>,
  session: ConversionSession,
  options: EngineRunOptions
): Promise<EngineRunSummary<F>> {
  session.beginRun(engine.task);
  const start = Date.now();

  try {
    const items = engine.toItems(session);
    const { context } = options;

    if (options.mode === 'local') {
      const values = engine.fallback(items, context);
      session.commitField(engine.task, values);
      const summary: EngineRunSummary<F> = {
        task: engine.task,
        mode: 'local',
        values,
        chunks: 0,
        batchSize: items.length,
        durationMs: Date.now() - start,
        repairedCount: 0,
      };
      logger.info(`${engine.label}: local fallback applied`, { sessionId: session.id, rows: items.length });
      return summary;
    }

    const { provider } = options;
    const batchSize = sizeBatch(items, provider.contextWindow, options.batch ?? DEFAULT_BATCH_SIZING);
    const orchestrator = new BatchOrchestrator({
      batchSize,
      onProgress: (progress) => {
        session.recordProgress(progress);
        options.onProgress?.(progress);
      },
    });

    let chunks = 0;
    let repairedCount = 0;

    const values = await orchestrator.process(items, async (chunk) => {
      chunks++;
      const raw = await provider.invoke(engine.buildPrompt(chunk, context), engine.systemPrompt);
      const parsed = normalizeResponse(raw, chunk.length, { vocabulary: engine.vocabulary });
      if (!parsed.ok) {
        throw parsed.error;
      }
      if (parsed.value.strategy !== 'StripFences') {
        repairedCount++;
      }
      const labels = parsed.value.values;
      return chunk.map((item, index) => engine.canonicalize(labels[index] ?? '', item, context));
    }, engine.label);

    session.commitField(engine.task, values);

    const summary: EngineRunSummary<F> = {
      task: engine.task,
      mode: 'ai',
      values,
      chunks,
      batchSize,
      durationMs: Date.now() - start,
      repairedCount,
    };
    logger.info(`${engine.label}: AI results committed`, {
      sessionId: session.id,
      provider: provider.name,
      model: provider.model,
      rows: items.length,
      chunks,
      batchSize,
      repairedCount,
      durationMs: summary.durationMs,
    });
    return summary;
  } finally {
    session.endRun();
  }
}
