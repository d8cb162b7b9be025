// ═══════════════════════════════════════════════════════════════════════════════
// BATCH ORCHESTRATOR — Sequential Chunked Processing with All-or-Nothing Results
// ═══════════════════════════════════════════════════════════════════════════════
//
// Rows are split into contiguous chunks processed strictly one after another.
// Results are concatenated in chunk order, so result[i] belongs to rows[i].
// A failing chunk aborts the run: earlier results are discarded, later chunks
// are never called.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger, type ILogger } from '../../logging/index.js';
import { AlignmentError, BatchAbort } from '../errors.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Half-open row range [start, end) of one chunk.
 */
export interface BatchRange {
  readonly index: number;
  readonly start: number;
  readonly end: number;
}

/**
 * Progress emitted before each chunk of a multi-chunk run. Row numbers are 1-based, inclusive.
 */
export interface BatchProgress {
  readonly label: string;
  readonly current: number;
  readonly total: number;
  readonly startRow: number;
  readonly endRow: number;
  readonly totalRows: number;
}

export type ProgressListener = (progress: BatchProgress) => void;

export type ChunkProcessor<T, R> = (chunk: readonly T[], range: BatchRange) => Promise<readonly R[]>;

export interface BatchOrchestratorOptions {
  batchSize: number;
  onProgress?: ProgressListener;
  logger?: ILogger;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PLANNING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Partition [0, total) into contiguous ranges of at most batchSize rows.
 * @throws RangeError for a batch size that is not a positive integer
 */
export function planBatches(total: number, batchSize: number): BatchRange[] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const ranges: BatchRange[] = [];
  for (let start = 0, index = 0; start < total; start += batchSize, index++) {
    ranges.push({ index, start, end: Math.min(start + batchSize, total) });
  }
  return ranges;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ORCHESTRATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class BatchOrchestrator {
  readonly batchSize: number;
  private readonly onProgress?: ProgressListener;
  private readonly logger: ILogger;

  constructor(options: BatchOrchestratorOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
      throw new RangeError(`Batch size must be a positive integer, got ${options.batchSize}`);
    }
    this.batchSize = options.batchSize;
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? getLogger({ component: 'batch' });
  }

  async process<T, R>(rows: readonly T[], processChunk: ChunkProcessor<T, R>, label: string): Promise<R[]> {
    if (rows.length === 0) {
      return [];
    }

    // Whole set in one call; errors are the caller's to handle
    if (rows.length <= this.batchSize) {
      const result = await processChunk(rows, { index: 0, start: 0, end: rows.length });
      if (result.length !== rows.length) {
        throw new AlignmentError(rows.length, result.length);
      }
      return [...result];
    }

    const ranges = planBatches(rows.length, this.batchSize);
    const results: R[] = [];

    for (const range of ranges) {
      const progress: BatchProgress = {
        label,
        current: range.index + 1,
        total: ranges.length,
        startRow: range.start + 1,
        endRow: range.end,
        totalRows: rows.length,
      };
      this.onProgress?.(progress);
      this.logger.info(`${label}: processing batch ${progress.current}/${progress.total}`, {
        startRow: progress.startRow,
        endRow: progress.endRow,
        totalRows: progress.totalRows,
      });

      const chunk = rows.slice(range.start, range.end);
      try {
        const chunkResult = await processChunk(chunk, range);
        if (chunkResult.length !== chunk.length) {
          throw new AlignmentError(chunk.length, chunkResult.length);
        }
        results.push(...chunkResult);
      } catch (error) {
        const abort = new BatchAbort({
          label,
          chunkIndex: range.index,
          totalChunks: ranges.length,
          discardedResults: results.length,
          cause: error,
        });
        this.logger.error(`${label}: batch run aborted`, error, {
          chunk: range.index + 1,
          totalChunks: ranges.length,
          discardedResults: results.length,
        });
        throw abort;
      }
    }

    return results;
  }
}
