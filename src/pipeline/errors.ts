// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE ERRORS — Unrecoverable Responses and Aborted Batch Runs
// ═══════════════════════════════════════════════════════════════════════════════

import type { RepairStrategyName } from './normalizer/types.js';

const SNIPPET_LENGTH = 200;

/**
 * Error raised when no repair strategy recovered exactly the expected number of elements.
 */
export class UnparsableResponse extends Error {
  readonly name = 'UnparsableResponse';
  readonly code = 'UNPARSABLE_RESPONSE';

  /** First characters of the offending provider text */
  readonly snippet: string;

  readonly expectedCount: number;

  /** Element count of the closest attempt, or 0 when nothing parsed */
  readonly bestEffortCount: number;

  readonly strategies: readonly RepairStrategyName[];

  constructor(
    rawText: string,
    expectedCount: number,
    bestEffortCount: number,
    strategies: readonly RepairStrategyName[]
  ) {
    super(`Could not recover ${expectedCount} values from provider response (best effort: ${bestEffortCount})`);
    this.snippet = rawText.length > SNIPPET_LENGTH ? `${rawText.slice(0, SNIPPET_LENGTH)}…` : rawText;
    this.expectedCount = expectedCount;
    this.bestEffortCount = bestEffortCount;
    this.strategies = strategies;
  }
}

/**
 * Error raised when a chunk fails during a multi-chunk run.
 * Results of the chunks that completed before it are discarded.
 */
export class BatchAbort extends Error {
  readonly name = 'BatchAbort';
  readonly code = 'BATCH_ABORT';
  readonly label: string;

  /** Zero-based index of the failing chunk */
  readonly chunkIndex: number;

  readonly totalChunks: number;
  readonly completedChunks: number;
  readonly discardedResults: number;

  constructor(options: {
    label: string;
    chunkIndex: number;
    totalChunks: number;
    discardedResults: number;
    cause: unknown;
  }) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`${options.label}: chunk ${options.chunkIndex + 1} of ${options.totalChunks} failed: ${reason}`);
    this.label = options.label;
    this.chunkIndex = options.chunkIndex;
    this.totalChunks = options.totalChunks;
    this.completedChunks = options.chunkIndex;
    this.discardedResults = options.discardedResults;
    this.cause = options.cause;
  }
}

/**
 * Error raised when a step returns a result array whose length differs from its input.
 */
export class AlignmentError extends Error {
  readonly name = 'AlignmentError';
  readonly code = 'ALIGNMENT_ERROR';
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(`Result length ${received} does not match ${expected} input rows`);
    this.expected = expected;
    this.received = received;
  }
}
