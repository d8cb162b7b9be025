import { describe, it, expect, vi } from 'vitest';
import { AlignmentError, BatchAbort } from '../../errors.js';
import { BatchOrchestrator, planBatches, type BatchProgress, type BatchRange } from '../orchestrator.js';

const rowsOf = (count: number): number[] => Array.from({ length: count }, (_, i) => i);

describe('planBatches', () => {
  it('should partition rows contiguously without gaps or overlaps', () => {
    for (let total = 0; total <= 250; total += 7) {
      for (const size of [1, 3, 10, 49, 50, 100, 120]) {
        const ranges = planBatches(total, size);
        const covered = ranges.flatMap((range) => rowsOf(range.end - range.start).map((i) => range.start + i));

        expect(covered).toEqual(rowsOf(total));
        ranges.forEach((range, index) => {
          expect(range.index).toBe(index);
          expect(range.end - range.start).toBeGreaterThan(0);
          expect(range.end - range.start).toBeLessThanOrEqual(size);
        });
      }
    }
  });

  it('should return no ranges for no rows', () => {
    expect(planBatches(0, 10)).toEqual([]);
  });

  it('should reject non-positive batch sizes', () => {
    expect(() => planBatches(10, 0)).toThrow(RangeError);
    expect(() => planBatches(10, 2.5)).toThrow(RangeError);
  });
});

describe('BatchOrchestrator', () => {
  it('should not call the processor for empty input', async () => {
    const processChunk = vi.fn(async (chunk: readonly number[]) => chunk.map(String));
    const orchestrator = new BatchOrchestrator({ batchSize: 50 });

    expect(await orchestrator.process([], processChunk, 'Cost types')).toEqual([]);
    expect(processChunk).not.toHaveBeenCalled();
  });

  it('should process a set within the batch size in one call', async () => {
    const onProgress = vi.fn();
    const processChunk = vi.fn(async (chunk: readonly number[]) => chunk.map((row) => row * 2));
    const orchestrator = new BatchOrchestrator({ batchSize: 50, onProgress });

    const result = await orchestrator.process(rowsOf(50), processChunk, 'Cost types');

    expect(processChunk).toHaveBeenCalledTimes(1);
    expect(result).toEqual(rowsOf(50).map((row) => row * 2));
    expect(onProgress).not.toHaveBeenCalled();
  });

  it('should let single-call errors propagate unwrapped', async () => {
    const failure = new Error('provider down');
    const orchestrator = new BatchOrchestrator({ batchSize: 50 });

    await expect(orchestrator.process(rowsOf(10), async () => { throw failure; }, 'Formulas'))
      .rejects.toBe(failure);
  });

  it('should reject a misaligned single-call result', async () => {
    const orchestrator = new BatchOrchestrator({ batchSize: 50 });

    await expect(orchestrator.process(rowsOf(3), async () => ['a', 'b'], 'Formulas'))
      .rejects.toBeInstanceOf(AlignmentError);
  });

  it('should process 120 rows as chunks of 50, 50 and 20 in order', async () => {
    const seen: BatchRange[] = [];
    const progress: BatchProgress[] = [];
    const orchestrator = new BatchOrchestrator({ batchSize: 50, onProgress: (event) => progress.push(event) });

    const result = await orchestrator.process(
      rowsOf(120),
      async (chunk, range) => {
        seen.push(range);
        return chunk.map((row) => `chunk${range.index + 1}:row${row}`);
      },
      'Takeoff types'
    );

    expect(seen).toEqual([
      { index: 0, start: 0, end: 50 },
      { index: 1, start: 50, end: 100 },
      { index: 2, start: 100, end: 120 },
    ]);
    expect(result).toHaveLength(120);
    expect(result[0]).toBe('chunk1:row0');
    expect(result[50]).toBe('chunk2:row50');
    expect(result[119]).toBe('chunk3:row119');
    expect(progress).toEqual([
      { label: 'Takeoff types', current: 1, total: 3, startRow: 1, endRow: 50, totalRows: 120 },
      { label: 'Takeoff types', current: 2, total: 3, startRow: 51, endRow: 100, totalRows: 120 },
      { label: 'Takeoff types', current: 3, total: 3, startRow: 101, endRow: 120, totalRows: 120 },
    ]);
  });

  it('should never run two chunks at once', async () => {
    let active = 0;
    let maxActive = 0;
    const orchestrator = new BatchOrchestrator({ batchSize: 10 });

    await orchestrator.process(rowsOf(45), async (chunk) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active--;
      return chunk;
    }, 'Formulas');

    expect(maxActive).toBe(1);
  });

  it('should abort on a failing chunk and skip the rest', async () => {
    const failure = new Error('timeout');
    const processChunk = vi.fn(async (chunk: readonly number[], range: BatchRange) => {
      if (range.index === 1) throw failure;
      return chunk.map(String);
    });
    const orchestrator = new BatchOrchestrator({ batchSize: 50 });

    const error = await orchestrator.process(rowsOf(120), processChunk, 'Cost types').catch((caught: unknown) => caught);

    expect(processChunk).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(BatchAbort);
    if (error instanceof BatchAbort) {
      expect(error.label).toBe('Cost types');
      expect(error.chunkIndex).toBe(1);
      expect(error.totalChunks).toBe(3);
      expect(error.completedChunks).toBe(1);
      expect(error.discardedResults).toBe(50);
      expect(error.cause).toBe(failure);
      expect(error.message).toBe('Cost types: chunk 2 of 3 failed: timeout');
    }
  });

  it('should abort when a chunk result is misaligned', async () => {
    const orchestrator = new BatchOrchestrator({ batchSize: 10 });

    const error = await orchestrator
      .process(rowsOf(25), async (chunk, range) => (range.index === 2 ? chunk.slice(1) : chunk), 'Formulas')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BatchAbort);
    if (error instanceof BatchAbort) {
      expect(error.chunkIndex).toBe(2);
      expect(error.discardedResults).toBe(20);
      expect(error.cause).toBeInstanceOf(AlignmentError);
    }
  });

  it('should reject a non-positive batch size', () => {
    expect(() => new BatchOrchestrator({ batchSize: 0 })).toThrow(RangeError);
  });
});
