import { describe, it, expect } from 'vitest';
import { processPool, type PoolResult } from './work-pool';

describe('processPool', () => {
  it('should process all items', async () => {
    const results: number[] = [];
    await processPool(
      [1, 2, 3, 4, 5],
      async (item) => {
        results.push(item);
      },
      3,
    );
    expect(results.sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('should handle empty items', async () => {
    const results = await processPool([], async (item: number) => item, 3);
    expect(results).toEqual([]);
  });

  it('should respect max concurrency', async () => {
    let activeTasks = 0;
    let maxActive = 0;

    await processPool(
      [1, 2, 3, 4, 5, 6],
      async () => {
        activeTasks++;
        maxActive = Math.max(maxActive, activeTasks);
        await new Promise((resolve) => setTimeout(resolve, 10));
        activeTasks--;
      },
      2,
    );

    expect(maxActive).toBe(2);
  });

  it('should return results in input order with explicit failures', async () => {
    const results = await processPool(
      [1, 2, 3],
      async (item) => {
        if (item === 2) {
          throw new Error('test error');
        }
        await new Promise((resolve) => setTimeout(resolve, 10 * (4 - item)));
        return item * 10;
      },
      3,
    );

    expect(results.map((result) => result.item)).toEqual([1, 2, 3]);
    expect(results[0]).toEqual({ item: 1, success: true, value: 10 });
    expect(results[1].success).toBe(false);
    if (!results[1].success) {
      expect(results[1].error.message).toBe('test error');
    }
    expect(results[2]).toEqual({ item: 3, success: true, value: 30 });
  });

  it('should wrap non-Error rejections', async () => {
    const results = await processPool(
      ['a'],
      async () => {
        throw 'plain string';
      },
      1,
    );

    expect(results[0].success).toBe(false);
    if (!results[0].success) {
      expect(results[0].error).toBeInstanceOf(Error);
      expect(results[0].error.message).toBe('plain string');
    }
  });

  it('should fallback to one worker for invalid concurrency', async () => {
    const processed: number[] = [];

    await processPool(
      [1, 2, 3],
      async (item) => {
        processed.push(item);
      },
      0,
    );

    expect(processed).toEqual([1, 2, 3]);
  });

  it('should report each item as it settles', async () => {
    const settled: Array<PoolResult<number, number>> = [];

    await processPool([1, 2], async (item) => item + 1, 1, {
      onSettled: (result) => settled.push(result),
    });

    expect(settled).toEqual([
      { item: 1, success: true, value: 2 },
      { item: 2, success: true, value: 3 },
    ]);
  });

  it('should stop dispatching once the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];

    const results = await processPool(
      [1, 2, 3, 4],
      async (item) => {
        started.push(item);
        if (item === 2) {
          controller.abort();
        }
        return item;
      },
      1,
      { signal: controller.signal },
    );

    expect(started).toEqual([1, 2]);
    expect(results.map((result) => result.item)).toEqual([1, 2]);
  });

  it('should dispatch nothing when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    const results = await processPool(
      [1, 2],
      async () => {
        calls++;
      },
      2,
      { signal: controller.signal },
    );

    expect(calls).toBe(0);
    expect(results).toEqual([]);
  });
});
