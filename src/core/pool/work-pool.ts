export type PoolResult<T, R> =
  | { item: T; success: true; value: R }
  | { item: T; success: false; error: Error };

export interface PoolOptions<T, R> {
  /** Once aborted, no further items are handed to workers. */
  signal?: AbortSignal;
  /** Called as each item settles, before the next item is taken. */
  onSettled?: (result: PoolResult<T, R>) => void;
}

/**
 * Runs `handler` over `items` with at most `maxConcurrency` in flight.
 * Results keep input order; items never dispatched because the signal
 * aborted are left out.
 */
export async function processPool<T, R>(
  items: T[],
  handler: (item: T) => Promise<R>,
  maxConcurrency: number,
  options: PoolOptions<T, R> = {},
): Promise<Array<PoolResult<T, R>>> {
  if (items.length === 0) {
    return [];
  }

  const { signal, onSettled } = options;
  const requestedConcurrency = Number.isFinite(maxConcurrency)
    ? Math.floor(maxConcurrency)
    : 1;
  const concurrency = Math.max(1, Math.min(requestedConcurrency, items.length));
  let nextIndex = 0;
  const results: Array<PoolResult<T, R> | undefined> = new Array(items.length);

  const worker = async (): Promise<void> => {
    while (true) {
      if (signal?.aborted) {
        return;
      }

      const currentIndex = nextIndex++;
      if (currentIndex >= items.length) {
        return;
      }

      const item = items[currentIndex];
      let result: PoolResult<T, R>;
      try {
        const value = await handler(item);
        result = { item, success: true, value };
      } catch (error) {
        const resolvedError =
          error instanceof Error ? error : new Error(String(error));
        result = { item, success: false, error: resolvedError };
      }

      results[currentIndex] = result;
      onSettled?.(result);
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));
  return results.filter(
    (result): result is PoolResult<T, R> => result !== undefined,
  );
}
