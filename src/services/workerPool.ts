/**
 * Bounded concurrency helper.
 *
 * Starts up to `concurrency` runners that pull the next index from a shared
 * cursor, so a slow item only holds up its own runner. Once `signal` is
 * aborted no further item is started; items already running are awaited.
 */

export interface PoolRunSummary {
  started: number;
  skipped: number;
}

export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<PoolRunSummary> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  let cursor = 0;
  let started = 0;

  const runner = async (): Promise<void> => {
    while (cursor < items.length) {
      if (signal?.aborted) return;
      const index = cursor++;
      started++;
      await task(items[index], index);
    }
  };

  const runners = Array.from({ length: Math.min(concurrency, items.length) }, () => runner());
  await Promise.all(runners);

  return { started, skipped: items.length - started };
}
