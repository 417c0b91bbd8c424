/**
 * Concurrency Utilities
 * @module utils/concurrency
 */

export interface ParallelOptions {
  /** Number of workers */
  concurrency: number;
  /** Workers finish their current item and take no new one once aborted */
  signal?: AbortSignal;
}

/**
 * Run `operation` over a lazily produced sequence with a bounded number of
 * workers pulling from one shared iterator. Resolves once every worker has
 * stopped; rejects with the first operation error after all workers settle.
 */
export async function forEachWithLimit<T>(
  items: AsyncIterable<T>,
  operation: (item: T, index: number) => Promise<void>,
  options: ParallelOptions
): Promise<void> {
  const iterator = items[Symbol.asyncIterator]();
  const { signal } = options;
  let nextIndex = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && !signal?.aborted) {
      const next = await iterator.next();
      if (next.done) return;

      const index = nextIndex++;
      try {
        await operation(next.value, index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, options.concurrency) }, () => worker());
  const settled = await Promise.allSettled(workers);

  if (failed || signal?.aborted) {
    await iterator.return?.();
  }

  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }
}
