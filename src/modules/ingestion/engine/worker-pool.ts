/**
 * Bounded parallelism in fixed-size waves.
 *
 * Each wave runs with Promise.allSettled so one slow item never strands its
 * siblings mid-flight; the first rejection of a wave is rethrown once the
 * wave settles. Cancellation is checked between waves.
 */

export interface PoolOptions {
  signal?: AbortSignal;
  /** Error thrown when the signal is aborted between waves. */
  cancelError?: () => Error;
}

export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions = {},
): Promise<R[]> {
  const results: R[] = [];
  const size = Math.max(1, Math.floor(limit));

  for (let i = 0; i < items.length; i += size) {
    if (options.signal?.aborted) {
      throw options.cancelError ? options.cancelError() : new Error('Aborted');
    }

    const wave = items.slice(i, i + size);
    const settled = await Promise.allSettled(
      wave.map((item, j) => worker(item, i + j)),
    );

    for (const r of settled) {
      if (r.status === 'rejected') throw r.reason;
      results.push(r.value);
    }
  }

  return results;
}
