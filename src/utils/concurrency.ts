import { CancelledError } from './errors.js';

/**
 * Map over items with at most `limit` calls in flight. Results keep the
 * input order regardless of completion order. The signal is checked before
 * each item is started.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const size = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));

  return results;
}
