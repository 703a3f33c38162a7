import { ScanAbortedError } from '@filewarden/shared';

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order. Once `signal` aborts no new item is started;
 * in-flight calls are awaited before the pool rejects with ScanAbortedError.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (signal?.aborted) {
    throw new ScanAbortedError();
  }

  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const drain = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) {
        throw new ScanAbortedError();
      }
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const size = Math.max(1, Math.min(concurrency, items.length));
  const settled = await Promise.allSettled(Array.from({ length: size }, () => drain()));

  const rejected = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
  if (rejected) {
    throw rejected.reason;
  }
  if (signal?.aborted) {
    throw new ScanAbortedError();
  }
  return results;
}
