/**
 * Worker Pool
 * Runs async tasks over a shared queue with a fixed number of workers
 */

export type PoolOutcome<R> =
  | { ok: true; value: R }
  | { ok: false; error: unknown };

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal; // Stops dequeuing; in-flight tasks still settle
}

/**
 * Process every item with at most `concurrency` tasks in flight
 *
 * Outcomes are keyed by item index, not completion order. A task that
 * throws yields an `ok: false` outcome and its worker moves on to the next
 * item. Items never dequeued because the signal fired have no entry.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<Map<number, PoolOutcome<R>>> {
  const { concurrency, signal } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
  }

  const outcomes = new Map<number, PoolOutcome<R>>();
  let cursor = 0;

  async function worker(): Promise<void> {
    while (cursor < items.length && !signal?.aborted) {
      const index = cursor++;
      try {
        const value = await task(items[index], index);
        outcomes.set(index, { ok: true, value });
      } catch (error) {
        outcomes.set(index, { ok: false, error });
      }
    }
  }

  const size = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: size }, () => worker()));

  return outcomes;
}
