/**
 * Bounded async task pool on p-limit.
 *
 * Each result lands in its item's slot, so the output order matches the
 * input order regardless of completion order.
 */
import pLimit from "p-limit";

export interface PoolOptions {
  /** Maximum tasks in flight (clamped to at least 1) */
  concurrency: number;
  /** Called after each task settles with the number of finished tasks */
  onProgress?: (done: number, total: number) => void;
}

/**
 * Run `task` over every item with at most `concurrency` tasks in flight.
 * Rejects with the first task error; items still queued at that point are dropped.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<R[]> {
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency) || 1));
  const total = items.length;
  let done = 0;

  return Promise.all(
    items.map((item, index) =>
      limit(async () => {
        let result: R;
        try {
          result = await task(item, index);
        } catch (error) {
          limit.clearQueue();
          throw error;
        }
        done++;
        options.onProgress?.(done, total);
        return result;
      })
    )
  );
}
