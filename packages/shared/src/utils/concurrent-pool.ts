/**
 * Progress notification fired after each item settles.
 */
export interface PoolProgress {
  /** Index of the item that just completed */
  index: number;
  /** Items completed so far, including this one */
  completed: number;
  /** Total number of items in the run */
  total: number;
}

/**
 * ConcurrentPool - bounded worker pool for async page work.
 *
 * Keeps up to N workers busy; a worker that finishes an item immediately
 * pulls the next one from the shared cursor. Results keep input order.
 * A rejected `processFn` rejects the whole run, so callers that need
 * per-item outcomes return a result union instead of throwing.
 */
export class ConcurrentPool {
  /**
   * @param concurrency - Maximum simultaneous workers (values below 1 run serially)
   * @param onItemComplete - Fired with each result as soon as it is available
   * @returns Results in the same order as `items`
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, progress: PoolProgress) => void,
  ): Promise<R[]> {
    const results: R[] = new Array(items.length);
    const workerCount = Math.min(
      Math.max(1, Math.floor(concurrency) || 1),
      items.length,
    );
    let nextIndex = 0;
    let completed = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length) {
        const index = nextIndex++;
        const result = await processFn(items[index], index);
        results[index] = result;
        completed++;
        onItemComplete?.(result, { index, completed, total: items.length });
      }
    }

    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }
}
