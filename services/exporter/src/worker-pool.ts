/**
 * Fixed-size worker pool: each worker pulls from a shared queue until it is
 * empty. Results land in the slot matching the item's input position, so
 * every slot has exactly one writer and output order is independent of
 * completion order.
 *
 * Pool size is min(maxWorkers, items.length); an empty input starts no workers.
 * A maxWorkers that is not a finite number runs a single worker.
 */
export async function runWithWorkerPool<T, R>(
  items: readonly T[],
  maxWorkers: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Number.isFinite(maxWorkers) ? Math.max(1, Math.floor(maxWorkers)) : 1;
  const poolSize = Math.min(workers, items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: poolSize }, () => worker()));
  return results;
}
