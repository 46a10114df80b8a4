export interface SettleOptions<R> {
  /** Maximum in-flight tasks; 0 or less means unbounded. */
  concurrency?: number;
  /** Converts a rejected task into a result for its slot. */
  onError: (error: unknown, index: number) => R;
}

/**
 * Runs `task` over every item with bounded concurrency and returns the
 * results in input order, whatever order they settle in.
 */
export async function settleInOrder<I, R>(
  items: readonly I[],
  task: (item: I, index: number) => Promise<R>,
  options: SettleOptions<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const limit = options.concurrency && options.concurrency > 0
    ? Math.min(options.concurrency, items.length)
    : items.length;
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = await task(items[index], index);
      } catch (error) {
        results[index] = options.onError(error, index);
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < limit; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
