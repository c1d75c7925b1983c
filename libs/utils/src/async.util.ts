export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Maps items through an async worker, running at most `limit` workers at a
 * time (one when `limit` is NaN). Results keep the input
 * order; a rejected item does not stop the rest.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = [];
  let cursor = 0;

  const run = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = {
          status: 'fulfilled',
          value: await worker(items[index], index),
        };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const bounded = Number.isNaN(limit) ? 1 : Math.floor(limit);
  const workers = Math.max(1, Math.min(bounded, items.length));
  await Promise.all(Array.from({ length: workers }, () => run()));

  return results;
}
