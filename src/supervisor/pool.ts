/**
 * Run `task` over `items` with at most `limit` in flight.
 *
 * Exactly min(limit, items.length) consumers pull indexes off a shared
 * queue until it is empty. Results keep the order of `items` regardless of
 * completion order. A rejected task rejects the whole call once every
 * consumer has stopped; callers that need per-item failures should resolve
 * them as values (the executor does).
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const consume = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await task(items[index], index);
    }
  };

  const consumers = Array.from({ length: Math.min(limit, items.length) }, () => consume());
  const settled = await Promise.allSettled(consumers);
  const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
  if (failure) {
    throw failure.reason;
  }
  return results;
}
