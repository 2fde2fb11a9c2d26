/**
 * Maps `items` through `asyncMapper` with at most `limit` calls in flight.
 * Results keep input order. Once `signal` aborts, no new item is started and
 * the abort reason is thrown after in-flight calls settle.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  asyncMapper: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (limit < 1) {
    throw new Error("mapLimit requires limit >= 1");
  }

  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (!signal?.aborted) {
      const currentIndex = nextIndex;
      nextIndex += 1;
      if (currentIndex >= items.length) {
        return;
      }
      results[currentIndex] = await asyncMapper(items[currentIndex], currentIndex);
    }
  }

  const workerCount = Math.min(limit, items.length);
  const workers = Array.from({ length: workerCount }, () => worker());
  await Promise.all(workers);
  signal?.throwIfAborted();
  return results;
}
