/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * A limit of 0 (or one at least as large as the input) starts everything at once.
 * Results keep the order of `items`; a rejecting worker rejects the whole pool,
 * so workers that must not abort the batch should resolve with their failure.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const slots = limit <= 0 ? items.length : Math.min(limit, items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: slots }, lane));
  return results;
}
