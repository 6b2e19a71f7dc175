/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results keep the input order; a rejected call rejects the whole run,
 * so workers are expected to handle their own failures.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;

  const lanes = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (cursor < items.length) {
      const index = cursor++;
      results[index] = await worker(items[index], index);
    }
  });

  await Promise.all(lanes);
  return results;
}
