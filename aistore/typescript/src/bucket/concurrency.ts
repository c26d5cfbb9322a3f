/**
 * Bounded concurrency helper
 * @module aistore-client/bucket/concurrency
 */

/**
 * Maps items through an async function with at most `concurrency` calls in
 * flight, each worker taking the next unstarted item. Results keep the
 * input order; a rejection rejects the whole map.
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, worker);
  await Promise.all(workers);
  return results;
}
