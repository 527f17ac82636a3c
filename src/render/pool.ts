/**
 * Process items with a bounded number of concurrent workers. Results keep
 * the order of `items`, whatever order the workers finish in.
 */
export async function processPooled<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency = 4,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      const item = items[idx];
      if (item === undefined) continue;
      results[idx] = await processor(item, idx);
    }
  });

  await Promise.all(workers);
  return results;
}
