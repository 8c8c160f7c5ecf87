/**
 * Process items with a bounded number of concurrent workers.
 *
 * Results keep the input order. Once `signal` aborts no new item is started;
 * the slots of items never started stay `undefined`.
 */
export async function processPooled<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency = 1,
  signal?: AbortSignal,
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array(items.length).fill(undefined);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (nextIndex < items.length) {
      if (signal?.aborted) return;
      const idx = nextIndex++;
      results[idx] = await processor(items[idx], idx);
    }
  });

  await Promise.all(workers);
  return results;
}
