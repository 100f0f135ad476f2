/**
 * Run an async mapper over items with bounded concurrency.
 *
 * Once the signal aborts, no further items are started; items already
 * started run to completion. Results for items never started are filled by
 * `onSkipped`.
 */
export async function pMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number,
  options: { signal?: AbortSignal; onSkipped?: (item: T, index: number) => R } = {}
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const started: boolean[] = new Array(items.length).fill(false);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length && !options.signal?.aborted) {
      const i = nextIndex++;
      started[i] = true;
      results[i] = await fn(items[i], i);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => worker());
  await Promise.all(workers);

  if (options.onSkipped) {
    for (let i = 0; i < items.length; i++) {
      if (!started[i]) {
        results[i] = options.onSkipped(items[i], i);
      }
    }
  }

  return results;
}
