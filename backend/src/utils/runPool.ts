/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Workers pick items in input order; callers that need ordered output should
 * write into the slot given by `index`.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  const size = items.length;
  if (size === 0) return;

  let cursor = 0;
  const limit = Math.max(1, Math.floor(concurrency));
  const runners: Promise<void>[] = [];

  for (let i = 0; i < Math.min(limit, size); i++) {
    runners.push((async function pump() {
      while (cursor < size) {
        const current = cursor++;
        await worker(items[current], current);
      }
    })());
  }

  await Promise.all(runners);
}
