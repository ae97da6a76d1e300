// src/utils/pool.ts

/**
 * Runs `worker` over `items` with at most `width` calls in flight. Each worker returns its
 * result; the pool collects them in input order, so no worker writes shared state.
 * A rejected worker rejects the whole pool once the in-flight calls have settled.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  width: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const lanes = Math.max(1, Math.min(Math.floor(width) || 1, items.length));
  let next = 0;
  const failures: unknown[] = [];

  const lane = async () => {
    while (failures.length === 0 && next < items.length) {
      const idx = next++;
      try {
        results[idx] = await worker(items[idx], idx);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: lanes }, lane));
  if (failures.length) throw failures[0];
  return results;
}
