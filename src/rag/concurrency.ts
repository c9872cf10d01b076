/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * After the first rejection no new items are started; the first error is
 * rethrown once the in-flight calls have settled.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let next = 0;
  const errors: unknown[] = [];

  const lanes = Array.from(
    { length: Math.max(1, Math.min(limit, items.length)) },
    async () => {
      while (errors.length === 0 && next < items.length) {
        const index = next++;
        const item = items[index];
        if (item === undefined) continue;
        try {
          await worker(item, index);
        } catch (error) {
          errors.push(error);
        }
      }
    },
  );

  await Promise.all(lanes);
  if (errors.length > 0) throw errors[0];
}
