export type PoolSlot<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

/**
 * Run `worker` over `items` with at most `limit` in flight. Once `signal`
 * aborts, no new item starts; items already running finish normally.
 * Slots line up with `items` regardless of completion order.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<Array<PoolSlot<R>>> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const slots: Array<PoolSlot<R>> = items.map((): PoolSlot<R> => ({ status: 'skipped' }));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      try {
        slots[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        slots[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, lane));
  return slots;
}
