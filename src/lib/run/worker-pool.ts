export interface PoolOutcome {
  /** Items handed to a worker */
  dispatched: number;
  /** Items never started because the signal aborted first */
  skipped: number;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Items beyond the bound wait for a free slot. Once `signal` aborts no new item
 * is dispatched; in-flight calls are awaited. `worker` is expected not to reject.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<PoolOutcome> {
  let index = 0;
  const slotCount = Math.max(1, Math.min(concurrency, items.length));
  const slots = new Array(slotCount).fill(null).map(async () => {
    while (index < items.length) {
      if (signal?.aborted) break;
      const current = index;
      index += 1;
      await worker(items[current], current);
    }
  });
  await Promise.all(slots);
  return { dispatched: index, skipped: items.length - index };
}
