export type PoolOutcome<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; error: unknown }
  | { item: T; status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
  onSettled?: (completed: number, total: number) => void;
}

/**
 * Runs `worker` over `items` with at most `concurrency` tasks in flight.
 * Never rejects: every item ends up fulfilled, rejected, or skipped (when the
 * signal aborted before it was started). Outcomes keep the input order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  options: PoolOptions
): Promise<PoolOutcome<T, R>[]> {
  const outcomes: PoolOutcome<T, R>[] = items.map((item) => ({ item, status: 'skipped' }));
  const limit = Math.max(1, Math.floor(options.concurrency));
  let next = 0;
  let settled = 0;

  async function lane(): Promise<void> {
    while (next < items.length && !options.signal?.aborted) {
      const index = next++;
      const item = items[index];
      try {
        outcomes[index] = { item, status: 'fulfilled', value: await worker(item) };
      } catch (error) {
        outcomes[index] = { item, status: 'rejected', error };
      }
      settled++;
      options.onSettled?.(settled, items.length);
    }
  }

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < Math.min(limit, items.length); i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);
  return outcomes;
}
