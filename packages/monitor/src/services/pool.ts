/**
 * Runs `worker` over `items` with at most `limit` calls in flight. A rejected
 * worker stops its own lane; the first rejection is rethrown once the other
 * lanes have drained.
 */
export async function mapWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let next = 0;
  const lanes = Math.max(1, Math.min(limit, items.length));

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next++];
      await worker(item);
    }
  };

  const results = await Promise.allSettled(Array.from({ length: lanes }, runLane));
  const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (failed) throw failed.reason;
}
