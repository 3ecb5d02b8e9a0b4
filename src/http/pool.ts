/**
 * Bounded worker pool
 */

/**
 * Map items through `fn` with at most `limit` calls in flight.
 * Results come back in input order, not completion order.
 *
 * When a call rejects, no further items start; calls already running
 * settle before the first rejection is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.min(Math.max(1, Math.floor(limit)), items.length);
  let cursor = 0;
  const state: { failure?: { error: unknown } } = {};

  const worker = async (): Promise<void> => {
    while (!state.failure && cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (state.failure) {
    throw state.failure.error;
  }

  return results;
}
