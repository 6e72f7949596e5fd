/**
 * Run `task` for every item of an async sequence with at most `limit` tasks in flight.
 * Workers pull from one shared iterator, so the sequence is consumed lazily.
 *
 * The first task that throws stops every worker from pulling further items;
 * tasks already running are awaited and the error is rethrown.
 */
export async function forEachConcurrent<T>(
  items: AsyncIterable<T>,
  limit: number,
  task: (item: T) => Promise<void>,
): Promise<void> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const iterator = items[Symbol.asyncIterator]();
  const state: { failed: boolean; error: unknown } = { failed: false, error: undefined };

  async function worker(): Promise<void> {
    while (!state.failed) {
      try {
        const next = await iterator.next();
        if (next.done || state.failed) return;
        await task(next.value);
      } catch (error) {
        if (!state.failed) {
          state.failed = true;
          state.error = error;
        }
      }
    }
  }

  await Promise.all(Array.from({ length: limit }, () => worker()));

  if (state.failed) {
    await iterator.return?.();
    throw state.error;
  }
}
