/**
 * Bounded Worker Pool
 *
 * Runs an async task over a list with at most `limit` tasks in flight.
 * Workers pull the next index from a shared cursor; results keep input order
 * and every task settles independently, so one failure never aborts the rest.
 */

/**
 * @param items - Inputs, processed in order of the shared cursor
 * @param limit - Maximum number of tasks in flight (at least 1)
 * @param task - Async work for one input
 * @returns One settled result per input, in input order
 *
 * @example
 * const settled = await mapSettled(urls, 8, (url) => fetchJson(url));
 * const ok = settled.flatMap((r) => (r.status === 'fulfilled' ? [r.value] : []));
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        results[index] = { status: 'fulfilled', value: await task(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
