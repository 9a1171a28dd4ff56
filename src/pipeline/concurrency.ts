/**
 * Bounded async map used to fan pipelines out over many files.
 *
 * Workers pull from one shared iterator, so at most `limit` tasks are in
 * flight and each result lands at its input index. Once a task throws no
 * new task starts; the call rejects with the first error after the tasks
 * already in flight have settled.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  const queue = items.entries();
  let failure: { error: unknown } | undefined;

  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      if (failure) return;
      try {
        results[index] = await task(item, index);
      } catch (error) {
        if (!failure) failure = { error };
      }
    }
  };

  // NaN and anything below one still get a single worker
  const width = Math.min(items.length, limit >= 1 ? Math.floor(limit) : 1);
  await Promise.all(Array.from({ length: width }, worker));
  if (failure) throw failure.error;
  return results;
}
