/**
* Maps `items` through `fn` with at most `concurrency` calls in flight. Results keep input order.
*
* A rejection from `fn` rejects the whole call; per-item failures that should not stop the run
* must be caught inside `fn`.
*/
export async function mapWithConcurrency<TIn, TOut>(
  items: readonly TIn[],
  concurrency: number,
  fn: (item: TIn) => Promise<TOut>
): Promise<TOut[]> {
  if (!Number.isFinite(concurrency)) {
    throw new Error(`Invalid concurrency: ${concurrency}`);
  }

  const max = Math.max(1, Math.floor(concurrency));
  const results: TOut[] = new Array(items.length);
  const queue = items.map((item, index) => ({ item, index }));

  async function worker(): Promise<void> {
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      results[next.index] = await fn(next.item);
    }
  }

  await Promise.all(Array.from({ length: Math.min(max, items.length) }, () => worker()));
  return results;
}
