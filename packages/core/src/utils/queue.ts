/**
 * Run async work items with a fixed concurrency limit.
 *
 * Every item is attempted: a rejected worker does not stop the others, and the
 * outcome of each item is returned in input order.
 */
export async function runWithConcurrency<TItem, TResult>(options: {
  items: readonly TItem[];
  concurrency: number;
  worker: (item: TItem, index: number) => Promise<TResult>;
  onProgress?: (info: { completed: number; total: number }) => void;
}): Promise<Array<PromiseSettledResult<TResult>>> {
  const entries = options.items.map((item, index) => ({ item, index }));
  const total = entries.length;
  const concurrency = Math.max(1, Math.floor(options.concurrency || 1));

  const results: Array<PromiseSettledResult<TResult>> = new Array(total);
  let completed = 0;

  const runOne = async (): Promise<void> => {
    for (let entry = entries.shift(); entry; entry = entries.shift()) {
      try {
        results[entry.index] = { status: 'fulfilled', value: await options.worker(entry.item, entry.index) };
      } catch (reason) {
        results[entry.index] = { status: 'rejected', reason };
      }

      completed += 1;
      options.onProgress?.({ completed, total });
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, total) }, () => runOne());
  await Promise.all(workers);
  return results;
}
