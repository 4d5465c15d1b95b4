import { describe, expect, it } from 'vitest';

import { runWithConcurrency } from './queue.js';

describe('runWithConcurrency', () => {
  it('does not exceed the configured concurrency', async () => {
    const items = Array.from({ length: 10 }, (_, i) => i);

    let active = 0;
    let maxActive = 0;

    const results = await runWithConcurrency({
      items,
      concurrency: 3,
      worker: async (i) => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        await new Promise((r) => setTimeout(r, 10));
        active -= 1;
        return i * 2;
      },
    });

    expect(maxActive).toBe(3);
    expect(results.map((r) => (r.status === 'fulfilled' ? r.value : null))).toEqual([
      0, 2, 4, 6, 8, 10, 12, 14, 16, 18,
    ]);
  });

  it('keeps going after a worker rejects', async () => {
    const progress: number[] = [];
    const results = await runWithConcurrency({
      items: ['a', 'b', 'c'],
      concurrency: 2,
      worker: async (item) => {
        if (item === 'b') throw new Error('boom');
        return item.toUpperCase();
      },
      onProgress: ({ completed }) => progress.push(completed),
    });

    expect(results[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(results[1]?.status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 'C' });
    expect(progress).toEqual([1, 2, 3]);
  });

  it('returns an empty list for no items', async () => {
    const results = await runWithConcurrency({ items: [], concurrency: 4, worker: async () => 1 });
    expect(results).toEqual([]);
  });
});
