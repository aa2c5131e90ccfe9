import { describe, expect, test, vi } from 'vitest';

import { ConcurrentPool } from './concurrent-pool';

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('ConcurrentPool', () => {
  describe('run', () => {
    test('returns results in input order', async () => {
      const results = await ConcurrentPool.run([4, 8, 12], 2, async (page) => {
        await delay(page === 4 ? 15 : 1);
        return `page-${page}`;
      });

      expect(results).toEqual(['page-4', 'page-8', 'page-12']);
    });

    test('returns an empty array without calling processFn', async () => {
      const processFn = vi.fn(async (item: number) => item);

      const results = await ConcurrentPool.run([], 3, processFn);

      expect(results).toEqual([]);
      expect(processFn).not.toHaveBeenCalled();
    });

    test('never runs more workers than the concurrency limit', async () => {
      let active = 0;
      let peak = 0;
      const items = Array.from({ length: 9 }, (_, i) => i);

      await ConcurrentPool.run(items, 3, async (item) => {
        active++;
        peak = Math.max(peak, active);
        await delay(5);
        active--;
        return item;
      });

      expect(peak).toBe(3);
    });

    test('runs serially when concurrency is below one', async () => {
      let active = 0;
      let peak = 0;

      await ConcurrentPool.run([1, 2, 3], 0, async (item) => {
        active++;
        peak = Math.max(peak, active);
        await delay(2);
        active--;
        return item;
      });

      expect(peak).toBe(1);
    });

    test('passes the item index to processFn', async () => {
      const results = await ConcurrentPool.run(
        ['a', 'b'],
        2,
        async (item, index) => `${index}:${item}`,
      );

      expect(results).toEqual(['0:a', '1:b']);
    });

    test('reports progress after each item', async () => {
      const onItemComplete = vi.fn();

      await ConcurrentPool.run(
        ['x', 'y', 'z'],
        1,
        async (item) => item.toUpperCase(),
        onItemComplete,
      );

      expect(onItemComplete).toHaveBeenCalledTimes(3);
      expect(onItemComplete).toHaveBeenNthCalledWith(1, 'X', {
        index: 0,
        completed: 1,
        total: 3,
      });
      expect(onItemComplete).toHaveBeenNthCalledWith(3, 'Z', {
        index: 2,
        completed: 3,
        total: 3,
      });
    });

    test('rejects when processFn rejects', async () => {
      await expect(
        ConcurrentPool.run([1, 2], 2, async (item) => {
          if (item === 2) throw new Error('render failed');
          return item;
        }),
      ).rejects.toThrow('render failed');
    });
  });
});
