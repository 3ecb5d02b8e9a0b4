/**
 * Worker pool tests
 */

import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from './pool.js';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('should return results in input order', async () => {
    const results = await mapWithConcurrency([30, 5, 20, 1], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1']);
  });

  it('should keep at most limit calls in flight', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 2, async item => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(2);
      inFlight--;
      return item;
    });

    expect(maxInFlight).toBe(2);
  });

  it('should handle an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async item => item)).resolves.toEqual([]);
  });

  it('should propagate the first failure and start no more items', async () => {
    const started: number[] = [];
    const items = Array.from({ length: 10 }, (_, i) => i);

    await expect(
      mapWithConcurrency(items, 2, async item => {
        started.push(item);
        await delay(1);
        if (item === 1) throw new Error('boom');
        return item;
      })
    ).rejects.toThrow('boom');

    expect(started.length).toBeLessThan(items.length);
  });
});
