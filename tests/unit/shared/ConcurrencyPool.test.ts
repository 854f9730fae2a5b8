import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../../../src/shared/ConcurrencyPool.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('should keep results in input order', async () => {
    const results = await mapWithConcurrency([30, 5, 15, 1], 2, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });
    expect(results).toEqual(['0:30', '1:5', '2:15', '3:1']);
  });

  it('should never exceed the concurrency limit', async () => {
    let running = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    });

    expect(peak).toBe(3);
  });

  it('should return an empty array for no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should treat a limit below 1 as 1', async () => {
    const results = await mapWithConcurrency(['a', 'b'], 0, async (item) => item.toUpperCase());
    expect(results).toEqual(['A', 'B']);
  });
});
