import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../../../src/utils/concurrency';

describe('mapWithConcurrency', () => {
  it('should keep input order regardless of completion order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (delay, index) => {
      await new Promise<void>((resolve) => setTimeout(() => resolve(), delay));
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('should never exceed the limit', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise<void>((resolve) => setTimeout(() => resolve(), 1));
      active--;
    });

    expect(peak).toBe(2);
  });

  it('should handle empty input and invalid limits', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
    expect(await mapWithConcurrency([1, 2], 0, async (n) => n * 2)).toEqual([2, 4]);
  });
});
