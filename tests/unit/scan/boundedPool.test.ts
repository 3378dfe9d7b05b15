import { describe, it, expect } from '@jest/globals';
import { runBounded } from '../../../src/scan/boundedPool.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('runBounded', () => {
  it('should return results in item order', async () => {
    const results = await runBounded([30, 10, 20], 3, async (n) => {
      await new Promise<void>((resolve) => setTimeout(resolve, n));
      return n * 2;
    });

    expect(results).toEqual([60, 20, 40]);
  });

  it('should keep at most limit calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    await runBounded(Array.from({ length: 10 }, (_, i) => i), 4, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
    });

    expect(peak).toBe(4);
  });

  it('should pass the item index to the worker', async () => {
    const results = await runBounded(['a', 'b'], 2, async (item, index) => `${index}:${item}`);

    expect(results).toEqual(['0:a', '1:b']);
  });

  it('should leave items unstarted once shouldStart answers false', async () => {
    let started = 0;

    const results = await runBounded(
      [1, 2, 3, 4, 5],
      2,
      async (n) => {
        started++;
        await tick();
        return n;
      },
      () => started < 3
    );

    expect(results).toEqual([1, 2, 3, undefined, undefined]);
  });

  it('should treat an invalid limit as 1', async () => {
    let inFlight = 0;
    let peak = 0;

    await runBounded([1, 2, 3], Number.NaN, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
    });

    expect(peak).toBe(1);
  });

  it('should resolve empty for no items', async () => {
    expect(await runBounded([], 5, async () => 1)).toEqual([]);
  });
});
