import { describe, expect, it } from 'vitest';
import { PipelineAbortedError } from '../src/common/errors';
import { mapWithConcurrency } from '../src/common/workerPool';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('mapWithConcurrency', () => {
  it('keeps input order and bounds the number of calls in flight', async () => {
    let active = 0;
    let peak = 0;
    const results = await mapWithConcurrency([5, 1, 4, 2, 3, 6, 7], 3, async (n) => {
      active++;
      peak = Math.max(peak, active);
      for (let i = 0; i < n; i++) await tick();
      active--;
      return n * 10;
    });

    expect(results).toEqual([50, 10, 40, 20, 30, 60, 70]);
    expect(peak).toBe(3);
  });

  it('returns an empty list for no items', async () => {
    await expect(mapWithConcurrency([], 4, async (n: number) => n)).resolves.toEqual([]);
  });

  it('stops starting items after a failure and rethrows it once in-flight calls finish', async () => {
    const started: number[] = [];
    const boom = new Error('boom');
    await expect(
      mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
        started.push(n);
        await tick();
        if (n === 2) throw boom;
        return n;
      })
    ).rejects.toBe(boom);

    expect(started).toEqual([1, 2, 3]);
  });

  it('stops admitting work when the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    await expect(
      mapWithConcurrency(
        [1, 2, 3, 4, 5],
        1,
        async (n) => {
          started.push(n);
          if (n === 2) controller.abort();
          await tick();
          return n;
        },
        controller.signal
      )
    ).rejects.toBeInstanceOf(PipelineAbortedError);

    expect(started).toEqual([1, 2]);
  });
});
