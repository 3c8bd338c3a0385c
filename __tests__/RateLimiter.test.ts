import { describe, expect, it } from 'vitest';
import { Clock, systemClock } from '../src/common/clock';
import { PipelineAbortedError } from '../src/common/errors';
import { RateLimiter, workerPoolSize } from '../src/common/RateLimiter';
import { FakeClock } from './fakes';

/** A clock whose sleeps only end by abort. */
const stalledClock: Clock = {
  now: () => 0,
  sleep: (_ms, signal) =>
    new Promise((_resolve, reject) => {
      signal?.addEventListener('abort', () => reject(new PipelineAbortedError()), { once: true });
    }),
};

describe('RateLimiter', () => {
  it('admits up to N calls immediately, then waits for the window plus the safety margin', async () => {
    const clock = new FakeClock();
    const waits: number[] = [];
    const limiter = new RateLimiter(3, clock, (ms) => waits.push(ms));

    const admittedAt = await Promise.all(
      Array.from({ length: 7 }, async () => {
        await limiter.admit();
        return clock.now();
      })
    );

    expect(admittedAt).toEqual([0, 0, 0, 60_500, 60_500, 60_500, 121_000]);
    expect(waits).toEqual([60_000, 60_000]);
    expect(clock.sleeps).toEqual([60_500, 60_500]);
  });

  it('never admits more than N calls inside any trailing 60 second window', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(5, clock);
    const admittedAt: number[] = [];

    await Promise.all(
      Array.from({ length: 23 }, async (_, i) => {
        if (i % 4 === 0) clock.advance(7_000);
        await limiter.admit();
        admittedAt.push(clock.now());
      })
    );

    for (const t of admittedAt) {
      const inWindow = admittedAt.filter((u) => u > t - 60_000 && u <= t).length;
      expect(inWindow).toBeLessThanOrEqual(5);
    }
    expect(admittedAt).toHaveLength(23);
  });

  it('forgets admissions older than the window', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(2, clock);
    await limiter.admit();
    await limiter.admit();
    expect(limiter.inFlightWindow).toBe(2);

    clock.advance(60_001);
    expect(limiter.inFlightWindow).toBe(0);
    await limiter.admit();
    expect(clock.sleeps).toEqual([]);
  });

  it('stops a caller waiting for the window as soon as its signal aborts', async () => {
    const waits: number[] = [];
    const limiter = new RateLimiter(1, stalledClock, (ms) => waits.push(ms));
    const controller = new AbortController();
    await limiter.admit();

    const waiting = limiter.admit(controller.signal);
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(waits).toEqual([60_000]);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(PipelineAbortedError);
    expect(limiter.inFlightWindow).toBe(1);
  });

  it('rejects an already aborted caller without sleeping', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1, clock);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.admit(controller.signal)).rejects.toBeInstanceOf(PipelineAbortedError);
    await limiter.admit();
    expect(clock.sleeps).toEqual([]);
    expect(limiter.inFlightWindow).toBe(1);
  });

  it('rejects a rate below one per minute', () => {
    expect(() => new RateLimiter(0)).toThrow(RangeError);
  });

  it('sizes the worker pool from the rate limit', () => {
    expect(workerPoolSize(60)).toBe(10);
    expect(workerPoolSize(1000)).toBe(10);
    expect(workerPoolSize(30)).toBe(5);
    expect(workerPoolSize(5)).toBe(1);
  });
});

describe('systemClock.sleep', () => {
  it('rejects and clears its timer when the signal aborts', async () => {
    const controller = new AbortController();
    const sleeping = systemClock.sleep(60_000, controller.signal);
    controller.abort();
    await expect(sleeping).rejects.toBeInstanceOf(PipelineAbortedError);
  });
});
