import { Clock, systemClock } from './clock';
import { PipelineAbortedError } from './errors';

const WINDOW_MS = 60_000;
const SAFETY_MARGIN_MS = 500;

/**
 * Sliding-window admission control for the judgment service.
 *
 * Callers are admitted strictly in call order: each `admit()` chains onto the
 * previous one, so the timestamp list is only ever touched by one pending
 * admission at a time. An aborted caller leaves the queue without being counted.
 */
export class RateLimiter {
  private admissions: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly requestsPerMinute: number,
    private readonly clock: Clock = systemClock,
    private readonly onWait?: (waitMs: number) => void
  ) {
    if (!Number.isFinite(requestsPerMinute) || requestsPerMinute < 1) {
      throw new RangeError(`requestsPerMinute must be >= 1, got ${requestsPerMinute}`);
    }
  }

  public admit(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.acquire(signal));
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /** Admissions recorded inside the trailing window (for diagnostics). */
  public get inFlightWindow(): number {
    this.prune(this.clock.now());
    return this.admissions.length;
  }

  private async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new PipelineAbortedError();
    const now = this.clock.now();
    this.prune(now);

    if (this.admissions.length >= this.requestsPerMinute) {
      const waitMs = this.admissions[0] + WINDOW_MS - now;
      if (waitMs > 0) {
        this.onWait?.(waitMs);
        await this.clock.sleep(waitMs + SAFETY_MARGIN_MS, signal);
        this.prune(this.clock.now());
      }
    }

    this.admissions.push(this.clock.now());
  }

  private prune(now: number): void {
    const cutoff = now - WINDOW_MS;
    this.admissions = this.admissions.filter((t) => t > cutoff);
  }
}

export function workerPoolSize(requestsPerMinute: number): number {
  return Math.max(1, Math.min(10, Math.floor(requestsPerMinute / 6)));
}
