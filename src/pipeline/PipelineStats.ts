import { StatsSnapshot } from '../types';

export type StatsCounter = Exclude<keyof StatsSnapshot, 'startedAt' | 'endedAt'>;

/** Per-run funnel counters. Frozen by `finish()`; one instance per run. */
export class PipelineStats {
  private readonly data: StatsSnapshot;
  private finished = false;

  constructor(private readonly now: () => number = Date.now) {
    this.data = {
      collected: 0,
      afterDedup1: 0,
      afterFilter: 0,
      afterDedup2: 0,
      afterValidation: 0,
      final: 0,
      regulatoryFound: 0,
      regulatoryRetained: 0,
      startedAt: new Date(this.now()).toISOString(),
    };
  }

  public get isFinished(): boolean {
    return this.finished;
  }

  public record(counter: StatsCounter, value: number): void {
    if (this.finished) {
      throw new Error(`PipelineStats is frozen; cannot record ${counter}`);
    }
    this.data[counter] = value;
  }

  /** Stamps the end time once and freezes the counters. Safe to call twice. */
  public finish(): StatsSnapshot {
    if (!this.finished) {
      this.data.endedAt = new Date(this.now()).toISOString();
      this.finished = true;
    }
    return this.snapshot();
  }

  public snapshot(): StatsSnapshot {
    return { ...this.data };
  }

  /** The retention invariant: every regulatory item found after dedup reaches the output. */
  public get regulatoryInvariantHolds(): boolean {
    return this.data.regulatoryRetained >= this.data.regulatoryFound;
  }
}
