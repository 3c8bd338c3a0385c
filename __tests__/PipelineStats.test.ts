import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleProgressReporter } from '../src/common/ProgressReporter';
import { PipelineStats } from '../src/pipeline/PipelineStats';

describe('PipelineStats', () => {
  it('freezes counters once finished', () => {
    let t = Date.parse('2026-10-19T00:00:00Z');
    const stats = new PipelineStats(() => t);
    stats.record('collected', 12);
    t += 1000;

    const first = stats.finish();
    t += 1000;
    const second = stats.finish();

    expect(first).toMatchObject({ collected: 12, startedAt: '2026-10-19T00:00:00.000Z', endedAt: '2026-10-19T00:00:01.000Z' });
    expect(second.endedAt).toBe(first.endedAt);
    expect(stats.isFinished).toBe(true);
    expect(() => stats.record('final', 3)).toThrow('PipelineStats is frozen; cannot record final');
  });

  it('checks regulatory retention', () => {
    const stats = new PipelineStats();
    stats.record('regulatoryFound', 2);
    stats.record('regulatoryRetained', 1);
    expect(stats.regulatoryInvariantHolds).toBe(false);
    stats.record('regulatoryRetained', 2);
    expect(stats.regulatoryInvariantHolds).toBe(true);
  });
});

describe('ConsoleProgressReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints item progress with an outcome mark', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const reporter = new ConsoleProgressReporter();

    reporter.report({ type: 'item', stage: 'classify', index: 2, total: 5, title: 'Story', outcome: 'overridden', detail: 'regulation' });
    reporter.report({ type: 'dedup', stage: 'collect', before: 40, after: 34, method: 'embedding' });
    reporter.report({ type: 'warning', message: 'careful' });

    expect(log.mock.calls).toEqual([['[classify] [2/5] ⚖️ Story - regulation'], ['[collect] dedup (embedding): 40 → 34']]);
    expect(warn).toHaveBeenCalledWith('[pipeline] careful');
  });
});
