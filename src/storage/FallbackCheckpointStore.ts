import { errorMessage } from '../common/errors';
import { ProgressReporter, silentReporter } from '../common/ProgressReporter';
import { CheckpointRecord } from '../types';
import { CheckpointStore } from './CheckpointStore';

/**
 * Primary store backed by a secondary copy. Writes go to both and fail only
 * when both fail; reads fall back when the primary is absent or unreachable.
 */
export class FallbackCheckpointStore implements CheckpointStore {
  public readonly name: string;

  constructor(
    private readonly primary: CheckpointStore,
    private readonly secondary: CheckpointStore,
    private readonly reporter: ProgressReporter = silentReporter
  ) {
    this.name = `${primary.name}+${secondary.name}`;
  }

  public async write(record: CheckpointRecord): Promise<string> {
    const [first, second] = await Promise.allSettled([this.primary.write(record), this.secondary.write(record)]);
    if (first.status === 'rejected') {
      this.warn(`${this.primary.name} write failed: ${errorMessage(first.reason)}`);
    }
    if (second.status === 'rejected') {
      this.warn(`${this.secondary.name} write failed: ${errorMessage(second.reason)}`);
    }
    if (first.status === 'fulfilled') return first.value;
    if (second.status === 'fulfilled') return second.value;
    throw new Error(`Checkpoint write failed on both stores: ${errorMessage(first.reason)}`);
  }

  public async read(dateKey: string): Promise<CheckpointRecord | null> {
    try {
      const record = await this.primary.read(dateKey);
      if (record) return record;
      this.warn(`no checkpoint for ${dateKey} in ${this.primary.name}; trying ${this.secondary.name}`);
    } catch (e) {
      this.warn(`${this.primary.name} unreachable (${errorMessage(e)}); trying ${this.secondary.name}`);
    }
    return this.secondary.read(dateKey);
  }

  private warn(message: string): void {
    this.reporter.report({ type: 'warning', stage: 'checkpoint', message });
  }
}
