import { CheckpointRecord } from '../types';

/** Durable handoff between the collect run and the later send run, keyed by calendar date. */
export interface CheckpointStore {
  readonly name: string;
  /** Writes a new timestamped object and returns its key. */
  write(record: CheckpointRecord): Promise<string>;
  /** The most recently written record for `dateKey`, or null when none exists. */
  read(dateKey: string): Promise<CheckpointRecord | null>;
}
