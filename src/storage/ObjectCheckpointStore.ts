import { CheckpointRecord } from '../types';
import { CheckpointStore } from './CheckpointStore';
import { checkpointSchema } from './checkpointSchema';
import { ObjectStore, StoredObject } from './ObjectStore';

/** Later writes within one millisecond get `_001`, `_002`, ... which sort after the bare key. */
export function checkpointKey(dateKey: string, at: number, sequence = 0): string {
  const stamp = new Date(at).toISOString().replace(/[:.]/g, '-');
  return `${dateKey}/${stamp}${sequence > 0 ? `_${String(sequence).padStart(3, '0')}` : ''}.json`;
}

/** Newest by update time; equal times resolve to the greater key. */
export function latestObject(objects: readonly StoredObject[]): StoredObject | undefined {
  let latest: StoredObject | undefined;
  for (const object of objects) {
    if (
      !latest ||
      object.lastModified > latest.lastModified ||
      (object.lastModified === latest.lastModified && object.key > latest.key)
    ) {
      latest = object;
    }
  }
  return latest;
}

/** Checkpoints as `{dateKey}/{timestamp}.json` objects; every write adds a new object. */
export class ObjectCheckpointStore implements CheckpointStore {
  public readonly name: string;
  private lastWriteAt = Number.NaN;
  private sequence = 0;

  constructor(
    private readonly store: ObjectStore,
    private readonly now: () => number = Date.now
  ) {
    this.name = store.name;
  }

  public async write(record: CheckpointRecord): Promise<string> {
    const at = this.now();
    this.sequence = at === this.lastWriteAt ? this.sequence + 1 : 0;
    this.lastWriteAt = at;
    const key = checkpointKey(record.dateKey, at, this.sequence);
    await this.store.put(key, JSON.stringify(record, null, 2));
    console.log(`[persist] checkpoint written to ${this.name}: ${key}`);
    return key;
  }

  public async read(dateKey: string): Promise<CheckpointRecord | null> {
    const latest = latestObject(await this.store.list(`${dateKey}/`));
    if (!latest) return null;
    const body = await this.store.get(latest.key);
    if (body === null) return null;
    const record: CheckpointRecord = checkpointSchema.parse(JSON.parse(body));
    return record;
  }
}
