export interface StoredObject {
  key: string;
  /** Epoch milliseconds of the last update. */
  lastModified: number;
}

/** The object-store operations the checkpoint handoff needs. */
export interface ObjectStore {
  readonly name: string;
  put(key: string, body: string): Promise<void>;
  list(prefix: string): Promise<StoredObject[]>;
  /** Object body, or null when the key does not exist. */
  get(key: string): Promise<string | null>;
}
