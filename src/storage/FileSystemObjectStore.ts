import fs from 'fs/promises';
import path from 'path';
import { ObjectStore, StoredObject } from './ObjectStore';

const isMissing = (e: unknown) => e instanceof Error && 'code' in e && e.code === 'ENOENT';

/** Objects as files under `rootDir`; keys use '/' whatever the platform. */
export class FileSystemObjectStore implements ObjectStore {
  public readonly name = 'filesystem';

  constructor(private readonly rootDir: string) {}

  public async put(key: string, body: string): Promise<void> {
    const file = this.resolve(key);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, body, 'utf8');
  }

  public async list(prefix: string): Promise<StoredObject[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.rootDir, { recursive: true });
    } catch (e) {
      if (isMissing(e)) return [];
      throw e;
    }

    const objects: StoredObject[] = [];
    for (const entry of entries) {
      const key = entry.split(path.sep).join('/');
      if (!key.startsWith(prefix)) continue;
      const stat = await fs.stat(path.join(this.rootDir, entry));
      if (stat.isFile()) objects.push({ key, lastModified: stat.mtimeMs });
    }
    return objects;
  }

  public async get(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(key), 'utf8');
    } catch (e) {
      if (isMissing(e)) return null;
      throw e;
    }
  }

  private resolve(key: string): string {
    const file = path.resolve(this.rootDir, ...key.split('/'));
    if (!file.startsWith(path.resolve(this.rootDir) + path.sep)) {
      throw new Error(`Key escapes the store root: ${key}`);
    }
    return file;
  }
}
