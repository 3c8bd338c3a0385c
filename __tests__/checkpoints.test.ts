import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FallbackCheckpointStore } from '../src/storage/FallbackCheckpointStore';
import { FileSystemObjectStore } from '../src/storage/FileSystemObjectStore';
import { checkpointKey, latestObject, ObjectCheckpointStore } from '../src/storage/ObjectCheckpointStore';
import { CheckpointRecord } from '../src/types';
import { article, MemoryObjectStore, RecordingReporter } from './fakes';

function record(dateKey: string, title = 'Story'): CheckpointRecord {
  const a = article({ title, url: `https://news.test/${title}` });
  return {
    dateKey,
    collectedAt: '2026-10-19T00:30:00.000Z',
    analyses: [
      {
        article: a,
        impactType: 'opportunity',
        impactAreas: ['customer data usage'],
        rationale: 'retail',
        relevance: 'direct',
        category: 'retail-marketing',
        isRegulatory: false,
        categories: ['case'],
      },
    ],
    messages: [
      { articleUrl: a.url, title, relevance: 'direct', category: 'retail-marketing', summary: 's', text: `**${title}**` },
    ],
    partners: [],
    stats: {
      collected: 1,
      afterDedup1: 1,
      afterFilter: 1,
      afterDedup2: 1,
      afterValidation: 1,
      final: 1,
      regulatoryFound: 0,
      regulatoryRetained: 0,
      startedAt: '2026-10-19T00:00:00.000Z',
      endedAt: '2026-10-19T00:30:00.000Z',
    },
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('checkpoint keys', () => {
  it('are grouped by date and named by write time', () => {
    expect(checkpointKey('2026-10-18', Date.parse('2026-10-19T00:30:05.123Z'))).toBe('2026-10-18/2026-10-19T00-30-05-123Z.json');
    expect(checkpointKey('2026-10-18', Date.parse('2026-10-19T00:30:05.123Z'), 2)).toBe(
      '2026-10-18/2026-10-19T00-30-05-123Z_002.json'
    );
  });

  it('resolve ties on update time by the greater key', () => {
    const latest = latestObject([
      { key: '2026-10-18/a.json', lastModified: 5 },
      { key: '2026-10-18/c.json', lastModified: 9 },
      { key: '2026-10-18/b.json', lastModified: 9 },
    ]);
    expect(latest?.key).toBe('2026-10-18/c.json');
    expect(latestObject([])).toBeUndefined();
  });
});

describe('ObjectCheckpointStore', () => {
  it('reads back what it wrote', async () => {
    const store = new ObjectCheckpointStore(new MemoryObjectStore(), () => Date.parse('2026-10-19T00:30:00Z'));
    const written = record('2026-10-18');

    const key = await store.write(written);

    expect(key).toBe('2026-10-18/2026-10-19T00-30-00-000Z.json');
    expect(await store.read('2026-10-18')).toEqual(written);
  });

  it('returns null for a date without checkpoints', async () => {
    const store = new ObjectCheckpointStore(new MemoryObjectStore());
    await store.write(record('2026-10-18'));

    expect(await store.read('2026-10-17')).toBeNull();
  });

  it('returns the most recently written checkpoint of a date', async () => {
    let t = Date.parse('2026-10-19T00:30:00Z');
    const clock = () => t;
    const store = new ObjectCheckpointStore(new MemoryObjectStore(clock), clock);

    await store.write(record('2026-10-18', 'First'));
    t += 60_000;
    await store.write(record('2026-10-18', 'Second'));

    expect((await store.read('2026-10-18'))?.messages[0].title).toBe('Second');
  });

  it('keeps two writes of a date within one millisecond as separate objects', async () => {
    const at = () => Date.parse('2026-10-19T00:30:00Z');
    const objects = new MemoryObjectStore(at);
    const store = new ObjectCheckpointStore(objects, at);

    const first = await store.write(record('2026-10-18', 'First'));
    const second = await store.write(record('2026-10-18', 'Second'));

    expect(first).toBe('2026-10-18/2026-10-19T00-30-00-000Z.json');
    expect(second).toBe('2026-10-18/2026-10-19T00-30-00-000Z_001.json');
    expect(objects.objects.size).toBe(2);
    expect((await store.read('2026-10-18'))?.messages[0].title).toBe('Second');
  });

  it('rejects a stored object that is not a checkpoint', async () => {
    const objects = new MemoryObjectStore();
    await objects.put('2026-10-18/x.json', JSON.stringify({ dateKey: '2026-10-18' }));

    await expect(new ObjectCheckpointStore(objects).read('2026-10-18')).rejects.toThrow();
  });
});

describe('FileSystemObjectStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'checkpoints-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('stores checkpoints as files under the date directory', async () => {
    const store = new ObjectCheckpointStore(new FileSystemObjectStore(root), () => Date.parse('2026-10-19T00:30:00Z'));
    const written = record('2026-10-18');

    await store.write(written);

    const files = await fs.readdir(path.join(root, '2026-10-18'));
    expect(files).toEqual(['2026-10-19T00-30-00-000Z.json']);
    expect(await store.read('2026-10-18')).toEqual(written);
  });

  it('treats a missing root as empty', async () => {
    const objects = new FileSystemObjectStore(path.join(root, 'not-created'));
    expect(await objects.list('2026-10-18/')).toEqual([]);
    expect(await objects.get('2026-10-18/missing.json')).toBeNull();
  });

  it('refuses keys outside the root', async () => {
    await expect(new FileSystemObjectStore(root).put('../escape.json', '{}')).rejects.toThrow('Key escapes the store root');
  });
});

describe('FallbackCheckpointStore', () => {
  const at = () => Date.parse('2026-10-19T00:30:00Z');

  it('writes to both stores and reads from the primary', async () => {
    const primaryObjects = new MemoryObjectStore(at);
    const secondaryObjects = new MemoryObjectStore(at);
    const store = new FallbackCheckpointStore(
      new ObjectCheckpointStore(primaryObjects, at),
      new ObjectCheckpointStore(secondaryObjects, at)
    );

    await store.write(record('2026-10-18'));

    expect(primaryObjects.objects.size).toBe(1);
    expect(secondaryObjects.objects.size).toBe(1);
    expect(store.name).toBe('memory+memory');
  });

  it('falls back to the secondary when the primary is unreachable', async () => {
    const primaryObjects = new MemoryObjectStore(at);
    const reporter = new RecordingReporter();
    const store = new FallbackCheckpointStore(
      new ObjectCheckpointStore(primaryObjects, at),
      new ObjectCheckpointStore(new MemoryObjectStore(at), at),
      reporter
    );
    primaryObjects.unreachable = true;

    const key = await store.write(record('2026-10-18'));
    const read = await store.read('2026-10-18');

    expect(key).toBe('2026-10-18/2026-10-19T00-30-00-000Z.json');
    expect(read?.dateKey).toBe('2026-10-18');
    expect(reporter.ofType('warning').map((w) => w.message)).toEqual([
      'memory write failed: store unreachable',
      'memory unreachable (store unreachable); trying memory',
    ]);
  });

  it('fails only when both stores fail', async () => {
    const primaryObjects = new MemoryObjectStore(at);
    const secondaryObjects = new MemoryObjectStore(at);
    primaryObjects.unreachable = true;
    secondaryObjects.unreachable = true;
    const store = new FallbackCheckpointStore(
      new ObjectCheckpointStore(primaryObjects, at),
      new ObjectCheckpointStore(secondaryObjects, at)
    );

    await expect(store.write(record('2026-10-18'))).rejects.toThrow('Checkpoint write failed on both stores: store unreachable');
  });
});
