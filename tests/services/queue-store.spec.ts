import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DelayPolicy } from '../../src/services/delay-policy.js';
import { DelayedQueue } from '../../src/services/delayed-queue.js';
import {
  JsonFileQueueStore,
  emptyQueueState,
  parsePayload,
  toPersistedRecord,
} from '../../src/services/queue-store.js';
import { SqliteQueueStore } from '../../src/services/sqlite-queue-store.js';
import { PersistenceFailureError } from '../../src/types/errors.js';
import type { QueueState } from '../../src/types/queue.js';
import { policyOptions, sequentialIds, textPayload } from '../helpers.js';

const SAVED_AT = new Date('2026-01-01T00:00:00.000Z');

/** A state with one sent, one retrying and one scheduled batch item. */
function populatedState(): QueueState {
  const queue = new DelayedQueue({
    capacity: 10,
    maxAttempts: 3,
    historyLimit: 10,
    policy: new DelayPolicy(policyOptions({ mode: 'batch' })),
    now: () => 1000,
    generateId: sequentialIds(),
  });
  queue.enqueue({ files: [{ path: '/media/a.jpg', type: 'photo' }], text: 'first', channelTitle: 'News' });
  queue.enqueue(textPayload('second'), { priority: 2 });
  queue.enqueue(textPayload('third'));
  queue.popDue(2800, 2);
  queue.markSent('item-1');
  queue.markRetry('item-2', 9000, 'flaky network');
  return queue.snapshot();
}

describe('JsonFileQueueStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'paced-relay-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('restores exactly what it saved', async () => {
    const store = new JsonFileQueueStore(path.join(dir, 'queue.json'), { now: () => SAVED_AT });
    const state = populatedState();

    await store.save(state);
    const loaded = await store.load();

    expect(loaded.state).toEqual(state);
    expect(loaded.corrupt).toEqual([]);
    expect(loaded.savedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(state.items.map((item) => item.batchId)).toEqual(['batch-1-0', 'batch-1-0']);
  });

  it('writes through a temporary file and leaves none behind', async () => {
    const filePath = path.join(dir, 'state', 'queue.json');
    const store = new JsonFileQueueStore(filePath);

    await store.save(populatedState());

    expect(await readdir(path.join(dir, 'state'))).toEqual(['queue.json']);
    const document: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    expect(document).toMatchObject({ schemaVersion: 1, stats: { queued: 3, sent: 1, failed: 1, deadLettered: 0 } });
  });

  it('loads an empty state when no file exists yet', async () => {
    const store = new JsonFileQueueStore(path.join(dir, 'missing.json'));
    expect(await store.load()).toEqual({ state: emptyQueueState(), corrupt: [], savedAt: null });
  });

  it('skips corrupt entries and keeps the rest', async () => {
    const filePath = path.join(dir, 'queue.json');
    const good = toPersistedRecord({
      id: 'good-1',
      payload: textPayload(),
      arrivalTime: 0,
      scheduledTime: 100,
      priority: 0,
      attempts: 0,
      status: 'scheduled',
    });
    await writeFile(
      filePath,
      JSON.stringify({
        schemaVersion: 1,
        savedAt: '2026-02-01T00:00:00.000Z',
        items: [good, { ...good, id: 'bad-1', status: 'bogus' }],
        history: [],
        stats: { queued: 2, sent: 0, failed: 0, deadLettered: 0 },
        policyState: null,
      }),
    );

    const loaded = await new JsonFileQueueStore(filePath).load();

    expect(loaded.state.items.map((item) => item.id)).toEqual(['good-1']);
    expect(loaded.corrupt).toHaveLength(1);
    expect(loaded.corrupt[0].entryId).toBe('bad-1');
    expect(loaded.corrupt[0].index).toBe(1);
    expect(loaded.savedAt).toBe('2026-02-01T00:00:00.000Z');
  });

  it('fails when the document is not JSON', async () => {
    const filePath = path.join(dir, 'queue.json');
    await writeFile(filePath, 'not json');

    await expect(new JsonFileQueueStore(filePath).load()).rejects.toBeInstanceOf(PersistenceFailureError);
  });

  it('fails on an unknown schema version', async () => {
    const filePath = path.join(dir, 'queue.json');
    await writeFile(filePath, JSON.stringify({ schemaVersion: 2, items: [] }));

    await expect(new JsonFileQueueStore(filePath).load()).rejects.toThrow(
      'Unsupported queue state schema version: 2 (expected 1).',
    );
  });

  it('reports a failed write as a persistence failure', async () => {
    await writeFile(path.join(dir, 'blocker'), '');
    const store = new JsonFileQueueStore(path.join(dir, 'blocker', 'queue.json'));

    await expect(store.save(populatedState())).rejects.toBeInstanceOf(PersistenceFailureError);
  });
});

describe('SqliteQueueStore', () => {
  it('restores exactly what it saved', async () => {
    const store = new SqliteQueueStore({ filename: ':memory:', now: () => SAVED_AT });
    const state = populatedState();

    await store.save(state);
    const loaded = await store.load();
    store.close();

    expect(loaded.state).toEqual(state);
    expect(loaded.savedAt).toBe('2026-01-01T00:00:00.000Z');
  });

  it('replaces the previous state on every save', async () => {
    const store = new SqliteQueueStore({ filename: ':memory:' });
    await store.save(populatedState());
    await store.save(emptyQueueState());

    const loaded = await store.load();
    store.close();

    expect(loaded.state.items).toEqual([]);
    expect(loaded.state.history).toEqual([]);
  });

  it('loads an empty state from a fresh database', async () => {
    const store = new SqliteQueueStore({ filename: ':memory:' });
    const loaded = await store.load();
    store.close();

    expect(store.description).toBe('sqlite::memory:');
    expect(loaded).toEqual({ state: emptyQueueState(), corrupt: [], savedAt: null });
  });
});

describe('parsePayload', () => {
  it('keeps known optional fields', () => {
    expect(parsePayload({ files: [], text: 'x', sourceMessageId: 7, extra: true })).toEqual({
      files: [],
      text: 'x',
      sourceMessageId: 7,
    });
  });

  it('rejects files of an unknown type', () => {
    expect(() => parsePayload({ files: [{ path: '/a.gif', type: 'gif' }], text: '' })).toThrow(
      "'payload.files[0]' must have a string path and a known type.",
    );
  });
});
