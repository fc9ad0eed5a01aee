import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase } from '@/db.js';
import type { Db } from '@/db.js';
import { JobDispatcher } from '@/queue/dispatcher.js';
import { SqliteQueueStore } from '@/queue/index.js';
import { SCRIPTED_JOB, createControl, fakeTime, scriptedRegistry, silentLogger } from '../fixtures/jobs.js';

const registry = scriptedRegistry(createControl(['ok']));

let db: Db;
let time: ReturnType<typeof fakeTime>;
let store: SqliteQueueStore;
let dispatcher: JobDispatcher;

beforeEach(() => {
  db = openDatabase(':memory:');
  time = fakeTime();
  store = new SqliteQueueStore(db, time.clock);
  dispatcher = new JobDispatcher(store, silentLogger);
});

afterEach(() => {
  db.close();
});

const job = (label: string) => registry.create(SCRIPTED_JOB, { label });
const labelOf = (serialized: string): unknown => JSON.parse(serialized).payload.label;

// ─── push ────────────────────────────────────────────────────────────────────

describe('push', () => {
  it('inserts a pending record and returns its id', async () => {
    const id = await dispatcher.dispatch(job('a'));

    const record = store.get(id);
    expect(record).toMatchObject({
      id,
      name: SCRIPTED_JOB,
      priority: 'default',
      status: 'pending',
      attempts: 0,
      lastError: null,
      availableAt: '2026-01-05T09:00:00.000Z',
    });
    expect(labelOf(record?.job ?? '{}')).toBe('a');
  });

  it('schedules a delayed record in the future', async () => {
    const id = await dispatcher.dispatch(job('later'), { delaySeconds: 90 });
    expect(store.get(id)?.availableAt).toBe('2026-01-05T09:01:30.000Z');
  });

  it('rejects a negative delay', async () => {
    await expect(dispatcher.dispatch(job('x'), { delaySeconds: -1 })).rejects.toThrow(
      'delaySeconds must be a non-negative number, got -1'
    );
  });

  it('stores an unparseable blob as given', async () => {
    const id = await store.push({ name: SCRIPTED_JOB, job: 'garbage' });
    expect(store.get(id)).toMatchObject({ job: 'garbage', attempts: 0 });
  });
});

// ─── pop ─────────────────────────────────────────────────────────────────────

describe('pop', () => {
  it('returns null when the queue is empty', async () => {
    expect(await store.pop(300)).toBeNull();
  });

  it('claims the oldest pending record and marks it processing', async () => {
    const first = await dispatcher.dispatch(job('first'));
    await dispatcher.dispatch(job('second'));

    const popped = await store.pop(300);

    expect(popped?.id).toBe(first);
    expect(labelOf(popped?.job ?? '{}')).toBe('first');
    expect(store.get(first)?.status).toBe('processing');
  });

  it('orders by priority before age', async () => {
    await dispatcher.dispatch(job('low'), { priority: 'low' });
    await dispatcher.dispatch(job('default'));
    await dispatcher.dispatch(job('high'), { priority: 'high' });

    const order: unknown[] = [];
    for (let popped = await store.pop(300); popped; popped = await store.pop(300)) {
      order.push(labelOf(popped.job));
    }
    expect(order).toEqual(['high', 'default', 'low']);
  });

  it('does not return a record whose available_at is in the future', async () => {
    await dispatcher.dispatch(job('later'), { delaySeconds: 60 });
    expect(await store.pop(300)).toBeNull();

    time.advance(60_000);
    expect(await store.pop(300)).not.toBeNull();
  });

  it('never hands the same record to two callers', async () => {
    await dispatcher.dispatch(job('only'));
    const results = await Promise.all([store.pop(300), store.pop(300), store.pop(300)]);
    expect(results.filter(result => result !== null)).toHaveLength(1);
  });

  it('reclaims a processing record after its visibility timeout', async () => {
    const id = await dispatcher.dispatch(job('stuck'));
    await store.pop(30);

    time.advance(29_000);
    expect(await store.pop(30)).toBeNull();

    time.advance(1_000);
    expect((await store.pop(30))?.id).toBe(id);
  });
});

// ─── settle ──────────────────────────────────────────────────────────────────

describe('complete', () => {
  it("sets status to 'completed' and is idempotent", async () => {
    const id = await dispatcher.dispatch(job('a'));
    await store.pop(300);

    await store.complete(id);
    await store.complete(id);

    expect(store.get(id)?.status).toBe('completed');
    expect(await store.pop(300)).toBeNull();
  });

  it('leaves failed records alone', async () => {
    const id = await dispatcher.dispatch(job('a'));
    await store.fail(id, 'raw', 'broken');
    await store.complete(id);
    expect(store.get(id)?.status).toBe('failed');
  });
});

describe('retry', () => {
  it('returns the record to pending with the new blob and delay', async () => {
    const id = await dispatcher.dispatch(job('again'));
    await store.pop(300);

    const next = job('again');
    next.setAttempts(1);
    await store.complete(id);
    await store.retry(id, next, 5, 'boom');

    expect(store.get(id)).toMatchObject({
      status: 'pending',
      attempts: 1,
      lastError: 'boom',
      availableAt: '2026-01-05T09:00:05.000Z',
      job: next.serialize(),
    });
    expect(await store.pop(300)).toBeNull();
    time.advance(5_000);
    expect((await store.pop(300))?.id).toBe(id);
  });
});

describe('fail', () => {
  it('stores the reason and the attempts recorded in the blob', async () => {
    const id = await dispatcher.dispatch(job('dead'));
    const last = job('dead');
    last.setAttempts(3);

    await store.fail(id, last.serialize(), 'boom');

    expect(store.get(id)).toMatchObject({ status: 'failed', attempts: 3, lastError: 'boom' });
    expect(await store.pop(300)).toBeNull();
  });

  it('keeps the column counter when the blob is unreadable', async () => {
    const id = await store.push({ name: SCRIPTED_JOB, job: '{broken' });
    await store.fail(id, '{broken', 'Deserialization failed: Job data is not valid JSON');

    expect(store.get(id)).toMatchObject({ status: 'failed', attempts: 0, job: '{broken' });
  });
});

// ─── admin ───────────────────────────────────────────────────────────────────

describe('listFailed and discard', () => {
  it('lists failed records newest first and honours the limit', async () => {
    const older = await dispatcher.dispatch(job('older'));
    const newer = await dispatcher.dispatch(job('newer'));
    await dispatcher.dispatch(job('fine'));

    await store.fail(older, 'x', 'first');
    time.advance(1_000);
    await store.fail(newer, 'y', 'second');

    expect(store.listFailed().map(record => record.id)).toEqual([newer, older]);
    expect(store.listFailed(1).map(record => record.id)).toEqual([newer]);
  });

  it('deletes only failed records', async () => {
    const failed = await dispatcher.dispatch(job('bad'));
    const pending = await dispatcher.dispatch(job('good'));
    await store.fail(failed, 'x', 'broken');

    expect(store.discard(failed)).toBe(true);
    expect(store.discard(pending)).toBe(false);
    expect(store.get(failed)).toBeNull();
    expect(store.get(pending)).not.toBeNull();
  });
});

describe('stats', () => {
  it('counts records by status, priority and delay', async () => {
    await dispatcher.dispatch(job('a'), { priority: 'high' });
    await dispatcher.dispatch(job('b'));
    await dispatcher.dispatch(job('c'), { delaySeconds: 60 });
    const done = await dispatcher.dispatch(job('d'), { priority: 'low' });
    const dead = await dispatcher.dispatch(job('e'));

    await store.complete(done);
    await store.fail(dead, 'x', 'broken');
    await store.pop(300);

    expect(store.stats()).toEqual({
      pending: 2,
      processing: 1,
      completed: 1,
      failed: 1,
      delayed: 1,
      byPriority: { high: 0, default: 2, low: 0 },
    });
  });
});
