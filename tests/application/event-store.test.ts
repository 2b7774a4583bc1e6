import { describe, it, expect, vi } from 'vitest';
import { BucketDirectory, EventStore } from '../../src/application/index.js';
import type { EventStoreOptions } from '../../src/application/index.js';
import {
  BucketNotFoundError,
  EventNotFoundError,
  PartialInsertError,
  RollbackFailedError,
  ValidationError,
  pendingEvent,
  persistedEvent,
} from '../../src/domain/index.js';
import { MemoryBackend } from '../../src/infrastructure/memory/index.js';
import { at, bucketInput, fakeLogger, pending } from '../helpers.js';

async function setup(options: EventStoreOptions = {}) {
  const backend = new MemoryBackend();
  const log = fakeLogger();
  const buckets = new BucketDirectory(backend, log);
  const store = new EventStore(backend, buckets, log, options);
  await buckets.create(bucketInput('b1'));
  return { backend, store, log };
}

/** E1 covers [100s, 110s], E2 covers [200s, 205s]. */
async function withTwoEvents() {
  const ctx = await setup();
  const e1 = await ctx.store.insertOne('b1', pending(100, 10, { app: 'editor' }));
  const e2 = await ctx.store.insertOne('b1', pending(200, 5, { app: 'browser' }));
  return { ...ctx, e1, e2 };
}

describe('EventStore', () => {
  it('rejects a non-positive chunk size', () => {
    const backend = new MemoryBackend();
    const buckets = new BucketDirectory(backend, fakeLogger());
    expect(() => new EventStore(backend, buckets, fakeLogger(), { chunkSize: 0 })).toThrow(ValidationError);
  });

  // ─── insertOne / get ───────────────────────────────────────

  describe('insertOne', () => {
    it('returns the stored event with a fresh id', async () => {
      const { store } = await setup();
      const stored = await store.insertOne('b1', pending(100, 10, { app: 'editor' }));

      expect(stored).toEqual({
        kind: 'persisted',
        id: '1',
        timestamp: at(100),
        duration: 10,
        data: { app: 'editor' },
      });
    });

    it('rejects an already persisted event', async () => {
      const { store } = await setup();
      const event = persistedEvent('1', { timestamp: at(100), duration: 1, data: {} });
      await expect(store.insertOne('b1', event)).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects a negative duration and stores nothing', async () => {
      const { store } = await setup();
      await expect(store.insertOne('b1', pending(100, -1))).rejects.toBeInstanceOf(ValidationError);
      await expect(store.count('b1')).resolves.toBe(0);
    });

    it('rejects an invalid timestamp', async () => {
      const { store } = await setup();
      const event = pendingEvent({ timestamp: new Date('garbage'), duration: 1, data: {} });
      await expect(store.insertOne('b1', event)).rejects.toBeInstanceOf(ValidationError);
    });

    it('fails for an unknown bucket', async () => {
      const { store } = await setup();
      await expect(store.insertOne('nope', pending(100, 1))).rejects.toBeInstanceOf(BucketNotFoundError);
    });
  });

  describe('get', () => {
    it('returns a stored event and null for a miss', async () => {
      const { store, e1 } = await withTwoEvents();

      await expect(store.get('b1', e1.id)).resolves.toEqual(e1);
      await expect(store.get('b1', '999')).resolves.toBeNull();
    });

    it('fails for an unknown bucket', async () => {
      const { store } = await setup();
      await expect(store.get('nope', '1')).rejects.toBeInstanceOf(BucketNotFoundError);
    });
  });

  // ─── getRange / count ──────────────────────────────────────

  describe('getRange', () => {
    it('returns only overlapping events', async () => {
      const { store, e2 } = await withTwoEvents();
      const events = await store.getRange('b1', { start: at(150), end: at(250), limit: -1 });
      expect(events).toEqual([e2]);
    });

    it('clips an event that straddles the range start', async () => {
      const { store, e1 } = await withTwoEvents();
      const events = await store.getRange('b1', { start: at(105), end: at(150), limit: -1 });

      expect(events).toEqual([{ ...e1, timestamp: at(105), duration: 5 }]);
    });

    it('orders newest first when unbounded', async () => {
      const { store, e1, e2 } = await withTwoEvents();
      const events = await store.getRange('b1', { limit: -1 });
      expect(events.map((e) => e.id)).toEqual([e2.id, e1.id]);
    });

    it('caps the result at a positive limit', async () => {
      const { store, e2 } = await withTwoEvents();
      const events = await store.getRange('b1', { limit: 1 });
      expect(events.map((e) => e.id)).toEqual([e2.id]);
    });

    it('returns nothing for limit 0 without querying events', async () => {
      const { store, backend } = await withTwoEvents();
      const findEvents = vi.spyOn(backend, 'findEvents');

      await expect(store.getRange('b1', { limit: 0 })).resolves.toEqual([]);
      expect(findEvents).not.toHaveBeenCalled();
    });

    it('still checks the bucket for limit 0', async () => {
      const { store } = await setup();
      await expect(store.getRange('nope', { limit: 0 })).rejects.toBeInstanceOf(BucketNotFoundError);
    });

    it('rejects a fractional limit', async () => {
      const { store } = await setup();
      await expect(store.getRange('b1', { limit: 1.5 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects an invalid Date as a bound', async () => {
      const { store } = await withTwoEvents();

      await expect(store.getRange('b1', { start: new Date('nonsense'), limit: -1 })).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(store.getRange('b1', { end: new Date('nonsense'), limit: 0 })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });

    it('rejects start after end', async () => {
      const { store } = await setup();
      await expect(store.getRange('b1', { start: at(200), end: at(100), limit: -1 })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  describe('count', () => {
    it('uses the same overlap filter as getRange', async () => {
      const { store } = await withTwoEvents();

      await expect(store.count('b1')).resolves.toBe(2);
      await expect(store.count('b1', { start: at(150), end: at(250) })).resolves.toBe(1);
      await expect(store.count('b1', { start: at(111), end: at(199) })).resolves.toBe(0);
    });

    it('rejects an invalid Date as a bound', async () => {
      const { store } = await withTwoEvents();
      await expect(store.count('b1', { start: new Date('nonsense') })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  // ─── insertMany ────────────────────────────────────────────

  describe('insertMany', () => {
    it('updates persisted events and inserts pending ones', async () => {
      const { store, e1 } = await withTwoEvents();

      await store.insertMany('b1', [
        persistedEvent(e1.id, { timestamp: at(100), duration: 20, data: { app: 'editor' } }),
        pending(300, 1),
        pending(400, 1),
      ]);

      await expect(store.count('b1')).resolves.toBe(4);
      const updated = await store.get('b1', e1.id);
      expect(updated?.duration).toBe(20);
    });

    it('fails on an unknown persisted id before inserting anything', async () => {
      const { store } = await setup();
      const missing = persistedEvent('999', { timestamp: at(100), duration: 1, data: {} });

      await expect(store.insertMany('b1', [pending(300, 1), missing])).rejects.toBeInstanceOf(EventNotFoundError);
      await expect(store.count('b1')).resolves.toBe(0);
    });

    it('validates the whole batch first', async () => {
      const { store } = await setup();
      await expect(store.insertMany('b1', [pending(300, 1), pending(400, -2)])).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(store.count('b1')).resolves.toBe(0);
    });

    it('splits pending events into chunks', async () => {
      const { store, backend } = await setup({ chunkSize: 2 });
      const insertEvents = vi.spyOn(backend, 'insertEvents');

      await store.insertMany('b1', [1, 2, 3, 4, 5].map((n) => pending(n * 100, 1)));

      expect(insertEvents.mock.calls.map(([, chunk]) => chunk.length)).toEqual([2, 2, 1]);
      await expect(store.count('b1')).resolves.toBe(5);
    });

    it('reports committed chunks when a later chunk fails', async () => {
      const { store, backend, log } = await setup({ chunkSize: 2 });
      const original = backend.insertEvents.bind(backend);
      const cause = new Error('disk full');
      const insertEvents = vi
        .spyOn(backend, 'insertEvents')
        .mockImplementationOnce((key, chunk) => original(key, chunk))
        .mockRejectedValueOnce(cause);

      let caught: unknown;
      try {
        await store.insertMany('b1', [1, 2, 3, 4, 5].map((n) => pending(n * 100, 1)));
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(PartialInsertError);
      const err = caught instanceof PartialInsertError ? caught : undefined;
      expect(err?.insertedCount).toBe(2);
      expect(err?.totalCount).toBe(5);
      expect(err?.cause).toBe(cause);
      expect(err?.chunkMayBePartial).toBe(false);
      expect(insertEvents).toHaveBeenCalledTimes(2);
      expect(log.warn).toHaveBeenCalledTimes(1);
      await expect(store.count('b1')).resolves.toBe(2);
    });

    it('flags a later chunk that could not be rolled back', async () => {
      const { store, backend } = await setup({ chunkSize: 2 });
      const original = backend.insertEvents.bind(backend);
      const lost = new Error('connection closed');
      vi.spyOn(backend, 'insertEvents')
        .mockImplementationOnce((key, chunk) => original(key, chunk))
        .mockRejectedValueOnce(new RollbackFailedError(2, lost, lost));

      const err = await store
        .insertMany('b1', [1, 2, 3, 4].map((n) => pending(n * 100, 1)))
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(PartialInsertError);
      expect(err instanceof PartialInsertError && err.chunkMayBePartial).toBe(true);
      expect(err instanceof PartialInsertError && err.insertedCount).toBe(2);
    });

    it('rethrows a first-chunk failure as is', async () => {
      const { store, backend } = await setup({ chunkSize: 2 });
      const cause = new Error('disk full');
      vi.spyOn(backend, 'insertEvents').mockRejectedValueOnce(cause);

      await expect(store.insertMany('b1', [pending(100, 1), pending(200, 1)])).rejects.toBe(cause);
    });

    it('accepts an empty batch', async () => {
      const { store } = await setup();
      await expect(store.insertMany('b1', [])).resolves.toBeUndefined();
    });
  });

  // ─── replace / replaceLast / delete ────────────────────────

  describe('replace', () => {
    it('overwrites the body and keeps the id', async () => {
      const { store, e1 } = await withTwoEvents();
      const body = { timestamp: at(101), duration: 2, data: { app: 'terminal' } };

      const replaced = await store.replace('b1', e1.id, body);

      expect(replaced).toEqual({ kind: 'persisted', id: e1.id, ...body });
      await expect(store.get('b1', e1.id)).resolves.toEqual(replaced);
    });

    it('fails for an unknown event', async () => {
      const { store } = await withTwoEvents();
      await expect(store.replace('b1', '999', { timestamp: at(1), duration: 0, data: {} })).rejects.toBeInstanceOf(
        EventNotFoundError,
      );
    });
  });

  describe('replaceLast', () => {
    it('overwrites the chronologically last event', async () => {
      const { store, e2 } = await withTwoEvents();

      const replaced = await store.replaceLast('b1', { timestamp: at(200), duration: 30, data: { app: 'browser' } });

      expect(replaced.id).toBe(e2.id);
      expect(replaced.duration).toBe(30);
      await expect(store.count('b1')).resolves.toBe(2);
    });

    it('keeps the id of the only event in a bucket', async () => {
      const { store } = await setup();
      const only = await store.insertOne('b1', pending(100, 10, { app: 'editor' }));

      const replaced = await store.replaceLast('b1', { timestamp: at(150), duration: 3, data: { app: 'terminal' } });

      expect(replaced).toEqual({
        kind: 'persisted',
        id: only.id,
        timestamp: at(150),
        duration: 3,
        data: { app: 'terminal' },
      });
      await expect(store.count('b1')).resolves.toBe(1);
    });

    it('fails on an empty bucket', async () => {
      const { store } = await setup();
      await expect(store.replaceLast('b1', { timestamp: at(1), duration: 0, data: {} })).rejects.toBeInstanceOf(
        EventNotFoundError,
      );
    });

    it('serialises concurrent calls on one bucket', async () => {
      const { store, backend } = await withTwoEvents();
      const calls: string[] = [];
      const find = backend.findLastEvent.bind(backend);
      const update = backend.updateEvent.bind(backend);
      vi.spyOn(backend, 'findLastEvent').mockImplementation(async (key, window) => {
        calls.push('find');
        return find(key, window);
      });
      vi.spyOn(backend, 'updateEvent').mockImplementation(async (key, id, body) => {
        calls.push('update');
        return update(key, id, body);
      });

      await Promise.all([
        store.replaceLast('b1', { timestamp: at(200), duration: 1, data: {} }),
        store.replaceLast('b1', { timestamp: at(200), duration: 2, data: {} }),
      ]);

      expect(calls).toEqual(['find', 'update', 'find', 'update']);
      const [last] = await store.getRange('b1', { limit: 1 });
      expect(last?.duration).toBe(2);
    });
  });

  describe('delete', () => {
    it('returns true once, then false', async () => {
      const { store, e1 } = await withTwoEvents();

      await expect(store.delete('b1', e1.id)).resolves.toBe(true);
      await expect(store.delete('b1', e1.id)).resolves.toBe(false);
      await expect(store.get('b1', e1.id)).resolves.toBeNull();
    });
  });

  // ─── getLastEvent ──────────────────────────────────────────

  describe('getLastEvent', () => {
    it('returns the latest event on the given UTC day', async () => {
      const { store } = await setup();
      const minuteAt = (iso: string) => pendingEvent({ timestamp: new Date(iso), duration: 60, data: {} });
      await store.insertOne('b1', minuteAt('2026-02-18T08:00:00Z'));
      const evening = await store.insertOne('b1', minuteAt('2026-02-18T17:00:00Z'));
      await store.insertOne('b1', minuteAt('2026-02-19T01:00:00Z'));

      const last = await store.getLastEvent('b1', new Date('2026-02-18T12:00:00Z'));
      expect(last?.id).toBe(evening.id);
    });

    it('returns null for a day without events', async () => {
      const { store } = await withTwoEvents();
      await expect(store.getLastEvent('b1', new Date('2026-02-18T12:00:00Z'))).resolves.toBeNull();
    });
  });
});
