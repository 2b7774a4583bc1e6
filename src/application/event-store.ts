import type { Logger } from 'pino';
import {
  EventNotFoundError,
  PartialInsertError,
  ValidationError,
  clip,
  eventBody,
  utcDay,
} from '../domain/index.js';
import type { Event, EventBody, EventId, PersistedEvent, TimeRange } from '../domain/index.js';
import type { StorageBackend } from './storage-backend.js';
import type { BucketDirectory } from './bucket-directory.js';
import { KeyedMutex } from './keyed-mutex.js';
import { eventBodySchema, timeRangeSchema } from './event-schema.js';
import { parseWith } from './validation.js';

export const DEFAULT_INSERT_CHUNK_SIZE = 100;

/** Stand-in for "no limit"; large but finite. */
export const UNBOUNDED_LIMIT = 1_000_000_000;

export interface EventStoreOptions {
  /** Rows per bulk-insert statement. */
  chunkSize?: number;
}

export interface RangeQuery extends TimeRange {
  /** 0 → empty result, negative → unbounded, positive → cap. */
  readonly limit: number;
}

/**
 * Per-bucket event operations.
 *
 * Every call resolves the public bucket id to its internal key first, so
 * `BucketNotFoundError` surfaces uniformly. The store keeps no state
 * between calls apart from the replace-last lock table.
 */
export class EventStore {
  private readonly chunkSize: number;
  private readonly replaceLastLocks = new KeyedMutex();

  constructor(
    private readonly backend: StorageBackend,
    private readonly buckets: BucketDirectory,
    private readonly log: Logger,
    options: EventStoreOptions = {},
  ) {
    const chunkSize = options.chunkSize ?? DEFAULT_INSERT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ValidationError([{ path: 'chunkSize', message: 'Must be a positive integer' }]);
    }
    this.chunkSize = chunkSize;
  }

  /** Point lookup. A miss is null, not an error. */
  async get(bucketId: string, eventId: EventId): Promise<PersistedEvent | null> {
    const key = await this.buckets.resolve(bucketId);
    const event = await this.backend.findEvent(key, eventId);
    return event ?? null;
  }

  /**
   * Events overlapping `[start, end]`, newest first, each clipped to the
   * range. Clipping never touches `data`.
   */
  async getRange(bucketId: string, query: RangeQuery): Promise<PersistedEvent[]> {
    const range = checkRange(query, bucketId);
    if (!Number.isInteger(query.limit)) {
      throw new ValidationError([{ path: 'limit', message: 'Must be an integer' }], { bucketId });
    }

    const key = await this.buckets.resolve(bucketId);
    if (query.limit === 0) {
      return [];
    }

    const limit = query.limit < 0 ? UNBOUNDED_LIMIT : query.limit;
    const rows = await this.backend.findEvents(key, range, limit);

    return rows.slice(0, limit).map((event) => clip(event, range));
  }

  /** Same filter as `getRange`, without materialising or clipping. */
  async count(bucketId: string, range: TimeRange = {}): Promise<number> {
    const checked = checkRange(range, bucketId);
    const key = await this.buckets.resolve(bucketId);
    return this.backend.countEvents(key, checked);
  }

  async insertOne(bucketId: string, event: Event): Promise<PersistedEvent> {
    if (event.kind === 'persisted') {
      throw new ValidationError(
        [{ path: 'id', message: 'insertOne takes a pending event; use replace for a stored one' }],
        { bucketId, eventId: event.id },
      );
    }

    const body = checkBody(event, bucketId);
    const key = await this.buckets.resolve(bucketId);
    return this.backend.insertEvent(key, body);
  }

  /**
   * Stored events are overwritten one by one (as `replace`); pending
   * events are bulk-inserted in chunks of `chunkSize`.
   *
   * Each chunk is applied atomically. When a chunk fails after earlier
   * chunks were committed, a `PartialInsertError` reports how many pending
   * events are durable; a failure before any commit is rethrown as is.
   */
  async insertMany(bucketId: string, events: readonly Event[]): Promise<void> {
    const updates: { id: EventId; body: EventBody }[] = [];
    const inserts: EventBody[] = [];

    for (const event of events) {
      const body = checkBody(event, bucketId);
      if (event.kind === 'persisted') {
        updates.push({ id: event.id, body });
      } else {
        inserts.push(body);
      }
    }

    const key = await this.buckets.resolve(bucketId);

    for (const { id, body } of updates) {
      const updated = await this.backend.updateEvent(key, id, body);
      if (!updated) {
        throw new EventNotFoundError(bucketId, id);
      }
    }

    let inserted = 0;
    for (let offset = 0; offset < inserts.length; offset += this.chunkSize) {
      const chunk = inserts.slice(offset, offset + this.chunkSize);
      try {
        await this.backend.insertEvents(key, chunk);
      } catch (err) {
        if (inserted === 0) {
          throw err;
        }
        this.log.warn(
          { bucketId, inserted, total: inserts.length, err },
          'Bulk insert stopped after a failed chunk',
        );
        throw new PartialInsertError(bucketId, inserted, inserts.length, err);
      }
      inserted += chunk.length;
    }

    this.log.debug(
      { bucketId, updated: updates.length, inserted, chunkSize: this.chunkSize },
      'Events written',
    );
  }

  /** Full overwrite of timestamp, duration and data; identity unchanged. */
  async replace(bucketId: string, eventId: EventId, event: EventBody): Promise<PersistedEvent> {
    const body = checkBody(event, bucketId);
    const key = await this.buckets.resolve(bucketId);

    const updated = await this.backend.updateEvent(key, eventId, body);
    if (!updated) {
      throw new EventNotFoundError(bucketId, eventId);
    }
    return updated;
  }

  /**
   * Overwrites the chronologically last event of the bucket, keeping its
   * id. Calls for the same bucket are serialised so the find-then-write
   * pair never interleaves with another replace-last.
   */
  async replaceLast(bucketId: string, event: EventBody): Promise<PersistedEvent> {
    const body = checkBody(event, bucketId);
    const key = await this.buckets.resolve(bucketId);

    return this.replaceLastLocks.run(key, async () => {
      const last = await this.backend.findLastEvent(key);
      if (!last) {
        throw new EventNotFoundError(bucketId);
      }

      const updated = await this.backend.updateEvent(key, last.id, body);
      if (!updated) {
        // Deleted between the lookup and the write
        throw new EventNotFoundError(bucketId, last.id);
      }
      return updated;
    });
  }

  /** True when a row was removed; a miss is false, not an error. */
  async delete(bucketId: string, eventId: EventId): Promise<boolean> {
    const key = await this.buckets.resolve(bucketId);
    return this.backend.deleteEvent(key, eventId);
  }

  /** Latest event whose timestamp falls on the UTC day of `day`. */
  async getLastEvent(bucketId: string, day: Date = new Date()): Promise<PersistedEvent | null> {
    const key = await this.buckets.resolve(bucketId);
    const event = await this.backend.findLastEvent(key, utcDay(day));
    return event ?? null;
  }
}

function checkBody(event: EventBody, bucketId: string): EventBody {
  const eventId = 'id' in event && typeof event.id === 'string' ? event.id : undefined;
  return eventBody(parseWith(eventBodySchema, eventBody(event), { bucketId, eventId }));
}

function checkRange(range: TimeRange, bucketId: string): TimeRange {
  const { start, end } = parseWith(timeRangeSchema, { start: range.start, end: range.end }, { bucketId });
  if (start !== undefined && end !== undefined && start.getTime() > end.getTime()) {
    throw new ValidationError([{ path: 'start', message: 'Must not be after end' }], { bucketId });
  }
  return { start, end };
}
