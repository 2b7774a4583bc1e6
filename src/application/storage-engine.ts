import type { Logger } from 'pino';
import { BackendUnavailableError, StorageError } from '../domain/index.js';
import type { BucketMetadata, Event, EventBody, EventId, PersistedEvent, TimeRange } from '../domain/index.js';
import type { StorageBackend } from './storage-backend.js';
import { BucketDirectory } from './bucket-directory.js';
import type { BucketDirectoryOptions } from './bucket-directory.js';
import { EventStore } from './event-store.js';
import type { EventStoreOptions, RangeQuery } from './event-store.js';
import { CredentialStore } from './credential-store.js';
import { UsageTracker } from './usage-tracker.js';
import { ReportStore } from './report-store.js';
import type { CreateBucketInput } from './event-schema.js';

export interface StorageEngineOptions extends BucketDirectoryOptions, EventStoreOptions {
  log: Logger;
}

/**
 * Single entry point over one backend.
 *
 * Components are exposed for callers that want them directly; the
 * methods below delegate for the common bucket and event calls.
 */
export class StorageEngine {
  readonly buckets: BucketDirectory;
  readonly events: EventStore;
  readonly credentials: CredentialStore;
  readonly usage: UsageTracker;
  readonly reports: ReportStore;

  private readonly log: Logger;

  private constructor(
    readonly backend: StorageBackend,
    options: StorageEngineOptions,
  ) {
    this.log = options.log.child({ backend: backend.name });
    const clock = options.clock ?? Date.now;

    this.buckets = new BucketDirectory(backend, this.log, options);
    this.events = new EventStore(backend, this.buckets, this.log, options);
    this.credentials = new CredentialStore(backend, this.log, clock);
    this.usage = new UsageTracker(backend, clock);
    this.reports = new ReportStore(backend, this.log, clock);
  }

  /**
   * Connects the backend and returns a ready engine. Fails fast with
   * `BackendUnavailableError` if the backend cannot be reached.
   */
  static async open(backend: StorageBackend, options: StorageEngineOptions): Promise<StorageEngine> {
    try {
      await backend.connect();
    } catch (err) {
      if (err instanceof StorageError) {
        throw err;
      }
      throw new BackendUnavailableError('connect', err);
    }

    const engine = new StorageEngine(backend, options);
    engine.log.info('Storage engine ready');
    return engine;
  }

  async close(): Promise<void> {
    await this.backend.close();
    this.log.info('Storage engine closed');
  }

  // ─── Buckets ──────────────────────────────────────────────

  createBucket(input: CreateBucketInput): Promise<BucketMetadata> {
    return this.buckets.create(input);
  }

  deleteBucket(bucketId: string): Promise<void> {
    return this.buckets.delete(bucketId);
  }

  getMetadata(bucketId: string): Promise<BucketMetadata> {
    return this.buckets.getMetadata(bucketId);
  }

  listBuckets(): Promise<Record<string, BucketMetadata>> {
    return this.buckets.list();
  }

  // ─── Events ───────────────────────────────────────────────

  getEvent(bucketId: string, eventId: EventId): Promise<PersistedEvent | null> {
    return this.events.get(bucketId, eventId);
  }

  getEvents(bucketId: string, query: RangeQuery): Promise<PersistedEvent[]> {
    return this.events.getRange(bucketId, query);
  }

  getEventCount(bucketId: string, range?: TimeRange): Promise<number> {
    return this.events.count(bucketId, range);
  }

  insertOne(bucketId: string, event: Event): Promise<PersistedEvent> {
    return this.events.insertOne(bucketId, event);
  }

  insertMany(bucketId: string, events: readonly Event[]): Promise<void> {
    return this.events.insertMany(bucketId, events);
  }

  replace(bucketId: string, eventId: EventId, event: EventBody): Promise<PersistedEvent> {
    return this.events.replace(bucketId, eventId, event);
  }

  replaceLast(bucketId: string, event: EventBody): Promise<PersistedEvent> {
    return this.events.replaceLast(bucketId, event);
  }

  deleteEvent(bucketId: string, eventId: EventId): Promise<boolean> {
    return this.events.delete(bucketId, eventId);
  }
}
