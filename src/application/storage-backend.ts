import type {
  BucketKey,
  BucketMetadata,
  BucketRow,
  CredentialRecord,
  DayWindow,
  EventBody,
  EventId,
  PersistedEvent,
  ReportRecord,
  TimeRange,
} from '../domain/index.js';

/**
 * Contract every concrete engine implements.
 *
 * Adapters are the only code that knows storage query syntax. They execute
 * primitive operations; the semantics that must be identical across engines
 * (chunking, clipping, serialisation of replace-last, cache policy) live in
 * the application layer above this interface.
 *
 * Connectivity failures must surface as `BackendUnavailableError`.
 */
export interface StorageBackend {
  /** Short identifier used in logs (`postgres`, `mongodb`, `memory`). */
  readonly name: string;

  /** Establishes the connection. Rejects when the engine is unreachable. */
  connect(): Promise<void>;
  close(): Promise<void>;

  // ─── Buckets ──────────────────────────────────────────────

  listBuckets(): Promise<BucketRow[]>;
  findBucket(bucketId: string): Promise<BucketRow | undefined>;
  /** Returns undefined when a bucket with that id already exists. */
  insertBucket(metadata: BucketMetadata): Promise<BucketRow | undefined>;
  /** Removes every event of the bucket, then the bucket itself. */
  deleteBucket(key: BucketKey): Promise<void>;

  // ─── Events ───────────────────────────────────────────────

  findEvent(key: BucketKey, eventId: EventId): Promise<PersistedEvent | undefined>;
  /**
   * Events overlapping `range`, newest `timestamp` first, at most `limit`.
   * Results are not clipped.
   */
  findEvents(key: BucketKey, range: TimeRange, limit: number): Promise<PersistedEvent[]>;
  countEvents(key: BucketKey, range: TimeRange): Promise<number>;
  /** Event with the greatest `timestamp`, optionally restricted to `[from, to)`. */
  findLastEvent(key: BucketKey, window?: DayWindow): Promise<PersistedEvent | undefined>;
  insertEvent(key: BucketKey, event: EventBody): Promise<PersistedEvent>;
  /** Inserts one chunk. A chunk is applied entirely or not at all. */
  insertEvents(key: BucketKey, events: readonly EventBody[]): Promise<void>;
  /** Full overwrite; undefined when no such event exists in the bucket. */
  updateEvent(key: BucketKey, eventId: EventId, event: EventBody): Promise<PersistedEvent | undefined>;
  deleteEvent(key: BucketKey, eventId: EventId): Promise<boolean>;

  // ─── Auxiliary records ────────────────────────────────────

  /** Deletes every credential with the record's email, then inserts it. */
  replaceCredential(record: CredentialRecord): Promise<CredentialRecord>;
  findCredential(email: string): Promise<CredentialRecord | undefined>;
  listCredentials(): Promise<CredentialRecord[]>;
  /** Credentials whose `last_used_at` is at or after `threshold`. */
  listCredentialsUsedSince(threshold: Date): Promise<CredentialRecord[]>;

  /** Deletes reports of the same email dated within `window`, then inserts. */
  replaceReport(record: ReportRecord, window: DayWindow): Promise<ReportRecord>;
  findReport(email: string, window: DayWindow): Promise<ReportRecord | undefined>;
}
