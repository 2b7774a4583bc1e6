import { overlaps, persistedEvent } from '../../domain/index.js';
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
} from '../../domain/index.js';
import type { StorageBackend } from '../../application/index.js';

interface BucketSlot {
  row: BucketRow;
  events: Map<EventId, PersistedEvent>;
}

/**
 * In-process backend holding everything in maps.
 *
 * Used by the `memory` engine mode and as the stand-in engine in tests.
 * Values are copied on the way in and out, so callers can never alias
 * stored state.
 */
export class MemoryBackend implements StorageBackend {
  readonly name = 'memory';

  private readonly buckets = new Map<string, BucketSlot>();
  private readonly keyIndex = new Map<BucketKey, string>();
  private credentials: CredentialRecord[] = [];
  private reports: ReportRecord[] = [];
  private nextBucketKey = 1;
  private nextEventId = 1;

  async connect(): Promise<void> {
    // Nothing to reach
  }

  async close(): Promise<void> {
    this.buckets.clear();
    this.keyIndex.clear();
    this.credentials = [];
    this.reports = [];
  }

  // ─── Buckets ──────────────────────────────────────────────

  async listBuckets(): Promise<BucketRow[]> {
    return [...this.buckets.values()].map((slot) => copyRow(slot.row));
  }

  async findBucket(bucketId: string): Promise<BucketRow | undefined> {
    const slot = this.buckets.get(bucketId);
    return slot ? copyRow(slot.row) : undefined;
  }

  async insertBucket(metadata: BucketMetadata): Promise<BucketRow | undefined> {
    if (this.buckets.has(metadata.id)) {
      return undefined;
    }
    const key = String(this.nextBucketKey++);
    const row: BucketRow = { ...metadata, created: new Date(metadata.created.getTime()), key };
    this.buckets.set(metadata.id, { row, events: new Map() });
    this.keyIndex.set(key, metadata.id);
    return copyRow(row);
  }

  async deleteBucket(key: BucketKey): Promise<void> {
    const bucketId = this.keyIndex.get(key);
    if (bucketId === undefined) {
      return;
    }
    this.buckets.get(bucketId)?.events.clear();
    this.buckets.delete(bucketId);
    this.keyIndex.delete(key);
  }

  // ─── Events ───────────────────────────────────────────────

  async findEvent(key: BucketKey, eventId: EventId): Promise<PersistedEvent | undefined> {
    const event = this.events(key).get(eventId);
    return event ? copyEvent(event) : undefined;
  }

  async findEvents(key: BucketKey, range: TimeRange, limit: number): Promise<PersistedEvent[]> {
    return this.newestFirst(key)
      .filter((event) => overlaps(event, range))
      .slice(0, limit)
      .map(copyEvent);
  }

  async countEvents(key: BucketKey, range: TimeRange): Promise<number> {
    let count = 0;
    for (const event of this.events(key).values()) {
      if (overlaps(event, range)) count++;
    }
    return count;
  }

  async findLastEvent(key: BucketKey, window?: DayWindow): Promise<PersistedEvent | undefined> {
    const last = this.newestFirst(key).find(
      (event) =>
        window === undefined ||
        (event.timestamp.getTime() >= window.from.getTime() && event.timestamp.getTime() < window.to.getTime()),
    );
    return last ? copyEvent(last) : undefined;
  }

  async insertEvent(key: BucketKey, event: EventBody): Promise<PersistedEvent> {
    const stored = persistedEvent(String(this.nextEventId++), copyBody(event));
    this.events(key).set(stored.id, stored);
    return copyEvent(stored);
  }

  async insertEvents(key: BucketKey, events: readonly EventBody[]): Promise<void> {
    const target = this.events(key);
    for (const event of events) {
      const stored = persistedEvent(String(this.nextEventId++), copyBody(event));
      target.set(stored.id, stored);
    }
  }

  async updateEvent(key: BucketKey, eventId: EventId, event: EventBody): Promise<PersistedEvent | undefined> {
    const target = this.events(key);
    if (!target.has(eventId)) {
      return undefined;
    }
    const stored = persistedEvent(eventId, copyBody(event));
    target.set(eventId, stored);
    return copyEvent(stored);
  }

  async deleteEvent(key: BucketKey, eventId: EventId): Promise<boolean> {
    return this.events(key).delete(eventId);
  }

  // ─── Auxiliary records ────────────────────────────────────

  async replaceCredential(record: CredentialRecord): Promise<CredentialRecord> {
    this.credentials = this.credentials.filter((c) => c.email !== record.email);
    const stored = copyCredential(record);
    this.credentials.push(stored);
    return copyCredential(stored);
  }

  async findCredential(email: string): Promise<CredentialRecord | undefined> {
    const found = this.credentials.find((c) => c.email === email);
    return found ? copyCredential(found) : undefined;
  }

  async listCredentials(): Promise<CredentialRecord[]> {
    return this.credentials.map(copyCredential);
  }

  async listCredentialsUsedSince(threshold: Date): Promise<CredentialRecord[]> {
    return this.credentials
      .filter((c) => c.last_used_at !== null && c.last_used_at.getTime() >= threshold.getTime())
      .map(copyCredential);
  }

  async replaceReport(record: ReportRecord, window: DayWindow): Promise<ReportRecord> {
    this.reports = this.reports.filter((r) => !(r.email === record.email && withinWindow(r.date, window)));
    const stored = copyReport(record);
    this.reports.push(stored);
    return copyReport(stored);
  }

  async findReport(email: string, window: DayWindow): Promise<ReportRecord | undefined> {
    const found = this.reports.find((r) => r.email === email && withinWindow(r.date, window));
    return found ? copyReport(found) : undefined;
  }

  // ─── Helpers ──────────────────────────────────────────────

  /** Events of a bucket; an unknown key behaves as an empty bucket. */
  private events(key: BucketKey): Map<EventId, PersistedEvent> {
    const bucketId = this.keyIndex.get(key);
    const slot = bucketId === undefined ? undefined : this.buckets.get(bucketId);
    return slot?.events ?? new Map<EventId, PersistedEvent>();
  }

  private newestFirst(key: BucketKey): PersistedEvent[] {
    // Equal timestamps: later insert first, as the SQL and document backends order by id
    return [...this.events(key).values()].sort(
      (a, b) => b.timestamp.getTime() - a.timestamp.getTime() || Number(b.id) - Number(a.id),
    );
  }
}

function withinWindow(date: Date, window: DayWindow): boolean {
  return date.getTime() >= window.from.getTime() && date.getTime() < window.to.getTime();
}

function copyRow(row: BucketRow): BucketRow {
  return { ...row, created: new Date(row.created.getTime()) };
}

function copyBody(event: EventBody): EventBody {
  return {
    timestamp: new Date(event.timestamp.getTime()),
    duration: event.duration,
    data: structuredClone(event.data),
  };
}

function copyEvent(event: PersistedEvent): PersistedEvent {
  return persistedEvent(event.id, copyBody(event));
}

function copyCredential(record: CredentialRecord): CredentialRecord {
  return {
    ...record,
    last_used_at: record.last_used_at === null ? null : new Date(record.last_used_at.getTime()),
  };
}

function copyReport(record: ReportRecord): ReportRecord {
  return { ...record, date: new Date(record.date.getTime()) };
}
