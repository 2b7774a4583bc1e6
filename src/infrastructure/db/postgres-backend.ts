import type { Logger } from 'pino';
import { BackendUnavailableError } from '../../domain/index.js';
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
import { createDbClient } from './client.js';
import type { Database, DbClientOptions, Sql } from './client.js';
import { ensureSchema } from './migrate.js';
import { parseSerial } from './keys.js';
import { deleteBucketByKey, findAllBuckets, findBucketById, insertBucket } from './bucket-repository.js';
import {
  countEvents,
  deleteEvent,
  findEventById,
  findLastEvent,
  insertEvent,
  insertEvents,
  queryEvents,
  updateEvent,
} from './event-repository.js';
import { findAllUsers, findUserByEmail, findUsersUsedSince, replaceUser } from './user-repository.js';
import { findReport, replaceReport } from './report-repository.js';

/** Error codes postgres.js and Node's net layer use for transport failures. */
const CONNECTION_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
]);

/** True for transport-level failures, looking through wrapped causes. */
export function isConnectionError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string' && CONNECTION_ERROR_CODES.has(code)) {
    return true;
  }
  return isConnectionError(err.cause);
}

export interface PostgresClient {
  sql: Sql;
  db: Database;
}

/**
 * Relational backend: drizzle-orm over postgres.js.
 *
 * Bucket keys are the `buckets.key` serial and event ids the
 * `events.id` bigserial, both carried as decimal strings.
 */
export class PostgresBackend implements StorageBackend {
  readonly name = 'postgres';

  private readonly sql: Sql;
  private readonly db: Database;

  constructor(client: PostgresClient, private readonly log: Logger) {
    this.sql = client.sql;
    this.db = client.db;
  }

  async connect(): Promise<void> {
    await this.guard('connect', async () => {
      await this.sql`select 1`;
      await ensureSchema(this.sql);
    });
    this.log.info('PostgreSQL connected, schema ready');
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
    this.log.info('PostgreSQL disconnected');
  }

  // ─── Buckets ──────────────────────────────────────────────

  listBuckets(): Promise<BucketRow[]> {
    return this.guard('listBuckets', () => findAllBuckets(this.db));
  }

  findBucket(bucketId: string): Promise<BucketRow | undefined> {
    return this.guard('findBucket', () => findBucketById(this.db, bucketId));
  }

  insertBucket(metadata: BucketMetadata): Promise<BucketRow | undefined> {
    return this.guard('insertBucket', () => insertBucket(this.db, metadata));
  }

  deleteBucket(key: BucketKey): Promise<void> {
    return this.guard('deleteBucket', () => deleteBucketByKey(this.db, bucketKey(key)));
  }

  // ─── Events ───────────────────────────────────────────────

  async findEvent(key: BucketKey, eventId: EventId): Promise<PersistedEvent | undefined> {
    const id = parseSerial(eventId);
    if (id === undefined) {
      return undefined;
    }
    return this.guard('findEvent', () => findEventById(this.db, bucketKey(key), id));
  }

  findEvents(key: BucketKey, range: TimeRange, limit: number): Promise<PersistedEvent[]> {
    return this.guard('findEvents', () => queryEvents(this.db, bucketKey(key), range, limit));
  }

  countEvents(key: BucketKey, range: TimeRange): Promise<number> {
    return this.guard('countEvents', () => countEvents(this.db, bucketKey(key), range));
  }

  findLastEvent(key: BucketKey, window?: DayWindow): Promise<PersistedEvent | undefined> {
    return this.guard('findLastEvent', () => findLastEvent(this.db, bucketKey(key), window));
  }

  insertEvent(key: BucketKey, event: EventBody): Promise<PersistedEvent> {
    return this.guard('insertEvent', () => insertEvent(this.db, bucketKey(key), event));
  }

  insertEvents(key: BucketKey, events: readonly EventBody[]): Promise<void> {
    return this.guard('insertEvents', () => insertEvents(this.db, bucketKey(key), events));
  }

  async updateEvent(key: BucketKey, eventId: EventId, event: EventBody): Promise<PersistedEvent | undefined> {
    const id = parseSerial(eventId);
    if (id === undefined) {
      return undefined;
    }
    return this.guard('updateEvent', () => updateEvent(this.db, bucketKey(key), id, event));
  }

  async deleteEvent(key: BucketKey, eventId: EventId): Promise<boolean> {
    const id = parseSerial(eventId);
    if (id === undefined) {
      return false;
    }
    return this.guard('deleteEvent', () => deleteEvent(this.db, bucketKey(key), id));
  }

  // ─── Auxiliary records ────────────────────────────────────

  replaceCredential(record: CredentialRecord): Promise<CredentialRecord> {
    return this.guard('replaceCredential', () => replaceUser(this.db, record));
  }

  findCredential(email: string): Promise<CredentialRecord | undefined> {
    return this.guard('findCredential', () => findUserByEmail(this.db, email));
  }

  listCredentials(): Promise<CredentialRecord[]> {
    return this.guard('listCredentials', () => findAllUsers(this.db));
  }

  listCredentialsUsedSince(threshold: Date): Promise<CredentialRecord[]> {
    return this.guard('listCredentialsUsedSince', () => findUsersUsedSince(this.db, threshold));
  }

  replaceReport(record: ReportRecord, window: DayWindow): Promise<ReportRecord> {
    return this.guard('replaceReport', () => replaceReport(this.db, record, window));
  }

  findReport(email: string, window: DayWindow): Promise<ReportRecord | undefined> {
    return this.guard('findReport', () => findReport(this.db, email, window));
  }

  /** Runs a query, translating transport failures to `BackendUnavailableError`. */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isConnectionError(err)) {
        throw new BackendUnavailableError(operation, err);
      }
      throw err;
    }
  }
}

/** Bucket keys are only ever issued by this backend, so a bad one is a bug. */
function bucketKey(key: BucketKey): number {
  const parsed = parseSerial(key);
  if (parsed === undefined) {
    throw new Error(`Malformed bucket key "${key}"`);
  }
  return parsed;
}

export interface PostgresBackendOptions extends DbClientOptions {
  databaseUrl: string;
  log: Logger;
}

export function createPostgresBackend(options: PostgresBackendOptions): PostgresBackend {
  const client = createDbClient(options.databaseUrl, options);
  return new PostgresBackend(client, options.log);
}
