import mongoose, { Types, isValidObjectId } from 'mongoose';
import type { Connection, FilterQuery } from 'mongoose';
import type { Logger } from 'pino';
import { BackendUnavailableError, RollbackFailedError } from '../../domain/index.js';
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
import { createModels } from './models.js';
import type { BucketDoc, EventDoc, MongoModels, ReportDoc, UserDoc } from './models.js';
import { toBucketRow, toCredential, toEvent, toReport } from './mappers.js';

/** Driver error classes that mean "could not talk to the server". */
const CONNECTION_ERROR_NAMES: ReadonlySet<string> = new Set([
  'MongoServerSelectionError',
  'MongooseServerSelectionError',
  'MongoNetworkError',
  'MongoNetworkTimeoutError',
  'MongoNotConnectedError',
  'MongoTopologyClosedError',
]);

const DUPLICATE_KEY = 11000;

export function isMongoConnectionError(err: unknown): boolean {
  return err instanceof Error && CONNECTION_ERROR_NAMES.has(err.name);
}

function isDuplicateKey(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === DUPLICATE_KEY;
}

export interface MongoBackendOptions {
  url: string;
  dbName: string;
  /** How long the initial server selection may take before failing. */
  serverSelectionTimeoutMS?: number;
  log: Logger;
}

/**
 * Document backend: mongoose over one dedicated connection.
 *
 * Buckets and events live in two collections; events reference their
 * bucket by its ObjectId, which doubles as the internal bucket key.
 */
export class MongoBackend implements StorageBackend {
  readonly name = 'mongodb';

  private connection: Connection | null = null;
  private bound: MongoModels | null = null;
  private readonly log: Logger;

  constructor(private readonly options: MongoBackendOptions) {
    this.log = options.log;
  }

  async connect(): Promise<void> {
    await this.guard('connect', async () => {
      const connection = await mongoose
        .createConnection(this.options.url, {
          dbName: this.options.dbName,
          serverSelectionTimeoutMS: this.options.serverSelectionTimeoutMS ?? 5000,
        })
        .asPromise();
      const models = createModels(connection);
      await Promise.all([models.Bucket.init(), models.Event.init(), models.User.init(), models.Report.init()]);
      this.connection = connection;
      this.bound = models;
    });
    this.log.info({ dbName: this.options.dbName }, 'MongoDB connected');
  }

  async close(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
      this.bound = null;
      this.log.info('MongoDB disconnected');
    }
  }

  // ─── Buckets ──────────────────────────────────────────────

  listBuckets(): Promise<BucketRow[]> {
    return this.guard('listBuckets', async () => {
      const docs = await this.models.Bucket.find().sort({ _id: 1 }).lean<BucketDoc[]>().exec();
      return docs.map(toBucketRow);
    });
  }

  findBucket(bucketId: string): Promise<BucketRow | undefined> {
    return this.guard('findBucket', async () => {
      const doc = await this.models.Bucket.findOne({ bucket_id: bucketId }).lean<BucketDoc>().exec();
      return doc ? toBucketRow(doc) : undefined;
    });
  }

  insertBucket(metadata: BucketMetadata): Promise<BucketRow | undefined> {
    return this.guard('insertBucket', async () => {
      try {
        const doc = await this.models.Bucket.create({
          bucket_id: metadata.id,
          name: metadata.name,
          type: metadata.type,
          client: metadata.client,
          hostname: metadata.hostname,
          created: metadata.created,
        });
        return toBucketRow(doc.toObject());
      } catch (err) {
        if (isDuplicateKey(err)) {
          return undefined;
        }
        throw err;
      }
    });
  }

  deleteBucket(key: BucketKey): Promise<void> {
    return this.guard('deleteBucket', async () => {
      const bucket = new Types.ObjectId(key);
      await this.models.Event.deleteMany({ bucket }).exec();
      await this.models.Bucket.deleteOne({ _id: bucket }).exec();
    });
  }

  // ─── Events ───────────────────────────────────────────────

  findEvent(key: BucketKey, eventId: EventId): Promise<PersistedEvent | undefined> {
    if (!isValidObjectId(eventId)) {
      return Promise.resolve(undefined);
    }
    return this.guard('findEvent', async () => {
      const doc = await this.models.Event.findOne(this.eventFilter(key, eventId)).lean<EventDoc>().exec();
      return doc ? toEvent(doc) : undefined;
    });
  }

  findEvents(key: BucketKey, range: TimeRange, limit: number): Promise<PersistedEvent[]> {
    return this.guard('findEvents', async () => {
      const docs = await this.models.Event.find(overlapFilter(key, range))
        .sort({ timestamp: -1, _id: -1 })
        .limit(limit)
        .lean<EventDoc[]>()
        .exec();
      return docs.map(toEvent);
    });
  }

  countEvents(key: BucketKey, range: TimeRange): Promise<number> {
    return this.guard('countEvents', () => this.models.Event.countDocuments(overlapFilter(key, range)).exec());
  }

  findLastEvent(key: BucketKey, window?: DayWindow): Promise<PersistedEvent | undefined> {
    return this.guard('findLastEvent', async () => {
      const filter: FilterQuery<EventDoc> = { bucket: new Types.ObjectId(key) };
      if (window !== undefined) {
        filter.timestamp = { $gte: window.from, $lt: window.to };
      }
      const doc = await this.models.Event.findOne(filter).sort({ timestamp: -1, _id: -1 }).lean<EventDoc>().exec();
      return doc ? toEvent(doc) : undefined;
    });
  }

  insertEvent(key: BucketKey, event: EventBody): Promise<PersistedEvent> {
    return this.guard('insertEvent', async () => {
      const doc = await this.models.Event.create(toEventDoc(key, event));
      return toEvent(doc.toObject());
    });
  }

  /**
   * `insertMany` is not atomic in MongoDB, so ids are assigned up front
   * and a failed chunk is rolled back by deleting whatever landed. When
   * the rollback fails as well, `RollbackFailedError` reports that part of
   * the chunk may remain.
   */
  insertEvents(key: BucketKey, events: readonly EventBody[]): Promise<void> {
    if (events.length === 0) {
      return Promise.resolve();
    }
    return this.guard('insertEvents', async () => {
      const docs = events.map((event) => toEventDoc(key, event));
      try {
        await this.models.Event.insertMany(docs, { ordered: true });
      } catch (err) {
        const ids = docs.map((doc) => doc._id);
        try {
          await this.models.Event.deleteMany({ _id: { $in: ids } }).exec();
        } catch (rollbackErr) {
          this.log.error({ err: rollbackErr, chunkSize: docs.length }, 'Insert rollback failed');
          throw new RollbackFailedError(docs.length, err, rollbackErr);
        }
        throw err;
      }
    });
  }

  updateEvent(key: BucketKey, eventId: EventId, event: EventBody): Promise<PersistedEvent | undefined> {
    if (!isValidObjectId(eventId)) {
      return Promise.resolve(undefined);
    }
    return this.guard('updateEvent', async () => {
      const doc = await this.models.Event.findOneAndUpdate(
        this.eventFilter(key, eventId),
        { $set: { timestamp: event.timestamp, duration: event.duration, data: event.data } },
        { new: true },
      )
        .lean<EventDoc>()
        .exec();
      return doc ? toEvent(doc) : undefined;
    });
  }

  deleteEvent(key: BucketKey, eventId: EventId): Promise<boolean> {
    if (!isValidObjectId(eventId)) {
      return Promise.resolve(false);
    }
    return this.guard('deleteEvent', async () => {
      const result = await this.models.Event.deleteOne(this.eventFilter(key, eventId)).exec();
      return result.deletedCount > 0;
    });
  }

  // ─── Auxiliary records ────────────────────────────────────

  replaceCredential(record: CredentialRecord): Promise<CredentialRecord> {
    return this.guard('replaceCredential', async () => {
      // Single-document upsert on the unique email index; concurrent saves cannot both insert
      const doc = await this.models.User.findOneAndReplace(
        { email: record.email },
        { ...record },
        { upsert: true, returnDocument: 'after' },
      )
        .lean<UserDoc>()
        .exec();
      if (!doc) {
        throw new Error(`Upsert of credential ${record.email} returned no document`);
      }
      return toCredential(doc);
    });
  }

  findCredential(email: string): Promise<CredentialRecord | undefined> {
    return this.guard('findCredential', async () => {
      const doc = await this.models.User.findOne({ email }).lean<UserDoc>().exec();
      return doc ? toCredential(doc) : undefined;
    });
  }

  listCredentials(): Promise<CredentialRecord[]> {
    return this.guard('listCredentials', async () => {
      const docs = await this.models.User.find().sort({ _id: 1 }).lean<UserDoc[]>().exec();
      return docs.map(toCredential);
    });
  }

  listCredentialsUsedSince(threshold: Date): Promise<CredentialRecord[]> {
    return this.guard('listCredentialsUsedSince', async () => {
      const docs = await this.models.User.find({ last_used_at: { $gte: threshold } })
        .sort({ _id: 1 })
        .lean<UserDoc[]>()
        .exec();
      return docs.map(toCredential);
    });
  }

  replaceReport(record: ReportRecord, window: DayWindow): Promise<ReportRecord> {
    return this.guard('replaceReport', async () => {
      await this.models.Report.deleteMany(sameDay(record.email, window)).exec();
      const doc = await this.models.Report.create({ ...record });
      return toReport(doc.toObject());
    });
  }

  findReport(email: string, window: DayWindow): Promise<ReportRecord | undefined> {
    return this.guard('findReport', async () => {
      const doc = await this.models.Report.findOne(sameDay(email, window))
        .sort({ date: -1 })
        .lean<ReportDoc>()
        .exec();
      return doc ? toReport(doc) : undefined;
    });
  }

  // ─── Helpers ──────────────────────────────────────────────

  private get models(): MongoModels {
    if (!this.bound) {
      throw new BackendUnavailableError('query', new Error('MongoDB backend is not connected'));
    }
    return this.bound;
  }

  private eventFilter(key: BucketKey, eventId: EventId): FilterQuery<EventDoc> {
    return { _id: new Types.ObjectId(eventId), bucket: new Types.ObjectId(key) };
  }

  /** Runs a query, translating transport failures to `BackendUnavailableError`. */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isMongoConnectionError(err)) {
        throw new BackendUnavailableError(operation, err);
      }
      throw err;
    }
  }
}

/**
 * Overlap predicate: `timestamp <= end` and
 * `timestamp + duration >= start`, the latter via `$expr` since the end
 * instant is derived.
 */
export function overlapFilter(key: BucketKey, range: TimeRange): FilterQuery<EventDoc> {
  const filter: FilterQuery<EventDoc> = { bucket: new Types.ObjectId(key) };
  if (range.end !== undefined) {
    filter.timestamp = { $lte: range.end };
  }
  if (range.start !== undefined) {
    filter.$expr = {
      $gte: [{ $add: ['$timestamp', { $multiply: ['$duration', 1000] }] }, range.start],
    };
  }
  return filter;
}

function toEventDoc(key: BucketKey, event: EventBody): EventDoc {
  return {
    _id: new Types.ObjectId(),
    bucket: new Types.ObjectId(key),
    timestamp: event.timestamp,
    duration: event.duration,
    data: event.data,
  };
}

function sameDay(email: string, window: DayWindow): FilterQuery<ReportDoc> {
  return { email, date: { $gte: window.from, $lt: window.to } };
}

export function createMongoBackend(options: MongoBackendOptions): MongoBackend {
  return new MongoBackend(options);
}
