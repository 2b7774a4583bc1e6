import type { Logger } from 'pino';
import { BucketNotFoundError, DuplicateBucketError, toMetadata } from '../domain/index.js';
import type { BucketKey, BucketMetadata, BucketRow } from '../domain/index.js';
import type { StorageBackend } from './storage-backend.js';
import { createBucketSchema } from './event-schema.js';
import type { CreateBucketInput } from './event-schema.js';
import { parseWith } from './validation.js';

export const DEFAULT_BUCKET_CACHE_TTL_MS = 5_000;

export interface BucketDirectoryOptions {
  /** How long a bucket listing is reused before re-enumerating. */
  freshnessMs?: number;
  /** Millisecond clock; injectable for tests. */
  clock?: () => number;
}

/**
 * Bucket lifecycle plus a time-boxed metadata cache.
 *
 * The cache is a snapshot of every bucket row keyed by public id. It is
 * reused while younger than `freshnessMs` and is dropped on every create
 * and delete made through this directory, so a single engine instance
 * always sees its own writes. Writes from other instances become visible
 * within one freshness window.
 */
export class BucketDirectory {
  private readonly freshnessMs: number;
  private readonly clock: () => number;

  private cache: ReadonlyMap<string, BucketRow> | null = null;
  private cachedAt = 0;
  private generation = 0;
  private refreshing: Promise<ReadonlyMap<string, BucketRow>> | null = null;

  constructor(
    private readonly backend: StorageBackend,
    private readonly log: Logger,
    options: BucketDirectoryOptions = {},
  ) {
    this.freshnessMs = options.freshnessMs ?? DEFAULT_BUCKET_CACHE_TTL_MS;
    this.clock = options.clock ?? Date.now;
  }

  async create(input: CreateBucketInput): Promise<BucketMetadata> {
    const metadata = parseWith(createBucketSchema, input, { bucketId: input.id });

    const existing = await this.backend.findBucket(metadata.id);
    if (existing) {
      throw new DuplicateBucketError(metadata.id);
    }

    // The backend also enforces uniqueness; a concurrent creator lands here
    const row = await this.backend.insertBucket(metadata);
    if (!row) {
      throw new DuplicateBucketError(metadata.id);
    }

    this.invalidate();
    this.log.info({ bucketId: row.id, type: row.type }, 'Bucket created');
    return toMetadata(row);
  }

  async delete(bucketId: string): Promise<void> {
    const row = await this.backend.findBucket(bucketId);
    if (!row) {
      throw new BucketNotFoundError(bucketId);
    }

    await this.backend.deleteBucket(row.key);
    this.invalidate();
    this.log.info({ bucketId }, 'Bucket deleted');
  }

  async getMetadata(bucketId: string): Promise<BucketMetadata> {
    const row = await this.backend.findBucket(bucketId);
    if (!row) {
      throw new BucketNotFoundError(bucketId);
    }
    return toMetadata(row);
  }

  async list(): Promise<Record<string, BucketMetadata>> {
    const snapshot = await this.snapshot();
    // Ids are caller-chosen; fromEntries defines own keys, so "__proto__" stays a bucket
    return Object.fromEntries([...snapshot].map(([id, row]) => [id, toMetadata(row)]));
  }

  /**
   * Maps a public bucket id to its internal key. Falls through to the
   * backend on a cache miss so buckets created elsewhere resolve at once.
   */
  async resolve(bucketId: string): Promise<BucketKey> {
    const cached = this.isFresh() ? this.cache?.get(bucketId) : undefined;
    if (cached) {
      return cached.key;
    }

    const row = await this.backend.findBucket(bucketId);
    if (!row) {
      throw new BucketNotFoundError(bucketId);
    }
    return row.key;
  }

  invalidate(): void {
    this.cache = null;
    this.cachedAt = 0;
    this.generation++;
    this.refreshing = null;
  }

  private isFresh(): boolean {
    return this.cache !== null && this.clock() - this.cachedAt < this.freshnessMs;
  }

  private async snapshot(): Promise<ReadonlyMap<string, BucketRow>> {
    if (this.cache !== null && this.isFresh()) {
      return this.cache;
    }

    // Single-flight: concurrent callers share one enumeration
    if (this.refreshing) {
      return this.refreshing;
    }
    const pending: Promise<ReadonlyMap<string, BucketRow>> = this.refresh().finally(() => {
      if (this.refreshing === pending) {
        this.refreshing = null;
      }
    });
    this.refreshing = pending;
    return pending;
  }

  private async refresh(): Promise<ReadonlyMap<string, BucketRow>> {
    const generation = this.generation;
    const rows = await this.backend.listBuckets();
    const next = new Map(rows.map((row) => [row.id, row] as const));

    // An invalidation during the enumeration makes this snapshot stale
    if (generation === this.generation) {
      this.cache = next;
      this.cachedAt = this.clock();
    }
    this.log.debug({ bucketCount: next.size, backend: this.backend.name }, 'Bucket cache refreshed');
    return next;
  }
}
