import { asc, eq } from 'drizzle-orm';
import type { BucketMetadata, BucketRow } from '../../domain/index.js';
import type { Database } from './client.js';
import { buckets, events } from './schema.js';

/** Row shape returned by bucket queries. */
export type BucketDbRow = typeof buckets.$inferSelect;

export function toBucketRow(row: BucketDbRow): BucketRow {
  return {
    key: String(row.key),
    id: row.id,
    name: row.name,
    type: row.type,
    client: row.client,
    hostname: row.hostname,
    created: row.created,
  };
}

export async function findAllBuckets(db: Database): Promise<BucketRow[]> {
  const rows = await db.select().from(buckets).orderBy(asc(buckets.key));
  return rows.map(toBucketRow);
}

export async function findBucketById(db: Database, bucketId: string): Promise<BucketRow | undefined> {
  const rows = await db.select().from(buckets).where(eq(buckets.id, bucketId)).limit(1);
  const row = rows[0];
  return row ? toBucketRow(row) : undefined;
}

/**
 * Inserts a bucket, relying on the unique index on `id`.
 * Returns undefined if the id was already taken.
 */
export async function insertBucket(db: Database, metadata: BucketMetadata): Promise<BucketRow | undefined> {
  const rows = await db
    .insert(buckets)
    .values({
      id: metadata.id,
      name: metadata.name,
      type: metadata.type,
      client: metadata.client,
      hostname: metadata.hostname,
      created: metadata.created,
    })
    .onConflictDoNothing({ target: buckets.id })
    .returning();

  const row = rows[0];
  return row ? toBucketRow(row) : undefined;
}

/** Deletes the bucket's events, then the bucket, in one transaction. */
export async function deleteBucketByKey(db: Database, key: number): Promise<void> {
  await db.transaction(async (tx) => {
    await tx.delete(events).where(eq(events.bucket_key, key));
    await tx.delete(buckets).where(eq(buckets.key, key));
  });
}
