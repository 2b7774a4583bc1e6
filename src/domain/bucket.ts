/**
 * Bucket metadata. The shape is the same on every backend.
 */
export interface BucketMetadata {
  readonly id: string;
  readonly name: string | null;
  readonly type: string;
  readonly client: string;
  readonly hostname: string;
  readonly created: Date;
}

/**
 * Backend-local identity of a bucket. Only meaningful inside the engine
 * instance that issued it.
 */
export type BucketKey = string;

/** Metadata plus the internal key, as the backend stores it. */
export interface BucketRow extends BucketMetadata {
  readonly key: BucketKey;
}

export function toMetadata(row: BucketRow): BucketMetadata {
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    client: row.client,
    hostname: row.hostname,
    created: row.created,
  };
}
