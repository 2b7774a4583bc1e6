/**
 * Error taxonomy for the storage layer.
 *
 * Every error carries a machine-readable `code` plus the bucket and/or
 * event key it concerns, so callers can branch without string matching.
 */

export type StorageErrorCode =
  | 'BUCKET_NOT_FOUND'
  | 'DUPLICATE_BUCKET'
  | 'EVENT_NOT_FOUND'
  | 'BACKEND_UNAVAILABLE'
  | 'VALIDATION_ERROR'
  | 'PARTIAL_INSERT'
  | 'ROLLBACK_FAILED';

export interface StorageErrorContext {
  bucketId?: string;
  eventId?: string;
  cause?: unknown;
}

export class StorageError extends Error {
  readonly code: StorageErrorCode;
  readonly bucketId: string | undefined;
  readonly eventId: string | undefined;

  constructor(code: StorageErrorCode, message: string, context: StorageErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.code = code;
    this.bucketId = context.bucketId;
    this.eventId = context.eventId;
  }
}

export class BucketNotFoundError extends StorageError {
  constructor(bucketId: string) {
    super('BUCKET_NOT_FOUND', `Bucket "${bucketId}" does not exist`, { bucketId });
  }
}

export class DuplicateBucketError extends StorageError {
  constructor(bucketId: string) {
    super('DUPLICATE_BUCKET', `Bucket "${bucketId}" already exists`, { bucketId });
  }
}

export class EventNotFoundError extends StorageError {
  /** `eventId` is omitted when the lookup was "the last event" of an empty bucket. */
  constructor(bucketId: string, eventId?: string) {
    super(
      'EVENT_NOT_FOUND',
      eventId === undefined
        ? `Bucket "${bucketId}" has no events`
        : `Event "${eventId}" not found in bucket "${bucketId}"`,
      { bucketId, eventId },
    );
  }
}

export class BackendUnavailableError extends StorageError {
  readonly operation: string;

  constructor(operation: string, cause: unknown, context: Omit<StorageErrorContext, 'cause'> = {}) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('BACKEND_UNAVAILABLE', `Backend unavailable during ${operation}: ${reason}`, {
      ...context,
      cause,
    });
    this.operation = operation;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends StorageError {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], context: Omit<StorageErrorContext, 'cause'> = {}) {
    const summary = issues
      .map((i) => (i.path === '' ? i.message : `${i.path}: ${i.message}`))
      .join('; ');
    super('VALIDATION_ERROR', `Validation failed: ${summary}`, context);
    this.issues = issues;
  }
}

/**
 * A chunk write failed and undoing it failed too, so some of the chunk's
 * rows may be stored. `cause` is the write failure.
 */
export class RollbackFailedError extends StorageError {
  readonly rollbackError: unknown;

  constructor(chunkSize: number, cause: unknown, rollbackError: unknown) {
    const reason = rollbackError instanceof Error ? rollbackError.message : String(rollbackError);
    super(
      'ROLLBACK_FAILED',
      `Rolling back a failed insert of ${chunkSize} events also failed (${reason}); some of them may be stored`,
      { cause },
    );
    this.rollbackError = rollbackError;
  }
}

/**
 * Raised by a bulk insert when some chunks were committed before a later
 * chunk failed. `insertedCount` events (the leading chunks, in input order)
 * are durable; nothing from the failing chunk onward is.
 */
export class PartialInsertError extends StorageError {
  readonly insertedCount: number;
  readonly totalCount: number;
  /** True when the failing chunk could not be rolled back; `insertedCount` is then a lower bound. */
  readonly chunkMayBePartial: boolean;

  constructor(bucketId: string, insertedCount: number, totalCount: number, cause: unknown) {
    const chunkMayBePartial = cause instanceof RollbackFailedError;
    super(
      'PARTIAL_INSERT',
      `Inserted ${insertedCount} of ${totalCount} events into bucket "${bucketId}" before a chunk failed` +
        (chunkMayBePartial ? '; the failing chunk may be partially stored' : ''),
      { bucketId, cause },
    );
    this.insertedCount = insertedCount;
    this.totalCount = totalCount;
    this.chunkMayBePartial = chunkMayBePartial;
  }
}
