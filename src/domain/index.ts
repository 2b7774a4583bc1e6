export type { Event, EventBody, EventData, EventId, PendingEvent, PersistedEvent } from './event.js';
export { pendingEvent, persistedEvent, eventBody } from './event.js';
export type { BucketMetadata, BucketKey, BucketRow } from './bucket.js';
export { toMetadata } from './bucket.js';
export type { CredentialRecord, ReportRecord, Report } from './records.js';
export type { Interval, TimeRange, DayWindow } from './time.js';
export { toUtc, intervalEnd, overlaps, clip, utcDay } from './time.js';
export {
  StorageError,
  BucketNotFoundError,
  DuplicateBucketError,
  EventNotFoundError,
  BackendUnavailableError,
  ValidationError,
  PartialInsertError,
  RollbackFailedError,
} from './errors.js';
export type { StorageErrorCode, StorageErrorContext, ValidationIssue } from './errors.js';
