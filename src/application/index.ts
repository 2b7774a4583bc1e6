export type { StorageBackend } from './storage-backend.js';
export { StorageEngine } from './storage-engine.js';
export type { StorageEngineOptions } from './storage-engine.js';
export { BucketDirectory, DEFAULT_BUCKET_CACHE_TTL_MS } from './bucket-directory.js';
export type { BucketDirectoryOptions } from './bucket-directory.js';
export { EventStore, DEFAULT_INSERT_CHUNK_SIZE, UNBOUNDED_LIMIT } from './event-store.js';
export type { EventStoreOptions, RangeQuery } from './event-store.js';
export { CredentialStore } from './credential-store.js';
export { UsageTracker } from './usage-tracker.js';
export { ReportStore } from './report-store.js';
export { KeyedMutex } from './keyed-mutex.js';
export {
  instantSchema,
  eventInputSchema,
  eventBatchSchema,
  eventBodySchema,
  timeRangeSchema,
  createBucketSchema,
} from './event-schema.js';
export type { EventInput, CreateBucketInput } from './event-schema.js';
export { credentialInputSchema, credentialFilterSchema, reportInputSchema } from './record-schema.js';
export type { CredentialInput, CredentialFilter, ReportInput } from './record-schema.js';
export { parseWith } from './validation.js';
