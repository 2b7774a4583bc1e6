export { MongoBackend, createMongoBackend, isMongoConnectionError, overlapFilter } from './mongo-backend.js';
export type { MongoBackendOptions } from './mongo-backend.js';
export { createModels } from './models.js';
export type { MongoModels, BucketDoc, EventDoc, UserDoc, ReportDoc } from './models.js';
