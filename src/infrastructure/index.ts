export { MemoryBackend } from './memory/index.js';
export { PostgresBackend, createPostgresBackend, createDbClient, ensureSchema, isConnectionError } from './db/index.js';
export type { Database, PostgresBackendOptions } from './db/index.js';
export { MongoBackend, createMongoBackend, isMongoConnectionError } from './mongo/index.js';
export type { MongoBackendOptions } from './mongo/index.js';
export { createBackend, openStorage, postgresUrlFor } from './backend-factory.js';
export { createLogger } from './logger.js';
export { default as storagePlugin } from './storage-plugin.js';
export type { StoragePluginOptions } from './storage-plugin.js';
