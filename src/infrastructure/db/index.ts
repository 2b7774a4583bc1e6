export { buckets, events, users, reports } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Sql, DbClientOptions } from './client.js';
export { ensureSchema } from './migrate.js';
export { PostgresBackend, createPostgresBackend, isConnectionError } from './postgres-backend.js';
export type { PostgresClient, PostgresBackendOptions } from './postgres-backend.js';
