import type { Logger } from 'pino';
import { StorageEngine } from '../application/index.js';
import type { StorageBackend } from '../application/index.js';
import { datasetName } from '../config.js';
import type { StorageConfig } from '../config.js';
import { createPostgresBackend } from './db/index.js';
import { createMongoBackend } from './mongo/index.js';
import { MemoryBackend } from './memory/index.js';

/**
 * In testing mode the database named in the URL gets a `-testing` suffix,
 * so tests never touch production rows.
 */
export function postgresUrlFor(config: Pick<StorageConfig, 'databaseUrl' | 'testing'>): string {
  if (!config.testing) {
    return config.databaseUrl;
  }
  const url = new URL(config.databaseUrl);
  const database = url.pathname.replace(/^\//, '') || 'postgres';
  url.pathname = `/${database}-testing`;
  return url.toString();
}

/** Picks the concrete backend named by the configuration. */
export function createBackend(config: StorageConfig, log: Logger): StorageBackend {
  switch (config.backend) {
    case 'postgres':
      return createPostgresBackend({
        databaseUrl: postgresUrlFor(config),
        connectTimeout: Math.max(1, Math.ceil(config.connectTimeoutMs / 1000)),
        log,
      });
    case 'mongodb':
      return createMongoBackend({
        url: config.mongodbUrl,
        dbName: datasetName(config),
        serverSelectionTimeoutMS: config.connectTimeoutMs,
        log,
      });
    case 'memory':
      return new MemoryBackend();
  }
}

/** Builds the configured backend and opens an engine over it. */
export async function openStorage(config: StorageConfig, log: Logger): Promise<StorageEngine> {
  const backend = createBackend(config, log);
  log.info({ backend: backend.name, testing: config.testing }, 'Opening storage engine');
  return StorageEngine.open(backend, {
    log,
    freshnessMs: config.bucketCacheTtlMs,
    chunkSize: config.insertChunkSize,
  });
}
