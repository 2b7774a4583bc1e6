import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { StorageEngine } from '../application/index.js';
import type { StorageBackend } from '../application/index.js';
import { loadStorageConfig } from '../config.js';
import type { StorageConfig } from '../config.js';
import type { Logger } from 'pino';
import { createBackend } from './backend-factory.js';
import { createLogger } from './logger.js';

export interface StoragePluginOptions {
  /** Defaults to `loadStorageConfig()` (environment variables). */
  config?: StorageConfig;
  /** Overrides the backend the config would select. */
  backend?: StorageBackend;
  /** Defaults to a pino logger at the configured level. */
  log?: Logger;
}

/**
 * Fastify plugin that manages the storage engine lifecycle.
 *
 * Decorates `fastify.storage` for use by routes.
 * Closes the backend connection on server shutdown.
 */
async function storagePlugin(fastify: FastifyInstance, options: StoragePluginOptions): Promise<void> {
  const config = options.config ?? loadStorageConfig();
  const log = options.log ?? createLogger(config.logLevel);
  const backend = options.backend ?? createBackend(config, log);

  const storage = await StorageEngine.open(backend, {
    log,
    freshnessMs: config.bucketCacheTtlMs,
    chunkSize: config.insertChunkSize,
  });

  fastify.decorate('storage', storage);

  fastify.addHook('onClose', async () => {
    await storage.close();
    fastify.log.info('Storage disconnected');
  });
}

export default fp(storagePlugin, {
  name: 'storage',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.storage` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    storage: StorageEngine;
  }
}
