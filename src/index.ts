export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { loadStorageConfig, datasetName, BACKENDS } from './config.js';
export type { StorageConfig, BackendKind } from './config.js';
