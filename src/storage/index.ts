import type { CoordinationConfig } from '../config/index.js';
import type { StorageProvider } from './StorageProvider.js';
import { FileStorageProvider } from './FileStorageProvider.js';

/**
 * Create a storage provider based on configuration
 */
export function createStorageProvider(config: CoordinationConfig): StorageProvider {
  return new FileStorageProvider(config.storage.dataDir, {
    lockStaleMs: config.storage.lockStaleMs,
    maxRetries: config.storage.maxRetries,
  });
}

export * from './StorageProvider.js';
export * from './FileStorageProvider.js';
export * from './records.js';
