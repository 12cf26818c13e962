import type {
  DeleteResult,
  DocumentBody,
  GetResult,
  PutResult,
  StoredDocument,
  WriteOptions,
} from '../types/index.js';
import { BusyError } from '../utils/errors.js';
import { backoff } from '../utils/index.js';
import { logger } from '../utils/logger.js';

/**
 * Key-value storage contract for the coordination core.
 *
 * Keys are slash-separated namespaces (`agents/<id>/context`,
 * `locks/<projectId>/<slot>`). Every write names the version it expects to
 * replace: 0 creates, anything else must equal the stored version. Implementations
 * must make each single-key read-verify-write atomic across processes.
 */
export interface StorageProvider {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;

  get(key: string): Promise<GetResult>;
  put(key: string, record: DocumentBody, expectedVersion: number, options?: WriteOptions): Promise<PutResult>;

  // Soft delete: tombstones the record and bumps its version
  delete(key: string, expectedVersion: number, options?: WriteOptions): Promise<DeleteResult>;

  // Physical removal, reserved for reclaiming expired lock slots
  purge(key: string, expectedVersion: number, options?: WriteOptions): Promise<DeleteResult>;

  list(prefix: string): Promise<string[]>;

  // Move an unreadable record aside so the key can be written again
  quarantine(key: string): Promise<string | null>;

  // Bounded read-modify-write loop over put()
  mutate(key: string, update: (current: StoredDocument | null) => DocumentBody): Promise<StoredDocument>;
  mutate(key: string, update: MutateFn): Promise<StoredDocument | null>;

  // Retry budget shared by every optimistic loop built on this store
  getRetryOptions(): RetryOptions;

  healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}

/**
 * Receives the live record (null when absent or tombstoned) and returns the
 * new document body, or null to leave the key untouched.
 */
export type MutateFn = (current: StoredDocument | null) => DocumentBody | null;

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
}

/**
 * Base class for storage providers with common functionality
 */
export abstract class BaseStorageProvider implements StorageProvider {
  protected initialized = false;
  protected retry: RetryOptions;

  constructor(retry: Partial<RetryOptions> = {}) {
    this.retry = {
      maxRetries: retry.maxRetries ?? 10,
      baseDelayMs: retry.baseDelayMs ?? 5,
    };
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.doInitialize();
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.doClose();
    this.initialized = false;
  }

  protected ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Storage provider not initialized. Call initialize() first.');
    }
  }

  getRetryOptions(): RetryOptions {
    return { ...this.retry };
  }

  mutate(key: string, update: (current: StoredDocument | null) => DocumentBody): Promise<StoredDocument>;
  mutate(key: string, update: MutateFn): Promise<StoredDocument | null>;
  async mutate(key: string, update: MutateFn): Promise<StoredDocument | null> {
    for (let attempt = 0; attempt <= this.retry.maxRetries; attempt++) {
      const current = await this.get(key);
      const live = current.status === 'found' ? current.record : null;
      const expectedVersion = current.status === 'found' ? current.record.version : current.version;

      const next = update(live);
      if (next === null) {
        return live;
      }

      const result = await this.put(key, next, expectedVersion);
      if (result.status === 'ok') {
        return { ...next, version: result.version, isDeleted: false };
      }

      logger.trace('Optimistic write conflict, retrying', {
        operation: 'mutate',
        key,
        attempt,
        expectedVersion: result.expectedVersion,
        actualVersion: result.actualVersion,
      });
      await backoff(attempt, this.retry.baseDelayMs);
    }

    throw new BusyError(key, this.retry.maxRetries + 1, 'version conflicts');
  }

  // Abstract methods that implementations must provide
  protected abstract doInitialize(): Promise<void>;
  protected abstract doClose(): Promise<void>;

  abstract get(key: string): Promise<GetResult>;
  abstract put(key: string, record: DocumentBody, expectedVersion: number, options?: WriteOptions): Promise<PutResult>;
  abstract delete(key: string, expectedVersion: number, options?: WriteOptions): Promise<DeleteResult>;
  abstract purge(key: string, expectedVersion: number, options?: WriteOptions): Promise<DeleteResult>;
  abstract list(prefix: string): Promise<string[]>;
  abstract quarantine(key: string): Promise<string | null>;
  abstract healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}
