import path from 'path';
import lockfile from 'proper-lockfile';
import type {
  DeleteResult,
  DocumentBody,
  GetResult,
  PutResult,
  StoredDocument,
  WriteOptions,
} from '../types/index.js';
import { isErrorWithCode } from '../types/index.js';
import { BaseStorageProvider } from './StorageProvider.js';
import {
  ensureDirectory,
  writeFileAtomic,
  readFileSafe,
  listFilesRecursive,
  removeFileSafe,
  renameSafe,
} from '../utils/fileUtils.js';
import { BusyError, StorageCorruptionError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const KEY_SEGMENT = /^[a-zA-Z0-9_-]+$/;
const DOCUMENT_EXTENSION = '.json';

export interface FileStorageOptions {
  lockStaleMs?: number;   // age after which another process may break a key lock
  lockRetries?: number;   // attempts to take a busy key lock before giving up
  maxRetries?: number;    // optimistic retry budget used by mutate()
}

function splitKey(key: string, allowEmpty = false): string[] {
  const trimmed = key.replace(/\/+$/, '');
  if (trimmed === '' && allowEmpty) {
    return [];
  }
  const segments = trimmed.split('/');
  if (segments.some(segment => !KEY_SEGMENT.test(segment))) {
    throw new ValidationError(`Invalid storage key: ${key}`, [
      { field: 'key', message: 'Key segments may only contain letters, numbers, hyphens, and underscores', value: key },
    ]);
  }
  return segments;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Write layout: `{ id, ...fields, version, is_deleted }`
 */
function toDisk(body: Record<string, unknown>, version: number, isDeleted: boolean): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(body)) {
    if (name !== 'version' && name !== 'isDeleted' && name !== 'is_deleted') {
      fields[name] = value;
    }
  }
  return { id: body.id, ...fields, version, is_deleted: isDeleted };
}

function matchesFields(current: StoredDocument | null, options: WriteOptions): boolean {
  const { ifMatch } = options;
  if (!ifMatch) {
    return true;
  }
  if (!current) {
    return false;
  }
  return Object.entries(ifMatch).every(([name, value]) => JSON.stringify(current[name]) === JSON.stringify(value));
}

/**
 * File-based key-value storage using one JSON document per key.
 *
 * Every write goes through a temp file and an atomic rename. Each key's
 * read-verify-write runs under its own advisory lock (proper-lockfile), so
 * processes sharing the data directory only contend on the same key.
 */
export class FileStorageProvider extends BaseStorageProvider {
  private dataDir: string;
  private lockStaleMs: number;
  private lockRetries: number;
  private memoryLocks: Map<string, Promise<void>> = new Map();

  constructor(dataDir: string = './data', options: FileStorageOptions = {}) {
    super({ maxRetries: options.maxRetries });
    this.dataDir = dataDir;
    this.lockStaleMs = options.lockStaleMs ?? 10000;
    this.lockRetries = options.lockRetries ?? 50;
  }

  protected async doInitialize(): Promise<void> {
    await ensureDirectory(this.dataDir);
    await ensureDirectory(path.join(this.dataDir, 'agents'));
    await ensureDirectory(path.join(this.dataDir, 'locks'));
    await ensureDirectory(path.join(this.dataDir, 'global'));
  }

  protected async doClose(): Promise<void> {
    // No persistent connections to close for file storage
  }

  getDataDir(): string {
    return this.dataDir;
  }

  // Helper methods for file operations

  private getKeyFilePath(key: string): string {
    return path.join(this.dataDir, ...splitKey(key)) + DOCUMENT_EXTENSION;
  }

  /**
   * Run an operation while holding the key's in-process and cross-process locks.
   * Only ever one key at a time.
   */
  private async withKeyLock<T>(key: string, operation: (filePath: string) => Promise<T>): Promise<T> {
    this.ensureInitialized();

    const filePath = this.getKeyFilePath(key);

    // FIRST: in-process lock, so calls from this process queue instead of spinning on the lock dir
    while (this.memoryLocks.has(key)) {
      logger.trace('Waiting for in-memory lock', { operation: 'withKeyLock', key });
      await this.memoryLocks.get(key);
    }

    let resolveMemoryLock: () => void = () => undefined;
    const memoryLockPromise = new Promise<void>((resolve) => {
      resolveMemoryLock = resolve;
    });
    this.memoryLocks.set(key, memoryLockPromise);

    try {
      // SECOND: cross-process advisory lock on this key only
      await ensureDirectory(path.dirname(filePath));
      const lockStart = Date.now();
      let release: () => Promise<void>;
      try {
        release = await lockfile.lock(filePath, {
          realpath: false,
          stale: this.lockStaleMs,
          retries: {
            retries: this.lockRetries,
            minTimeout: 5,
            maxTimeout: 200,
            factor: 1.2,
            randomize: true,
          },
          onCompromised: (error) => {
            logger.error('Key lock compromised', { operation: 'withKeyLock', key }, error);
          },
        });
      } catch (error) {
        if (isErrorWithCode(error) && error.code === 'ELOCKED') {
          throw new BusyError(key, this.lockRetries + 1, 'key lock held by another process');
        }
        throw error;
      }
      logger.trace('Key lock acquired', {
        operation: 'withKeyLock',
        key,
        duration: Date.now() - lockStart,
      });

      try {
        return await operation(filePath);
      } finally {
        await release();
      }
    } finally {
      this.memoryLocks.delete(key);
      resolveMemoryLock();
    }
  }

  /**
   * Read and decode one document. Unreadable documents are quarantined.
   */
  private async readDocument(key: string, filePath: string, holdsLock: boolean): Promise<StoredDocument | null> {
    const content = await readFileSafe(filePath);
    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw await this.corrupt(key, filePath, `invalid JSON (${error instanceof Error ? error.message : String(error)})`, holdsLock);
    }

    if (!isPlainObject(parsed)) {
      throw await this.corrupt(key, filePath, 'document is not an object', holdsLock);
    }

    const { version, is_deleted: isDeleted, ...fields } = parsed;
    if (typeof fields.id !== 'string') {
      throw await this.corrupt(key, filePath, 'missing id', holdsLock);
    }
    if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
      throw await this.corrupt(key, filePath, 'missing or invalid version', holdsLock);
    }
    if (typeof isDeleted !== 'boolean') {
      throw await this.corrupt(key, filePath, 'missing is_deleted flag', holdsLock);
    }

    return { ...fields, id: fields.id, version, isDeleted };
  }

  private async corrupt(key: string, filePath: string, reason: string, holdsLock: boolean): Promise<StorageCorruptionError> {
    const quarantinedTo = holdsLock
      ? await this.moveAside(key, filePath)
      : await this.quarantine(key);
    return new StorageCorruptionError(key, reason, quarantinedTo ?? undefined);
  }

  private async moveAside(key: string, filePath: string): Promise<string | null> {
    const target = `${filePath}.corrupt-${Date.now()}`;
    const moved = await renameSafe(filePath, target);
    if (moved) {
      logger.warn('Quarantined corrupt record', { operation: 'quarantine', key, quarantinedTo: target });
      return target;
    }
    return null;
  }

  private async writeDocument(filePath: string, body: Record<string, unknown>, version: number, isDeleted: boolean): Promise<void> {
    const content = JSON.stringify(toDisk(body, version, isDeleted), null, 2);
    await writeFileAtomic(filePath, content);
  }

  // Key-value operations

  async get(key: string): Promise<GetResult> {
    this.ensureInitialized();

    const filePath = this.getKeyFilePath(key);
    const record = await this.readDocument(key, filePath, false);

    if (!record) {
      return { status: 'not_found', version: 0 };
    }
    if (record.isDeleted) {
      return { status: 'not_found', version: record.version };
    }
    return { status: 'found', record };
  }

  async put(key: string, record: DocumentBody, expectedVersion: number, options: WriteOptions = {}): Promise<PutResult> {
    return this.withKeyLock(key, async (filePath) => {
      const current = await this.readDocument(key, filePath, true);
      const actualVersion = current?.version ?? 0;

      if (actualVersion !== expectedVersion || !matchesFields(current, options)) {
        logger.trace('Precondition failed on put', { operation: 'put', key, expectedVersion, actualVersion });
        return { status: 'conflict', expectedVersion, actualVersion };
      }

      const version = expectedVersion + 1;
      await this.writeDocument(filePath, record, version, false);
      logger.trace('Record written', { operation: 'put', key, version });
      return { status: 'ok', version };
    });
  }

  async delete(key: string, expectedVersion: number, options: WriteOptions = {}): Promise<DeleteResult> {
    return this.withKeyLock(key, async (filePath) => {
      const current = await this.readDocument(key, filePath, true);
      if (!current || current.isDeleted) {
        return { status: 'not_found' };
      }
      if (current.version !== expectedVersion || !matchesFields(current, options)) {
        return { status: 'conflict', expectedVersion, actualVersion: current.version };
      }

      const version = current.version + 1;
      await this.writeDocument(filePath, current, version, true);
      logger.trace('Record tombstoned', { operation: 'delete', key, version });
      return { status: 'ok', version };
    });
  }

  async purge(key: string, expectedVersion: number, options: WriteOptions = {}): Promise<DeleteResult> {
    return this.withKeyLock(key, async (filePath) => {
      const current = await this.readDocument(key, filePath, true);
      if (!current) {
        return { status: 'not_found' };
      }
      if (current.version !== expectedVersion || !matchesFields(current, options)) {
        return { status: 'conflict', expectedVersion, actualVersion: current.version };
      }

      await removeFileSafe(filePath);
      logger.trace('Record purged', { operation: 'purge', key, version: current.version });
      return { status: 'ok', version: 0 };
    });
  }

  async list(prefix: string): Promise<string[]> {
    this.ensureInitialized();

    const segments = splitKey(prefix, true);
    const files = await listFilesRecursive(path.join(this.dataDir, ...segments), DOCUMENT_EXTENSION);

    return files
      .map(file => file.slice(0, -DOCUMENT_EXTENSION.length))
      .filter(relative => relative.split('/').every(segment => KEY_SEGMENT.test(segment)))
      .map(relative => [...segments, relative].join('/'));
  }

  async quarantine(key: string): Promise<string | null> {
    return this.withKeyLock(key, async (filePath) => this.moveAside(key, filePath));
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    try {
      this.ensureInitialized();
      const probe = path.join(this.dataDir, 'global', `.health-${process.pid}`);
      await writeFileAtomic(probe, new Date().toISOString());
      await removeFileSafe(probe);
      return { healthy: true, message: `File storage writable at ${this.dataDir}` };
    } catch (error) {
      return {
        healthy: false,
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
