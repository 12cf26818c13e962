import type {
  AcquireLocksInput,
  AcquireLocksResult,
  ExtendLockResult,
  FileLock,
  LockedFilesView,
  ReleaseLocksResult,
  WriteOptions,
} from '../types/index.js';
import type { StorageProvider } from '../storage/index.js';
import { readRecord, toDocument } from '../storage/index.js';
import {
  validate,
  uuidSchema,
  projectIdSchema,
  filePathSchema,
  acquireLocksSchema,
  extendLockSchema,
  releaseLocksSchema,
  fileLockRecordSchema,
} from '../utils/validation.js';
import { BusyError, StorageCorruptionError, ValidationError } from '../utils/errors.js';
import { backoff, lockSlotName, normalizeFilePath, unique } from '../utils/index.js';
import { createComponentLogger } from '../utils/logger.js';
import type { AgentService } from './AgentService.js';
import type { SessionLogService } from './SessionLogService.js';

export interface FileLockOptions {
  defaultTtlSeconds: number;
  maxLocksPerAgent: number;
}

export function lockKey(projectId: string, filePath: string): string {
  return `locks/${projectId}/${lockSlotName(filePath)}`;
}

/**
 * Precondition for writing over a lock slot as it was read. Versions restart
 * after the sweeper purges a slot, so the guard also pins the stored holder
 * and lock time, or the tombstone.
 */
export function slotGuard(stored: FileLock | null, version: number): WriteOptions {
  if (stored) {
    return { ifMatch: { holderAgentId: stored.holderAgentId, lockedAt: stored.lockedAt, isDeleted: false } };
  }
  if (version > 0) {
    return { ifMatch: { isDeleted: true } };
  }
  return {};
}

/**
 * What one lock slot held when it was read
 */
interface SlotSnapshot {
  key: string;
  filePath: string;
  version: number;          // version to write against, tombstones included
  lock: FileLock | null;    // unexpired lock, if any
  guard: WriteOptions;
}

interface WrittenSlot {
  snapshot: SlotSnapshot;
  lock: FileLock;
  version: number;
  refreshed: boolean;
}

type AttemptResult = AcquireLocksResult | { status: 'retry' };

function isLive(lock: FileLock | null, now: Date): lock is FileLock {
  return lock !== null && lock.expiresAt.getTime() > now.getTime();
}

function lockDocument(lock: FileLock) {
  return toDocument(lockSlotName(lock.filePath), {
    projectId: lock.projectId,
    filePath: lock.filePath,
    holderAgentId: lock.holderAgentId,
    reason: lock.reason,
    lockedAt: lock.lockedAt,
    expiresAt: lock.expiresAt,
  });
}

/**
 * File lock table. Every (project, file) pair owns one storage slot, so two
 * agents can never both hold an unexpired lock on the same file. Multi-file
 * acquisition is all-or-nothing: a lost race rolls back what was written.
 *
 * Expired locks read as absent everywhere; the sweeper only reclaims disk space.
 */
export class FileLockService {
  private log = createComponentLogger('FileLockService');

  constructor(
    private storage: StorageProvider,
    private agentService: AgentService,
    private sessionLog: SessionLogService,
    private options: FileLockOptions
  ) {}

  /**
   * Lock every file or none. The locks are written before the session event;
   * if the event cannot be recorded the locks stand, and a retry refreshes them.
   */
  async acquire(input: AcquireLocksInput): Promise<AcquireLocksResult> {
    const { agentId, projectId, files, reason, ttlSeconds } = validate(acquireLocksSchema, input);
    const paths = unique(files.map(normalizeFilePath));
    const ttl = ttlSeconds ?? this.options.defaultTtlSeconds;

    await this.agentService.requireAgent(agentId);

    const { maxRetries } = this.storage.getRetryOptions();
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const outcome = await this.tryAcquire(agentId, projectId, paths, reason, ttl);

      if (outcome.status === 'locked') {
        await this.sessionLog.record(agentId, 'locked', {
          projectId,
          files: outcome.files,
          refreshed: outcome.refreshed,
          reason,
          expiresAt: outcome.expiresAt.toISOString(),
        });
        this.log.info('Files locked', {
          agentId,
          projectId,
          files: outcome.files.length,
          refreshed: outcome.refreshed.length,
        });
        return outcome;
      }

      if (outcome.status === 'conflict') {
        this.log.debug('Lock conflict', { agentId, projectId, file: outcome.file, holder: outcome.holder });
        return outcome;
      }

      this.log.trace('Lock acquisition raced, retrying', { agentId, projectId, attempt });
      await backoff(attempt);
    }

    throw new BusyError(`locks/${projectId}`, maxRetries + 1, 'lock acquisition kept racing');
  }

  /**
   * Push back the expiry of a lock the agent holds. The lock time restarts now
   * and the reason is kept.
   */
  async extend(agentId: string, projectId: string, filePath: string, ttlSeconds?: number): Promise<ExtendLockResult> {
    const validated = validate(extendLockSchema, { agentId, projectId, filePath, ttlSeconds });
    const normalized = normalizeFilePath(validated.filePath);
    const ttl = validated.ttlSeconds ?? this.options.defaultTtlSeconds;
    const { maxRetries } = this.storage.getRetryOptions();

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const now = new Date();
      const snapshot = await this.readSlot(validated.projectId, normalized, now);

      if (!snapshot.lock) {
        return { status: 'not_held', holder: null };
      }
      if (snapshot.lock.holderAgentId !== validated.agentId) {
        this.log.warn('Lock extension refused, file held by another agent', {
          agentId: validated.agentId,
          projectId: validated.projectId,
          filePath: normalized,
          holder: snapshot.lock.holderAgentId,
        });
        return { status: 'not_held', holder: snapshot.lock.holderAgentId };
      }

      const lock: FileLock = {
        ...snapshot.lock,
        lockedAt: now,
        expiresAt: new Date(now.getTime() + ttl * 1000),
      };
      const result = await this.storage.put(snapshot.key, lockDocument(lock), snapshot.version, snapshot.guard);
      if (result.status === 'ok') {
        await this.sessionLog.record(validated.agentId, 'locked', {
          projectId: validated.projectId,
          files: [normalized],
          refreshed: [normalized],
          reason: lock.reason,
          expiresAt: lock.expiresAt.toISOString(),
        });
        this.log.info('Lock extended', { agentId: validated.agentId, projectId: validated.projectId, filePath: normalized });
        return { status: 'extended', lock: { ...lock, version: result.version } };
      }

      await backoff(attempt);
    }

    throw new BusyError(lockKey(validated.projectId, normalized), maxRetries + 1, 'extension kept conflicting');
  }

  /**
   * Release locks the agent holds. Files it does not hold are left alone.
   */
  async release(agentId: string, projectId: string, files: string[]): Promise<ReleaseLocksResult> {
    const validated = validate(releaseLocksSchema, { agentId, projectId, files });
    const paths = unique(validated.files.map(normalizeFilePath));

    const released: string[] = [];
    const notHeld: string[] = [];
    for (const filePath of paths) {
      const done = await this.releaseSlot(
        validated.projectId,
        filePath,
        lock => lock.holderAgentId === validated.agentId
      );
      (done ? released : notHeld).push(filePath);
    }

    if (released.length > 0) {
      await this.sessionLog.record(validated.agentId, 'unlocked', {
        projectId: validated.projectId,
        files: released,
      });
      this.log.info('Files unlocked', { agentId: validated.agentId, projectId: validated.projectId, files: released.length });
    }

    return { released, notHeld };
  }

  /**
   * Release locks regardless of holder. Meant for operators clearing a crashed agent.
   */
  async forceRelease(byAgentId: string, projectId: string, files: string[]): Promise<ReleaseLocksResult> {
    const validated = validate(releaseLocksSchema, { agentId: byAgentId, projectId, files });
    const paths = unique(validated.files.map(normalizeFilePath));

    const released: string[] = [];
    const notHeld: string[] = [];
    for (const filePath of paths) {
      let previousHolder: string | null = null;
      const done = await this.releaseSlot(validated.projectId, filePath, lock => {
        previousHolder = lock.holderAgentId;
        return true;
      });
      if (done) {
        released.push(filePath);
        this.log.warn('Lock force-released', {
          agentId: validated.agentId,
          projectId: validated.projectId,
          filePath,
          holder: previousHolder,
        });
      } else {
        notHeld.push(filePath);
      }
    }

    return { released, notHeld };
  }

  /**
   * Unexpired locks in a project, grouped by holder
   */
  async getLockedFiles(projectId: string): Promise<LockedFilesView> {
    const validatedProjectId = validate(projectIdSchema, projectId);
    const locks = await this.listLiveLocks(`locks/${validatedProjectId}`);

    const byAgent: Record<string, FileLock[]> = {};
    for (const lock of locks) {
      (byAgent[lock.holderAgentId] ??= []).push(lock);
    }

    return { projectId: validatedProjectId, total: locks.length, byAgent };
  }

  async getLockHolder(projectId: string, filePath: string): Promise<FileLock | null> {
    const validatedProjectId = validate(projectIdSchema, projectId);
    const normalized = normalizeFilePath(validate(filePathSchema.required(), filePath));
    const snapshot = await this.readSlot(validatedProjectId, normalized, new Date());
    return snapshot.lock;
  }

  async isLocked(projectId: string, filePath: string): Promise<boolean> {
    return (await this.getLockHolder(projectId, filePath)) !== null;
  }

  /**
   * Unexpired locks the agent holds, in one project or across all of them
   */
  async getAgentLocks(agentId: string, projectId?: string): Promise<FileLock[]> {
    const id = validate(uuidSchema, agentId);
    const prefix = projectId === undefined ? 'locks' : `locks/${validate(projectIdSchema, projectId)}`;
    const locks = await this.listLiveLocks(prefix);
    return locks.filter(lock => lock.holderAgentId === id);
  }

  private async tryAcquire(
    agentId: string,
    projectId: string,
    paths: string[],
    reason: string,
    ttlSeconds: number
  ): Promise<AttemptResult> {
    const now = new Date();
    const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);

    const snapshots: SlotSnapshot[] = [];
    for (const filePath of paths) {
      snapshots.push(await this.readSlot(projectId, filePath, now));
    }

    // Nothing is written while another agent holds any of the files
    for (const snapshot of snapshots) {
      if (snapshot.lock && snapshot.lock.holderAgentId !== agentId) {
        return this.conflictFor(snapshot.lock);
      }
    }

    const newFiles = snapshots.filter(snapshot => snapshot.lock === null).map(snapshot => snapshot.filePath);
    if (newFiles.length > 0) {
      const held = await this.getAgentLocks(agentId, projectId);
      const heldPaths = new Set(held.map(lock => lock.filePath));
      const total = heldPaths.size + newFiles.filter(filePath => !heldPaths.has(filePath)).length;
      if (total > this.options.maxLocksPerAgent) {
        throw new ValidationError(
          `Agent would hold ${total} locks in project ${projectId}, limit is ${this.options.maxLocksPerAgent}`,
          [{ field: 'files', message: 'Too many locks for one agent', value: total }]
        );
      }
    }

    const written: WrittenSlot[] = [];
    for (const snapshot of snapshots) {
      const lock: FileLock = {
        projectId,
        filePath: snapshot.filePath,
        holderAgentId: agentId,
        reason,
        lockedAt: now,
        expiresAt,
        version: snapshot.version,
      };

      const result = await this.storage.put(snapshot.key, lockDocument(lock), snapshot.version, snapshot.guard);
      if (result.status === 'ok') {
        written.push({ snapshot, lock, version: result.version, refreshed: snapshot.lock !== null });
        continue;
      }

      // Lost the race on this slot: undo this call's writes, then see who won
      await this.rollback(written);
      const current = await this.readSlot(projectId, snapshot.filePath, new Date());
      if (current.lock && current.lock.holderAgentId !== agentId) {
        return this.conflictFor(current.lock);
      }
      return { status: 'retry' };
    }

    return {
      status: 'locked',
      files: paths,
      refreshed: written.filter(slot => slot.refreshed).map(slot => slot.snapshot.filePath),
      expiresAt,
    };
  }

  /**
   * Undo writes from a failed acquisition: new locks are tombstoned, refreshed
   * locks get their previous content back. A slot is only touched while it
   * still holds the lock this call wrote.
   */
  private async rollback(written: WrittenSlot[]): Promise<void> {
    for (const slot of [...written].reverse()) {
      const { snapshot } = slot;
      const guard = slotGuard(slot.lock, slot.version);
      const result = snapshot.lock
        ? await this.storage.put(snapshot.key, lockDocument(snapshot.lock), slot.version, guard)
        : await this.storage.delete(snapshot.key, slot.version, guard);

      if (result.status !== 'ok') {
        this.log.warn('Rollback of lock slot skipped, slot changed underneath', {
          key: snapshot.key,
          filePath: snapshot.filePath,
          status: result.status,
        });
      }
    }
  }

  private async readSlot(projectId: string, filePath: string, now: Date): Promise<SlotSnapshot> {
    const key = lockKey(projectId, filePath);
    const { record, version } = await readRecord(this.storage, key, fileLockRecordSchema);

    if (record && record.filePath !== filePath) {
      const quarantinedTo = await this.storage.quarantine(key);
      throw new StorageCorruptionError(
        key,
        `slot holds a lock for ${record.filePath}, expected ${filePath}`,
        quarantinedTo ?? undefined
      );
    }

    return {
      key,
      filePath,
      version,
      lock: isLive(record, now) ? record : null,
      guard: slotGuard(record, version),
    };
  }

  /**
   * Tombstone one slot if its live lock passes `owns`. Retries if the slot
   * changes between read and delete.
   */
  private async releaseSlot(
    projectId: string,
    filePath: string,
    owns: (lock: FileLock) => boolean
  ): Promise<boolean> {
    const { maxRetries } = this.storage.getRetryOptions();

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const snapshot = await this.readSlot(projectId, filePath, new Date());
      if (!snapshot.lock || !owns(snapshot.lock)) {
        return false;
      }

      const result = await this.storage.delete(snapshot.key, snapshot.version, snapshot.guard);
      if (result.status === 'ok') {
        return true;
      }
      if (result.status === 'not_found') {
        return false;
      }
      await backoff(attempt);
    }

    throw new BusyError(lockKey(projectId, filePath), maxRetries + 1, 'release kept conflicting');
  }

  private async listLiveLocks(prefix: string): Promise<FileLock[]> {
    const keys = await this.storage.list(prefix);
    const now = new Date();
    const locks: FileLock[] = [];

    for (const key of keys) {
      try {
        const { record } = await readRecord(this.storage, key, fileLockRecordSchema);
        if (isLive(record, now)) {
          locks.push(record);
        }
      } catch (error) {
        if (!(error instanceof StorageCorruptionError)) {
          throw error;
        }
        this.log.warn('Skipping unreadable lock record', { key, reason: error.message });
      }
    }

    return locks.sort((a, b) => a.projectId.localeCompare(b.projectId) || a.filePath.localeCompare(b.filePath));
  }

  private conflictFor(lock: FileLock): AcquireLocksResult {
    return {
      status: 'conflict',
      file: lock.filePath,
      holder: lock.holderAgentId,
      lockedAt: lock.lockedAt,
      expiresAt: lock.expiresAt,
    };
  }
}
