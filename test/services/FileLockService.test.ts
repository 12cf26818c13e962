import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'fs';
import path from 'path';
import type { AgentProfile } from '../../src/types/index.js';
import { agentIdFor } from '../../src/services/AgentService.js';
import { lockKey } from '../../src/services/FileLockService.js';
import { NotFoundError, StorageCorruptionError, ValidationError } from '../../src/utils/errors.js';
import {
  createMockAgentInput,
  createTestDataDir,
  createTestProcess,
  removeTestDataDir,
  sleep,
} from '../fixtures/index.js';
import type { TestProcess } from '../fixtures/index.js';

describe('FileLockService', () => {
  let proc: TestProcess;
  let testDataDir: string;
  let alice: AgentProfile;
  let bob: AgentProfile;

  beforeEach(async () => {
    testDataDir = createTestDataDir();
    proc = await createTestProcess(testDataDir, { maxLocksPerAgent: 5 });
    alice = await proc.agents.register(createMockAgentInput({ name: 'alice' }));
    bob = await proc.agents.register(createMockAgentInput({ name: 'bob' }));
  });

  afterEach(async () => {
    await proc.storage.close();
    removeTestDataDir(testDataDir);
  });

  describe('acquire', () => {
    it('should lock every requested file', async () => {
      const result = await proc.locks.acquire({
        agentId: alice.id,
        projectId: 'web',
        files: ['src/a.py', 'src/b.py'],
        reason: 'refactor',
      });

      expect(result.status).toBe('locked');
      if (result.status !== 'locked') return;
      expect(result.files).toEqual(['src/a.py', 'src/b.py']);
      expect(result.refreshed).toEqual([]);

      const holder = await proc.locks.getLockHolder('web', 'src/a.py');
      expect(holder).toMatchObject({
        projectId: 'web',
        filePath: 'src/a.py',
        holderAgentId: alice.id,
        reason: 'refactor',
        version: 1,
      });
      expect(holder?.expiresAt.getTime()).toBe(result.expiresAt.getTime());
    });

    it('should use the configured default TTL', async () => {
      const before = Date.now();
      const result = await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '' });

      expect(result.status).toBe('locked');
      if (result.status !== 'locked') return;
      const ttlMs = result.expiresAt.getTime() - before;
      expect(ttlMs).toBeGreaterThanOrEqual(86400 * 1000 - 1000);
      expect(ttlMs).toBeLessThanOrEqual(86400 * 1000 + 1000);
    });

    it('should normalise and de-duplicate paths', async () => {
      const result = await proc.locks.acquire({
        agentId: alice.id,
        projectId: 'web',
        files: ['./src/a.py', 'src//a.py', 'src\\b.py'],
        reason: '',
      });

      expect(result.status === 'locked' && result.files).toEqual(['src/a.py', 'src/b.py']);
    });

    it('should refresh locks the agent already holds', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: 'first', ttlSeconds: 60 });
      const again = await proc.locks.acquire({
        agentId: alice.id,
        projectId: 'web',
        files: ['a.py', 'b.py'],
        reason: 'second',
        ttlSeconds: 120,
      });

      expect(again.status).toBe('locked');
      expect(again.status === 'locked' && again.refreshed).toEqual(['a.py']);

      const holder = await proc.locks.getLockHolder('web', 'a.py');
      expect(holder?.reason).toBe('second');
      expect(holder?.version).toBe(2);
    });

    it('should report the first conflicting file and write nothing', async () => {
      await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['b.py', 'd.py'], reason: 'bob work' });

      const result = await proc.locks.acquire({
        agentId: alice.id,
        projectId: 'web',
        files: ['a.py', 'd.py', 'b.py'],
        reason: 'alice work',
      });

      expect(result.status).toBe('conflict');
      if (result.status !== 'conflict') return;
      expect(result.file).toBe('d.py');
      expect(result.holder).toBe(bob.id);
      expect(result.lockedAt).toBeInstanceOf(Date);

      expect(await proc.locks.isLocked('web', 'a.py')).toBe(false);
      expect(await proc.locks.getAgentLocks(alice.id, 'web')).toEqual([]);
    });

    it('should keep projects separate', async () => {
      await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['a.py'], reason: '' });
      const result = await proc.locks.acquire({ agentId: alice.id, projectId: 'api', files: ['a.py'], reason: '' });

      expect(result.status).toBe('locked');
    });

    it('should treat expired locks as free', async () => {
      await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['a.py'], reason: '', ttlSeconds: 1 });
      await sleep(1100);

      expect(await proc.locks.isLocked('web', 'a.py')).toBe(false);

      const result = await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '' });
      expect(result.status).toBe('locked');
      expect(result.status === 'locked' && result.refreshed).toEqual([]);
      expect((await proc.locks.getLockHolder('web', 'a.py'))?.holderAgentId).toBe(alice.id);
    });

    it('should enforce the per-agent lock limit within a project', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['1', '2', '3', '4'], reason: '' });

      await expect(proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['5', '6'], reason: '' }))
        .rejects.toBeInstanceOf(ValidationError);

      // Refreshing held files plus one new file stays within the limit
      const result = await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['1', '5'], reason: '' });
      expect(result.status).toBe('locked');
    });

    it('should validate input', async () => {
      await expect(proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: [], reason: '' }))
        .rejects.toThrow('At least one file must be specified');
      await expect(proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '', ttlSeconds: 0 }))
        .rejects.toBeInstanceOf(ValidationError);
      await expect(proc.locks.acquire({ agentId: alice.id, projectId: '../web', files: ['a.py'], reason: '' }))
        .rejects.toBeInstanceOf(ValidationError);
      await expect(proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['../a.py'], reason: '' }))
        .rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject unknown agents', async () => {
      await expect(proc.locks.acquire({ agentId: agentIdFor('ghost'), projectId: 'web', files: ['a.py'], reason: '' }))
        .rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject lifetimes longer than a year', async () => {
      await expect(proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '', ttlSeconds: 1e13 }))
        .rejects.toBeInstanceOf(ValidationError);
      expect(await proc.locks.isLocked('web', 'a.py')).toBe(false);

      const result = await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '', ttlSeconds: 31536000 });
      expect(result.status).toBe('locked');
    });

    it('should lock very long paths', async () => {
      const longPath = `src/${'deep/'.repeat(60)}file.py`;
      const result = await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: [longPath], reason: '' });

      expect(result.status).toBe('locked');
      expect((await proc.locks.getLockHolder('web', longPath))?.filePath).toBe(longPath);
    });
  });

  describe('release', () => {
    it('should release held files and report the rest', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py', 'b.py'], reason: '' });
      await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['c.py'], reason: '' });

      const result = await proc.locks.release(alice.id, 'web', ['a.py', 'c.py', 'z.py']);

      expect(result).toEqual({ released: ['a.py'], notHeld: ['c.py', 'z.py'] });
      expect(await proc.locks.isLocked('web', 'a.py')).toBe(false);
      expect(await proc.locks.isLocked('web', 'b.py')).toBe(true);
      expect((await proc.locks.getLockHolder('web', 'c.py'))?.holderAgentId).toBe(bob.id);
    });

    it('should allow another agent to lock released files', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '' });
      await proc.locks.release(alice.id, 'web', ['a.py']);

      const result = await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['a.py'], reason: '' });
      expect(result.status).toBe('locked');
      expect((await proc.locks.getLockHolder('web', 'a.py'))?.version).toBe(3);
    });

    it('should tombstone the slot rather than remove it', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '' });
      await proc.locks.release(alice.id, 'web', ['a.py']);

      expect(await proc.storage.get(lockKey('web', 'a.py'))).toEqual({ status: 'not_found', version: 2 });
    });

    it('should not log an event when nothing was released', async () => {
      await proc.locks.release(alice.id, 'web', ['a.py']);
      expect(await proc.sessionLog.getEvents(alice.id)).toEqual([]);
    });
  });

  describe('forceRelease', () => {
    it('should release locks held by another agent', async () => {
      await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['a.py', 'b.py'], reason: '' });

      const result = await proc.locks.forceRelease(alice.id, 'web', ['a.py', 'x.py']);

      expect(result).toEqual({ released: ['a.py'], notHeld: ['x.py'] });
      expect(await proc.locks.isLocked('web', 'a.py')).toBe(false);
      expect(await proc.locks.isLocked('web', 'b.py')).toBe(true);
    });
  });

  describe('queries', () => {
    it('should group unexpired locks by agent', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['b.py', 'a.py'], reason: '' });
      await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['c.py'], reason: '' });
      await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['old.py'], reason: '', ttlSeconds: 1 });
      await sleep(1100);

      const view = await proc.locks.getLockedFiles('web');

      expect(view.projectId).toBe('web');
      expect(view.total).toBe(3);
      expect(view.byAgent[alice.id].map(lock => lock.filePath)).toEqual(['a.py', 'b.py']);
      expect(view.byAgent[bob.id].map(lock => lock.filePath)).toEqual(['c.py']);
    });

    it('should return an empty view for an unknown project', async () => {
      expect(await proc.locks.getLockedFiles('nothing-here')).toEqual({ projectId: 'nothing-here', total: 0, byAgent: {} });
    });

    it('should store lock slots under the project namespace', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '' });

      // hex of "a.py"
      expect(lockKey('web', 'a.py')).toBe('locks/web/612e7079');
      expect(existsSync(path.join(testDataDir, 'locks', 'web', '612e7079.json'))).toBe(true);
    });
  });

  describe('extend', () => {
    it('should restart the lock time and keep the reason', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: 'edit', ttlSeconds: 60 });
      const before = Date.now();

      const result = await proc.locks.extend(alice.id, 'web', 'a.py', 3600);

      expect(result.status).toBe('extended');
      if (result.status !== 'extended') return;
      expect(result.lock.reason).toBe('edit');
      expect(result.lock.version).toBe(2);
      expect(result.lock.lockedAt.getTime()).toBeGreaterThanOrEqual(before);
      expect(result.lock.expiresAt.getTime()).toBe(result.lock.lockedAt.getTime() + 3600 * 1000);

      const holder = await proc.locks.getLockHolder('web', 'a.py');
      expect(holder?.expiresAt.toISOString()).toBe(result.lock.expiresAt.toISOString());
    });

    it('should refuse to extend a lock held by another agent', async () => {
      await proc.locks.acquire({ agentId: bob.id, projectId: 'web', files: ['a.py'], reason: '' });

      expect(await proc.locks.extend(alice.id, 'web', 'a.py')).toEqual({ status: 'not_held', holder: bob.id });
      expect((await proc.locks.getLockHolder('web', 'a.py'))?.version).toBe(1);
    });

    it('should report files that are not locked', async () => {
      expect(await proc.locks.extend(alice.id, 'web', 'z.py')).toEqual({ status: 'not_held', holder: null });
    });

    it('should not revive an expired lock', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '', ttlSeconds: 1 });
      await sleep(1100);

      expect(await proc.locks.extend(alice.id, 'web', 'a.py')).toEqual({ status: 'not_held', holder: null });
    });

    it('should validate the new lifetime', async () => {
      await expect(proc.locks.extend(alice.id, 'web', 'a.py', 0)).rejects.toBeInstanceOf(ValidationError);
      await expect(proc.locks.extend(alice.id, 'web', 'a.py', 1e13)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('getAgentLocks', () => {
    it('should list locks across every project when no project is named', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: '' });
      await proc.locks.acquire({ agentId: alice.id, projectId: 'api', files: ['b.py'], reason: '' });
      await proc.locks.acquire({ agentId: bob.id, projectId: 'api', files: ['c.py'], reason: '' });

      const locks = await proc.locks.getAgentLocks(alice.id);
      expect(locks.map(lock => [lock.projectId, lock.filePath])).toEqual([['api', 'b.py'], ['web', 'a.py']]);
      expect((await proc.locks.getAgentLocks(alice.id, 'web')).map(lock => lock.filePath)).toEqual(['a.py']);
    });
  });

  describe('slot integrity', () => {
    it('should refuse a slot that holds another file\'s lock', async () => {
      await proc.storage.put(lockKey('web', 'a.py'), {
        id: 'misplaced',
        projectId: 'web',
        filePath: 'b.py',
        holderAgentId: bob.id,
        reason: '',
        lockedAt: new Date(),
        expiresAt: new Date(Date.now() + 60000),
      }, 0);

      await expect(proc.locks.getLockHolder('web', 'a.py')).rejects.toBeInstanceOf(StorageCorruptionError);
      expect(existsSync(path.join(testDataDir, 'locks', 'web', '612e7079.json'))).toBe(false);
    });
  });

  describe('session events', () => {
    it('should keep the locks when the session event cannot be recorded', async () => {
      vi.spyOn(proc.sessionLog, 'append').mockRejectedValueOnce(new Error('disk full'));

      const result = await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: 'edit' });

      expect(result.status).toBe('locked');
      expect((await proc.locks.getLockHolder('web', 'a.py'))?.holderAgentId).toBe(alice.id);
      expect(await proc.sessionLog.getEvents(alice.id)).toEqual([]);

      // Retrying refreshes the same locks and records the event
      const retried = await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: 'edit' });
      expect(retried.status === 'locked' && retried.refreshed).toEqual(['a.py']);
      expect((await proc.sessionLog.getEvents(alice.id)).map(event => event.kind)).toEqual(['locked']);
    });

    it('should log locked and unlocked events', async () => {
      await proc.locks.acquire({ agentId: alice.id, projectId: 'web', files: ['a.py'], reason: 'edit' });
      await proc.locks.release(alice.id, 'web', ['a.py']);

      const events = await proc.sessionLog.getEvents(alice.id);
      expect(events.map(event => event.kind)).toEqual(['unlocked', 'locked']);
      expect(events[0].payload).toEqual({ projectId: 'web', files: ['a.py'] });
      expect(events[1].payload).toMatchObject({ projectId: 'web', files: ['a.py'], refreshed: [], reason: 'edit' });
    });
  });
});
