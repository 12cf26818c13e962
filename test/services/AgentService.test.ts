import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { AgentRegisterInput } from '../../src/types/index.js';
import { AgentService, agentIdFor } from '../../src/services/AgentService.js';
import { FileStorageProvider } from '../../src/storage/FileStorageProvider.js';
import { NotFoundError, ValidationError } from '../../src/utils/errors.js';
import { createMockAgentInput, createTestDataDir, removeTestDataDir, sleep } from '../fixtures/index.js';

describe('AgentService', () => {
  let storage: FileStorageProvider;
  let agentService: AgentService;
  let testDataDir: string;

  beforeEach(async () => {
    testDataDir = createTestDataDir();
    storage = new FileStorageProvider(testDataDir);
    await storage.initialize();
    agentService = new AgentService(storage);
  });

  afterEach(async () => {
    await storage.close();
    removeTestDataDir(testDataDir);
  });

  describe('register', () => {
    it('should create a new agent profile', async () => {
      const agent = await agentService.register(createMockAgentInput({ name: 'backend-dev', type: 'opencode' }));

      expect(agent.id).toBe(agentIdFor('backend-dev'));
      expect(agent.name).toBe('backend-dev');
      expect(agent.type).toBe('opencode');
      expect(agent.capabilities).toEqual(['python', 'typescript']);
      expect(agent.status).toBe('active');
      expect(agent.clientVersion).toBe('1.0.0');
      expect(agent.totalSessions).toBe(0);
      expect(agent.projectsInvolved).toEqual([]);
      expect(agent.version).toBe(1);
      expect(agent.isDeleted).toBe(false);
      expect(agent.createdAt).toBeInstanceOf(Date);
    });

    it('should derive the same id for the same name', () => {
      expect(agentIdFor('backend-dev')).toBe(agentIdFor('backend-dev'));
      expect(agentIdFor('backend-dev')).not.toBe(agentIdFor('frontend-dev'));
    });

    it('should reconnect an existing agent instead of duplicating it', async () => {
      const first = await agentService.register(createMockAgentInput({ name: 'backend-dev' }));
      await sleep(5);
      const second = await agentService.register(createMockAgentInput({
        name: 'backend-dev',
        capabilities: ['go'],
      }));

      expect(second.id).toBe(first.id);
      expect(second.version).toBe(2);
      expect(second.capabilities).toEqual(['go']);
      expect(second.createdAt.getTime()).toBe(first.createdAt.getTime());
      expect(second.lastActive.getTime()).toBeGreaterThan(first.lastActive.getTime());

      const all = await agentService.listAgents();
      expect(all).toHaveLength(1);
    });

    it('should trim the name before deriving the id', async () => {
      const agent = await agentService.register(createMockAgentInput({ name: '  spaced  ' }));
      expect(agent.name).toBe('spaced');
      expect(agent.id).toBe(agentIdFor('spaced'));
    });

    it('should reject invalid input', async () => {
      await expect(agentService.register(createMockAgentInput({ name: '' }))).rejects.toBeInstanceOf(ValidationError);
      const unknownType: AgentRegisterInput = JSON.parse('{"name":"x","type":"unknown"}');
      await expect(agentService.register(unknownType)).rejects.toThrow('Validation failed: type');
    });
  });

  describe('lookups', () => {
    it('should find agents by id and by name', async () => {
      const agent = await agentService.register(createMockAgentInput({ name: 'reviewer' }));

      expect((await agentService.getAgent(agent.id))?.name).toBe('reviewer');
      expect((await agentService.getAgentByName('reviewer'))?.id).toBe(agent.id);
      expect(await agentService.getAgentByName('nobody')).toBeNull();
    });

    it('should throw NotFound from requireAgent for unknown ids', async () => {
      await expect(agentService.requireAgent(agentIdFor('ghost'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should list agents filtered by status', async () => {
      const a = await agentService.register(createMockAgentInput({ name: 'agent-a' }));
      await agentService.register(createMockAgentInput({ name: 'agent-b' }));
      await agentService.updateStatus(a.id, 'inactive');

      const active = await agentService.listAgents({ status: 'active' });
      const inactive = await agentService.listAgents({ status: 'inactive' });

      expect(active.map(agent => agent.name)).toEqual(['agent-b']);
      expect(inactive.map(agent => agent.name)).toEqual(['agent-a']);
    });
  });

  describe('activity tracking', () => {
    it('should count sessions and remember projects once', async () => {
      const agent = await agentService.register(createMockAgentInput());

      await agentService.recordSession(agent.id, 'alpha');
      await agentService.recordSession(agent.id, 'beta');
      const updated = await agentService.recordSession(agent.id, 'alpha');

      expect(updated.totalSessions).toBe(3);
      expect(updated.projectsInvolved).toEqual(['alpha', 'beta']);
      expect(updated.version).toBe(4);
    });

    it('should fail to touch an unknown agent', async () => {
      await expect(agentService.touch(agentIdFor('ghost'))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('deactivate', () => {
    it('should hide the agent until it registers again', async () => {
      const agent = await agentService.register(createMockAgentInput({ name: 'temp' }));
      await agentService.deactivate(agent.id);

      expect(await agentService.getAgent(agent.id)).toBeNull();
      expect(await agentService.listAgents()).toEqual([]);

      const revived = await agentService.register(createMockAgentInput({ name: 'temp' }));
      expect(revived.id).toBe(agent.id);
      expect(revived.version).toBe(3);
      expect(revived.totalSessions).toBe(0);
    });

    it('should throw NotFound for unknown agents', async () => {
      await expect(agentService.deactivate(agentIdFor('ghost'))).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
