import { v5 as uuidv5 } from 'uuid';
import type {
  AgentFilters,
  AgentProfile,
  AgentRegisterInput,
  AgentStatus,
} from '../types/index.js';
import type { StorageProvider } from '../storage/index.js';
import { decodeRecord, readRecord, toDocument } from '../storage/index.js';
import {
  validate,
  registerAgentSchema,
  agentNameSchema,
  uuidSchema,
  agentProfileRecordSchema,
} from '../utils/validation.js';
import { BusyError, NotFoundError, StorageCorruptionError } from '../utils/errors.js';
import { backoff } from '../utils/index.js';
import { createComponentLogger } from '../utils/logger.js';

// Namespace for deriving agent ids from agent names
const AGENT_ID_NAMESPACE = '6f1c2b4e-8d3a-5e7f-9b21-4c6d8e0fa213';

export function agentIdFor(name: string): string {
  return uuidv5(name, AGENT_ID_NAMESPACE);
}

export function agentProfileKey(agentId: string): string {
  return `agents/${agentId}/profile`;
}

/**
 * Service for agent identity: registration, reconnection and activity tracking.
 * Each profile is its own document, so unrelated agents never contend.
 */
export class AgentService {
  private log = createComponentLogger('AgentService');

  constructor(private storage: StorageProvider) {}

  /**
   * Register an agent, or reconnect it when a profile with this name exists.
   * The id is derived from the name, so it is stable across restarts.
   */
  async register(input: AgentRegisterInput): Promise<AgentProfile> {
    const { name, type, capabilities, clientVersion } = validate(registerAgentSchema, input);
    const id = agentIdFor(name);
    const key = agentProfileKey(id);
    const now = new Date();
    let reconnected: boolean = false;

    const stored = await this.storage.mutate(key, (current) => {
      if (current) {
        const existing = decodeRecord(key, agentProfileRecordSchema, current);
        if (existing.name !== name) {
          throw new StorageCorruptionError(key, `profile belongs to agent "${existing.name}"`);
        }
        reconnected = true;
        return toDocument(id, {
          ...existing,
          type,
          capabilities,
          clientVersion,
          status: 'active',
          lastActive: now,
        });
      }

      reconnected = false;
      return toDocument(id, {
        name,
        type,
        capabilities,
        status: 'active',
        clientVersion,
        createdAt: now,
        lastActive: now,
        totalSessions: 0,
        projectsInvolved: [],
      });
    });

    const profile = decodeRecord(key, agentProfileRecordSchema, stored);
    this.log.info(reconnected ? 'Agent reconnected' : 'Agent registered', {
      agentId: id,
      agentName: name,
      agentType: type,
      version: profile.version,
    });
    return profile;
  }

  /**
   * Get an agent by id, or null if unknown or deactivated
   */
  async getAgent(agentId: string): Promise<AgentProfile | null> {
    const id = validate(uuidSchema, agentId);
    const { record } = await readRecord(this.storage, agentProfileKey(id), agentProfileRecordSchema);
    return record;
  }

  /**
   * Get an agent by id, throwing NotFound if it does not exist
   */
  async requireAgent(agentId: string): Promise<AgentProfile> {
    const agent = await this.getAgent(agentId);
    if (!agent) {
      throw new NotFoundError('Agent', agentId);
    }
    return agent;
  }

  async getAgentByName(name: string): Promise<AgentProfile | null> {
    const validatedName = validate(agentNameSchema, name);
    const agent = await this.getAgent(agentIdFor(validatedName));
    return agent && agent.name === validatedName ? agent : null;
  }

  /**
   * List registered agents, most recently active first
   */
  async listAgents(filters: AgentFilters = {}): Promise<AgentProfile[]> {
    const keys = await this.storage.list('agents');
    const agents: AgentProfile[] = [];

    for (const key of keys.filter(k => k.endsWith('/profile'))) {
      try {
        const { record } = await readRecord(this.storage, key, agentProfileRecordSchema);
        if (record && (!filters.status || record.status === filters.status)) {
          agents.push(record);
        }
      } catch (error) {
        if (!(error instanceof StorageCorruptionError)) {
          throw error;
        }
        this.log.warn('Skipping unreadable agent profile', { key, reason: error.message });
      }
    }

    return agents.sort((a, b) => b.lastActive.getTime() - a.lastActive.getTime());
  }

  /**
   * Refresh lastActive
   */
  async touch(agentId: string): Promise<AgentProfile> {
    return this.update(agentId, profile => ({ ...profile, lastActive: new Date() }));
  }

  async updateStatus(agentId: string, status: AgentStatus): Promise<AgentProfile> {
    const profile = await this.update(agentId, current => ({
      ...current,
      status,
      lastActive: new Date(),
    }));
    this.log.info('Agent status updated', { agentId, status });
    return profile;
  }

  /**
   * Count a work session and remember the project it was in
   */
  async recordSession(agentId: string, projectId: string): Promise<AgentProfile> {
    return this.update(agentId, current => ({
      ...current,
      totalSessions: current.totalSessions + 1,
      projectsInvolved: current.projectsInvolved.includes(projectId)
        ? current.projectsInvolved
        : [...current.projectsInvolved, projectId],
      lastActive: new Date(),
    }));
  }

  /**
   * Tombstone an agent profile. Registering the same name again revives it.
   */
  async deactivate(agentId: string): Promise<void> {
    const id = validate(uuidSchema, agentId);
    const key = agentProfileKey(id);
    const { maxRetries } = this.storage.getRetryOptions();

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const { record } = await readRecord(this.storage, key, agentProfileRecordSchema);
      if (!record) {
        throw new NotFoundError('Agent', id);
      }

      const result = await this.storage.delete(key, record.version);
      if (result.status === 'ok') {
        this.log.info('Agent deactivated', { agentId: id, agentName: record.name });
        return;
      }
      if (result.status === 'not_found') {
        throw new NotFoundError('Agent', id);
      }
      await backoff(attempt);
    }

    throw new BusyError(key, maxRetries + 1, 'version conflicts');
  }

  private async update(
    agentId: string,
    apply: (current: AgentProfile) => AgentProfile
  ): Promise<AgentProfile> {
    const id = validate(uuidSchema, agentId);
    const key = agentProfileKey(id);

    const stored = await this.storage.mutate(key, (current) => {
      if (!current) {
        throw new NotFoundError('Agent', id);
      }
      return toDocument(id, { ...apply(decodeRecord(key, agentProfileRecordSchema, current)) });
    });

    return decodeRecord(key, agentProfileRecordSchema, stored);
  }
}
