import type {
  AcquireLocksInput,
  AcquireLocksResult,
  ActiveAgentSummary,
  AgentFilters,
  AgentProfile,
  AgentContextView,
  AgentRegisterInput,
  ContextEntry,
  ContextEntryInput,
  ContextOptions,
  EndContextResult,
  ExtendLockResult,
  FileLock,
  LockedFilesView,
  OperationResult,
  Project,
  ProjectCreateInput,
  ReleaseLocksResult,
  SessionEvent,
  SessionEventKind,
  SessionEventQuery,
  StartContextResult,
  SwitchContextResult,
  SweepResult,
  UpdateContextResult,
  WorkContext,
  WorkflowProgress,
} from '../types/index.js';
import type { CoordinationConfig } from '../config/index.js';
import type { StorageProvider } from '../storage/index.js';
import { NotFoundError, isCoordinationError, toOperationError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { AgentService } from './AgentService.js';
import { ContextService } from './ContextService.js';
import { FileLockService } from './FileLockService.js';
import { ProjectService } from './ProjectService.js';
import { SessionLogService } from './SessionLogService.js';
import { SweeperService } from './SweeperService.js';

/**
 * Entry point for a facade. Every operation resolves to an OperationResult;
 * nothing thrown inside the core escapes.
 */
export class CoordinationService {
  readonly agents: AgentService;
  readonly sessionLog: SessionLogService;
  readonly contexts: ContextService;
  readonly locks: FileLockService;
  readonly projects: ProjectService;
  readonly sweeper: SweeperService;

  private log = createComponentLogger('CoordinationService');

  constructor(private storage: StorageProvider, config: CoordinationConfig) {
    this.agents = new AgentService(storage);
    this.sessionLog = new SessionLogService(storage, config.sessionLog);
    this.locks = new FileLockService(storage, this.agents, this.sessionLog, {
      defaultTtlSeconds: config.locks.defaultTtlSeconds,
      maxLocksPerAgent: config.locks.maxLocksPerAgent,
    });
    this.contexts = new ContextService(storage, this.agents, this.locks, this.sessionLog);
    this.projects = new ProjectService(storage);
    this.sweeper = new SweeperService(storage, {
      intervalSeconds: config.locks.sweepIntervalSeconds,
    });
  }

  // Agent registry

  async registerAgent(input: AgentRegisterInput): Promise<OperationResult<AgentProfile>> {
    return this.run('registerAgent', () => this.agents.register(input));
  }

  async getAgent(agentId: string): Promise<OperationResult<AgentProfile>> {
    return this.run('getAgent', async () => {
      const agent = await this.agents.getAgent(agentId);
      if (!agent) {
        throw new NotFoundError('Agent', agentId);
      }
      return agent;
    });
  }

  async getAgentByName(name: string): Promise<OperationResult<AgentProfile>> {
    return this.run('getAgentByName', async () => {
      const agent = await this.agents.getAgentByName(name);
      if (!agent) {
        throw new NotFoundError('Agent', name);
      }
      return agent;
    });
  }

  async listAgents(filters: AgentFilters = {}): Promise<OperationResult<AgentProfile[]>> {
    return this.run('listAgents', () => this.agents.listAgents(filters));
  }

  async deactivateAgent(agentId: string): Promise<OperationResult<void>> {
    return this.run('deactivateAgent', () => this.agents.deactivate(agentId));
  }

  // Work contexts

  async startContext(
    agentId: string,
    projectId: string,
    objective: string,
    options: ContextOptions = {}
  ): Promise<OperationResult<StartContextResult>> {
    return this.run('startContext', () => this.contexts.start(agentId, projectId, objective, options));
  }

  async switchContext(
    agentId: string,
    projectId: string,
    objective: string,
    options: ContextOptions = {}
  ): Promise<OperationResult<SwitchContextResult>> {
    return this.run('switchContext', () => this.contexts.switch(agentId, projectId, objective, options));
  }

  async endContext(agentId: string): Promise<OperationResult<EndContextResult>> {
    return this.run('endContext', () => this.contexts.end(agentId));
  }

  async getCurrentContext(agentId: string): Promise<OperationResult<WorkContext | null>> {
    return this.run('getCurrentContext', () => this.contexts.getCurrent(agentId));
  }

  async setCurrentFile(agentId: string, filePath: string): Promise<OperationResult<UpdateContextResult>> {
    return this.run('setCurrentFile', () => this.contexts.setCurrentFile(agentId, filePath));
  }

  async getActiveAgents(projectId: string): Promise<OperationResult<ActiveAgentSummary[]>> {
    return this.run('getActiveAgents', () => this.contexts.listActiveInProject(projectId));
  }

  async addContextEntry(agentId: string, input: ContextEntryInput): Promise<OperationResult<ContextEntry>> {
    return this.run('addContextEntry', () => this.contexts.addContextEntry(agentId, input));
  }

  async getContextHistory(agentId: string, limit?: number): Promise<OperationResult<ContextEntry[]>> {
    return this.run('getContextHistory', () => this.contexts.getContextHistory(agentId, limit));
  }

  async getAgentContextFull(agentId: string): Promise<OperationResult<AgentContextView>> {
    return this.run('getAgentContextFull', () => this.contexts.getFullContext(agentId));
  }

  // File locks

  async acquireLocks(input: AcquireLocksInput): Promise<OperationResult<AcquireLocksResult>> {
    return this.run('acquireLocks', () => this.locks.acquire(input));
  }

  async releaseLocks(agentId: string, projectId: string, files: string[]): Promise<OperationResult<ReleaseLocksResult>> {
    return this.run('releaseLocks', () => this.locks.release(agentId, projectId, files));
  }

  async forceReleaseLocks(
    byAgentId: string,
    projectId: string,
    files: string[]
  ): Promise<OperationResult<ReleaseLocksResult>> {
    return this.run('forceReleaseLocks', () => this.locks.forceRelease(byAgentId, projectId, files));
  }

  async getLockedFiles(projectId: string): Promise<OperationResult<LockedFilesView>> {
    return this.run('getLockedFiles', () => this.locks.getLockedFiles(projectId));
  }

  async getLockHolder(projectId: string, filePath: string): Promise<OperationResult<FileLock | null>> {
    return this.run('getLockHolder', () => this.locks.getLockHolder(projectId, filePath));
  }

  async extendLock(
    agentId: string,
    projectId: string,
    filePath: string,
    ttlSeconds?: number
  ): Promise<OperationResult<ExtendLockResult>> {
    return this.run('extendLock', () => this.locks.extend(agentId, projectId, filePath, ttlSeconds));
  }

  async getAgentLocks(agentId: string, projectId?: string): Promise<OperationResult<FileLock[]>> {
    return this.run('getAgentLocks', () => this.locks.getAgentLocks(agentId, projectId));
  }

  async sweepLocks(projectId?: string): Promise<OperationResult<SweepResult[]>> {
    return this.run('sweepLocks', async () => (
      projectId === undefined
        ? this.sweeper.sweepAll()
        : [await this.sweeper.sweepProject(projectId)]
    ));
  }

  // Session log

  async getSessionLog(agentId: string, query: SessionEventQuery = {}): Promise<OperationResult<SessionEvent[]>> {
    return this.run('getSessionLog', () => this.sessionLog.getEvents(agentId, query));
  }

  async checkWorkflowProgress(
    agentId: string,
    expectedSteps: SessionEventKind[]
  ): Promise<OperationResult<WorkflowProgress>> {
    return this.run('checkWorkflowProgress', () => this.sessionLog.checkWorkflowProgress(agentId, expectedSteps));
  }

  // Projects

  async createProject(input: ProjectCreateInput): Promise<OperationResult<Project>> {
    return this.run('createProject', () => this.projects.createProject(input));
  }

  async getProject(projectId: string): Promise<OperationResult<Project>> {
    return this.run('getProject', async () => {
      const project = await this.projects.getProject(projectId);
      if (!project) {
        throw new NotFoundError('Project', projectId);
      }
      return project;
    });
  }

  async listProjects(includeDeleted: boolean = false): Promise<OperationResult<Project[]>> {
    return this.run('listProjects', () => this.projects.listProjects(includeDeleted));
  }

  async deleteProject(projectId: string): Promise<OperationResult<Project>> {
    return this.run('deleteProject', () => this.projects.deleteProject(projectId));
  }

  // Lifecycle

  async healthCheck(): Promise<{ healthy: boolean; message?: string; sweeperRunning: boolean }> {
    const storage = await this.storage.healthCheck();
    return { ...storage, sweeperRunning: this.sweeper.isRunning() };
  }

  async close(): Promise<void> {
    this.sweeper.stop();
    await this.storage.close();
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<OperationResult<T>> {
    try {
      return { success: true, data: await fn() };
    } catch (error) {
      const failure = toOperationError(error);
      if (isCoordinationError(error) && error.code !== 'STORAGE_CORRUPTION') {
        this.log.debug('Operation rejected', { operation, code: failure.code, reason: failure.message });
      } else {
        this.log.error('Operation failed', { operation, code: failure.code }, error);
      }
      return { success: false, error: failure };
    }
  }
}
