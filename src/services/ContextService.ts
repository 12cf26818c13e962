import type {
  ActiveAgentSummary,
  AgentContextView,
  ContextEntry,
  ContextEntryInput,
  ContextOptions,
  EndContextResult,
  StartContextResult,
  SwitchContextResult,
  UpdateContextResult,
  WorkContext,
} from '../types/index.js';
import type { StorageProvider } from '../storage/index.js';
import { decodeRecord, readRecord, toDocument } from '../storage/index.js';
import {
  validate,
  uuidSchema,
  projectIdSchema,
  objectiveSchema,
  filePathSchema,
  contextOptionsSchema,
  contextEntrySchema,
  historyLimitSchema,
  contextHistoryRecordSchema,
  workContextRecordSchema,
  MAX_CONTEXT_ENTRIES,
} from '../utils/validation.js';
import { BusyError } from '../utils/errors.js';
import { backoff, normalizeFilePath } from '../utils/index.js';
import { createComponentLogger } from '../utils/logger.js';
import type { AgentService } from './AgentService.js';
import type { FileLockService } from './FileLockService.js';
import type { SessionLogService } from './SessionLogService.js';

export function contextKey(agentId: string): string {
  return `agents/${agentId}/context`;
}

export function contextHistoryKey(agentId: string): string {
  return `agents/${agentId}/context_history`;
}

type NotActive = { status: 'not_active' };
type ContextConflict = { status: 'context_conflict'; active: WorkContext };

interface SlotWrite {
  previous: WorkContext | null;  // slot content the write replaced
  context: WorkContext;
}

function isContext(value: WorkContext | { status: string }): value is WorkContext {
  return !('status' in value);
}

function isActive(context: WorkContext | null): context is WorkContext {
  return context !== null && context.endedAt === null;
}

/**
 * Work context state machine: NONE -> ACTIVE (start), ACTIVE -> ACTIVE (switch),
 * ACTIVE -> NONE (end). Each agent owns exactly one context slot; an ended
 * context stays in the slot with its endedAt set until the next start.
 *
 * File locks are never released here. Session events are recorded after the
 * slot is written; a failed append does not undo the transition.
 */
export class ContextService {
  private log = createComponentLogger('ContextService');

  constructor(
    private storage: StorageProvider,
    private agentService: AgentService,
    private lockService: FileLockService,
    private sessionLog: SessionLogService
  ) {}

  async start(
    agentId: string,
    projectId: string,
    objective: string,
    options: ContextOptions = {}
  ): Promise<StartContextResult> {
    const id = validate(uuidSchema, agentId);
    const validatedProjectId = validate(projectIdSchema, projectId);
    const validatedObjective = validate(objectiveSchema, objective);
    const { taskDescription, priority, currentFile } = validate(contextOptionsSchema, options);

    await this.agentService.requireAgent(id);

    const outcome = await this.writeSlot<ContextConflict>(id, 'start', (current) => {
      if (isActive(current)) {
        return { status: 'context_conflict', active: current };
      }
      return {
        agentId: id,
        projectId: validatedProjectId,
        objective: validatedObjective,
        taskDescription: taskDescription ?? '',
        priority: priority ?? 'medium',
        currentFile: currentFile ? normalizeFilePath(currentFile) : null,
        startedAt: new Date(),
        endedAt: null,
        version: 0,
      };
    });

    if ('status' in outcome) {
      this.log.debug('Context already active', { agentId: id, projectId: outcome.active.projectId });
      return outcome;
    }
    const { context } = outcome;

    await this.agentService.recordSession(id, validatedProjectId);
    await this.sessionLog.record(id, 'started', {
      projectId: validatedProjectId,
      objective: validatedObjective,
      priority: context.priority,
    });

    this.log.info('Context started', { agentId: id, projectId: validatedProjectId });
    return { status: 'started', context };
  }

  /**
   * Replace the active context in one write. Held locks are kept.
   */
  async switch(
    agentId: string,
    newProjectId: string,
    newObjective: string,
    options: ContextOptions = {}
  ): Promise<SwitchContextResult> {
    const id = validate(uuidSchema, agentId);
    const validatedProjectId = validate(projectIdSchema, newProjectId);
    const validatedObjective = validate(objectiveSchema, newObjective);
    const { taskDescription, priority, currentFile } = validate(contextOptionsSchema, options);

    const outcome = await this.writeSlot<NotActive>(id, 'switch', (current) => {
      if (!isActive(current)) {
        return { status: 'not_active' };
      }
      return {
        agentId: id,
        projectId: validatedProjectId,
        objective: validatedObjective,
        taskDescription: taskDescription ?? '',
        priority: priority ?? current.priority,
        currentFile: currentFile ? normalizeFilePath(currentFile) : null,
        startedAt: new Date(),
        endedAt: null,
        version: 0,
      };
    });

    if ('status' in outcome || outcome.previous === null) {
      return { status: 'not_active' };
    }
    const previous = outcome.previous;
    const context = outcome.context;

    if (previous.projectId !== validatedProjectId) {
      await this.agentService.recordSession(id, validatedProjectId);
    } else {
      await this.agentService.touch(id);
    }
    await this.sessionLog.record(id, 'switched', {
      from: { projectId: previous.projectId, objective: previous.objective },
      to: { projectId: validatedProjectId, objective: validatedObjective },
    });

    this.log.info('Context switched', {
      agentId: id,
      fromProjectId: previous.projectId,
      projectId: validatedProjectId,
    });
    return { status: 'switched', from: previous, context };
  }

  /**
   * End the active context. Ending with nothing active is not an error.
   */
  async end(agentId: string): Promise<EndContextResult> {
    const id = validate(uuidSchema, agentId);
    const endedAt = new Date();

    const outcome = await this.writeSlot<NotActive>(id, 'end', (current) => {
      if (!isActive(current)) {
        return { status: 'not_active' };
      }
      return { ...current, endedAt };
    });

    if ('status' in outcome) {
      return outcome;
    }
    const { context } = outcome;

    await this.sessionLog.record(id, 'ended', {
      projectId: context.projectId,
      objective: context.objective,
      durationSeconds: Math.round((endedAt.getTime() - context.startedAt.getTime()) / 1000),
    });

    this.log.info('Context ended', { agentId: id, projectId: context.projectId });
    return { status: 'ended', context };
  }

  /**
   * The agent's active context, or null
   */
  async getCurrent(agentId: string): Promise<WorkContext | null> {
    const id = validate(uuidSchema, agentId);
    const { record } = await readRecord(this.storage, contextKey(id), workContextRecordSchema);
    return isActive(record) ? record : null;
  }

  async setCurrentFile(agentId: string, filePath: string): Promise<UpdateContextResult> {
    const id = validate(uuidSchema, agentId);
    const currentFile = normalizeFilePath(validate(filePathSchema.required(), filePath));

    const outcome = await this.writeSlot<NotActive>(id, 'setCurrentFile', (current) => {
      if (!isActive(current)) {
        return { status: 'not_active' };
      }
      return { ...current, currentFile };
    });

    if ('status' in outcome) {
      return outcome;
    }
    return { status: 'updated', context: outcome.context };
  }

  /**
   * Agents whose active context is in the given project
   */
  async listActiveInProject(projectId: string): Promise<ActiveAgentSummary[]> {
    const validatedProjectId = validate(projectIdSchema, projectId);
    const agents = await this.agentService.listAgents({ status: 'active' });
    const summaries: ActiveAgentSummary[] = [];

    for (const agent of agents) {
      const context = await this.getCurrent(agent.id);
      if (context && context.projectId === validatedProjectId) {
        summaries.push({
          agentId: agent.id,
          agentName: agent.name,
          agentType: agent.type,
          objective: context.objective,
          priority: context.priority,
          currentFile: context.currentFile,
          startedAt: context.startedAt,
          lockedFilesCount: 0,
        });
      }
    }

    if (summaries.length > 0) {
      const { byAgent } = await this.lockService.getLockedFiles(validatedProjectId);
      for (const summary of summaries) {
        summary.lockedFilesCount = byAgent[summary.agentId]?.length ?? 0;
      }
    }

    return summaries;
  }

  /**
   * Record work done on a file. The agent keeps its newest entries only.
   */
  async addContextEntry(agentId: string, input: ContextEntryInput): Promise<ContextEntry> {
    const id = validate(uuidSchema, agentId);
    const { file, operation, summary } = validate(contextEntrySchema, input);

    await this.agentService.requireAgent(id);

    const entry: ContextEntry = {
      timestamp: new Date(),
      file: normalizeFilePath(file),
      operation,
      summary,
    };
    const key = contextHistoryKey(id);
    await this.storage.mutate(key, (current) => {
      const entries = current ? decodeRecord(key, contextHistoryRecordSchema, current).entries : [];
      return toDocument(id, { agentId: id, entries: [...entries, entry].slice(-MAX_CONTEXT_ENTRIES) });
    });

    this.log.debug('Context entry recorded', { agentId: id, file: entry.file, fileOperation: operation });
    return entry;
  }

  /**
   * The agent's newest context entries, oldest first
   */
  async getContextHistory(agentId: string, limit?: number): Promise<ContextEntry[]> {
    const id = validate(uuidSchema, agentId);
    const count = validate(historyLimitSchema, limit);
    const { record } = await readRecord(this.storage, contextHistoryKey(id), contextHistoryRecordSchema);
    return record ? record.entries.slice(-count) : [];
  }

  async getFullContext(agentId: string): Promise<AgentContextView> {
    const id = validate(uuidSchema, agentId);
    const agent = await this.agentService.requireAgent(id);

    return {
      agent,
      context: await this.getCurrent(id),
      lockedFiles: await this.lockService.getAgentLocks(id),
      recentContext: await this.getContextHistory(id),
    };
  }

  /**
   * Optimistic read-verify-write of the agent's context slot. `decide` sees the
   * slot's current content and returns either the next context or a result that
   * ends the operation without writing.
   */
  private async writeSlot<R extends { status: string }>(
    agentId: string,
    operation: string,
    decide: (current: WorkContext | null) => WorkContext | R
  ): Promise<SlotWrite | R> {
    const key = contextKey(agentId);
    const { maxRetries } = this.storage.getRetryOptions();

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const { record, version } = await readRecord(this.storage, key, workContextRecordSchema);
      const next = decide(record);
      if (!isContext(next)) {
        return next;
      }

      const context: WorkContext = next;
      const result = await this.storage.put(key, toDocument(agentId, { ...context }), version);
      if (result.status === 'ok') {
        return { previous: record, context: { ...context, version: result.version } };
      }

      this.log.trace('Context slot changed concurrently, retrying', {
        agentId,
        operation,
        attempt,
        actualVersion: result.actualVersion,
      });
      await backoff(attempt);
    }

    throw new BusyError(key, maxRetries + 1, `${operation} kept conflicting`);
  }
}
