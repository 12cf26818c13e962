import type {
  SessionEvent,
  SessionEventKind,
  SessionEventQuery,
  WorkflowProgress,
} from '../types/index.js';
import type { StorageProvider } from '../storage/index.js';
import { decodeRecord, readRecord, toDocument } from '../storage/index.js';
import {
  validate,
  uuidSchema,
  sessionEventKindSchema,
  sessionEventQuerySchema,
  sessionLogRecordSchema,
  workflowStepsSchema,
} from '../utils/validation.js';
import { toErrorWithMessage } from '../types/index.js';
import { createComponentLogger } from '../utils/logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SessionLogOptions {
  maxEvents: number;
  maxAgeDays: number;  // 0 keeps events regardless of age
}

export function sessionLogKey(agentId: string): string {
  return `agents/${agentId}/session_log`;
}

/**
 * Append-only per-agent event log with bounded retention
 */
export class SessionLogService {
  private log = createComponentLogger('SessionLogService');

  constructor(
    private storage: StorageProvider,
    private options: SessionLogOptions
  ) {}

  async append(
    agentId: string,
    kind: SessionEventKind,
    payload: Record<string, unknown> = {}
  ): Promise<SessionEvent> {
    const id = validate(uuidSchema, agentId);
    const validatedKind = validate(sessionEventKindSchema.required(), kind);
    const key = sessionLogKey(id);
    const event: SessionEvent = {
      agentId: id,
      timestamp: new Date(),
      kind: validatedKind,
      payload,
    };

    await this.storage.mutate(key, (current) => {
      const events = current ? decodeRecord(key, sessionLogRecordSchema, current).events : [];
      return toDocument(id, {
        agentId: id,
        events: this.applyRetention([...events, event], event.timestamp),
      });
    });

    this.log.debug('Session event recorded', { agentId: id, kind: validatedKind });
    return event;
  }

  /**
   * Append for callers whose state change is already written. A failed append
   * is logged as a warning and reported as false; the caller's result stands.
   */
  async record(
    agentId: string,
    kind: SessionEventKind,
    payload: Record<string, unknown> = {}
  ): Promise<boolean> {
    try {
      await this.append(agentId, kind, payload);
      return true;
    } catch (error) {
      this.log.warn('Session event not recorded', {
        agentId,
        kind,
        reason: toErrorWithMessage(error).message,
      });
      return false;
    }
  }

  /**
   * Events for an agent, newest first
   */
  async getEvents(agentId: string, query: SessionEventQuery = {}): Promise<SessionEvent[]> {
    const id = validate(uuidSchema, agentId);
    const { limit, kinds } = validate(sessionEventQuerySchema, query);

    const events = await this.readEvents(id);
    return events
      .filter(event => !kinds || kinds.includes(event.kind))
      .reverse()
      .slice(0, limit);
  }

  /**
   * Match the agent's event kinds, oldest first, against the expected steps
   * as an ordered subsequence. Unrelated events in between are ignored.
   */
  async checkWorkflowProgress(agentId: string, expectedSteps: SessionEventKind[]): Promise<WorkflowProgress> {
    const id = validate(uuidSchema, agentId);
    const steps = validate(workflowStepsSchema, expectedSteps);

    const events = await this.readEvents(id);
    let matched = 0;
    for (const event of events) {
      if (matched < steps.length && event.kind === steps[matched]) {
        matched++;
      }
    }

    return {
      expectedSteps: steps,
      completedSteps: steps.slice(0, matched),
      nextStep: matched < steps.length ? steps[matched] : null,
      isComplete: matched === steps.length,
      progress: matched / steps.length,
    };
  }

  private async readEvents(agentId: string): Promise<SessionEvent[]> {
    const { record } = await readRecord(this.storage, sessionLogKey(agentId), sessionLogRecordSchema);
    return record ? record.events : [];
  }

  private applyRetention(events: SessionEvent[], now: Date): SessionEvent[] {
    const { maxEvents, maxAgeDays } = this.options;
    const cutoff = now.getTime() - maxAgeDays * DAY_MS;
    const recent = maxAgeDays > 0
      ? events.filter(event => event.timestamp.getTime() >= cutoff)
      : events;
    return recent.slice(-maxEvents);
  }
}
