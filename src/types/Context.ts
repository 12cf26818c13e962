import type { AgentProfile } from './Agent.js';
import type { FileLock } from './FileLock.js';

export const PRIORITIES = ['critical', 'high', 'medium', 'low'] as const;
export type Priority = typeof PRIORITIES[number];

export interface WorkContext {
  agentId: string;
  projectId: string;
  objective: string;
  taskDescription: string;
  priority: Priority;
  currentFile: string | null;
  startedAt: Date;
  endedAt: Date | null;  // null while the context is active
  version: number;
}

export const FILE_OPERATIONS = ['read', 'write', 'analyze', 'delete'] as const;
export type FileOperation = typeof FILE_OPERATIONS[number];

// One step of work recorded against a file
export interface ContextEntry {
  timestamp: Date;
  file: string;
  operation: FileOperation;
  summary: string;
}

export interface ContextEntryInput {
  file: string;
  operation: FileOperation;
  summary?: string;
}

export interface ContextOptions {
  taskDescription?: string;
  priority?: Priority;
  currentFile?: string;
}

export type StartContextResult =
  | { status: 'started'; context: WorkContext }
  | { status: 'context_conflict'; active: WorkContext };

export type SwitchContextResult =
  | { status: 'switched'; from: WorkContext; context: WorkContext }
  | { status: 'not_active' };

export type EndContextResult =
  | { status: 'ended'; context: WorkContext }
  | { status: 'not_active' };

export type UpdateContextResult =
  | { status: 'updated'; context: WorkContext }
  | { status: 'not_active' };

export interface ActiveAgentSummary {
  agentId: string;
  agentName: string;
  agentType: string;
  objective: string;
  priority: Priority;
  currentFile: string | null;
  startedAt: Date;
  lockedFilesCount: number;
}

/**
 * Everything known about one agent's current work
 */
export interface AgentContextView {
  agent: AgentProfile;
  context: WorkContext | null;   // active context only
  lockedFiles: FileLock[];       // across every project
  recentContext: ContextEntry[]; // oldest first
}
