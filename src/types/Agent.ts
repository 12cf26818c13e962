export const AGENT_TYPES = ['opencode', 'cursor', 'claude_code', 'custom'] as const;
export type AgentType = typeof AGENT_TYPES[number];

export type AgentStatus = 'active' | 'inactive';

export interface AgentProfile {
  id: string;  // UUID v5 of the agent name
  name: string;
  type: AgentType;
  capabilities: string[];
  status: AgentStatus;
  clientVersion: string;  // version string reported by the agent client
  createdAt: Date;
  lastActive: Date;
  totalSessions: number;
  projectsInvolved: string[];
  version: number;
  isDeleted: boolean;
}

export interface AgentRegisterInput {
  name: string;
  type: AgentType;
  capabilities?: string[];
  clientVersion?: string;
}

export interface AgentFilters {
  status?: AgentStatus;
}
