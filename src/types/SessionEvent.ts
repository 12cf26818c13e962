export const SESSION_EVENT_KINDS = ['started', 'switched', 'ended', 'locked', 'unlocked'] as const;
export type SessionEventKind = typeof SESSION_EVENT_KINDS[number];

export interface SessionEvent {
  agentId: string;
  timestamp: Date;
  kind: SessionEventKind;
  payload: Record<string, unknown>;
}

export interface SessionEventQuery {
  limit?: number;
  kinds?: SessionEventKind[];
}

export interface WorkflowProgress {
  expectedSteps: SessionEventKind[];
  completedSteps: SessionEventKind[];
  nextStep: SessionEventKind | null;
  isComplete: boolean;
  progress: number;  // 0..1
}
