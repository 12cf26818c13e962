export interface FileLock {
  projectId: string;
  filePath: string;
  holderAgentId: string;
  reason: string;
  lockedAt: Date;
  expiresAt: Date;
  version: number;
}

export interface AcquireLocksInput {
  agentId: string;
  projectId: string;
  files: string[];
  reason: string;
  ttlSeconds?: number;
}

export type AcquireLocksResult =
  | { status: 'locked'; files: string[]; refreshed: string[]; expiresAt: Date }
  | {
      status: 'conflict';
      file: string;
      holder: string;
      lockedAt: Date;
      expiresAt: Date;
    };

export interface ReleaseLocksResult {
  released: string[];
  notHeld: string[];
}

export interface LockedFilesView {
  projectId: string;
  total: number;
  byAgent: Record<string, FileLock[]>;
}

export interface SweepResult {
  projectId: string;
  purged: number;
  errors: string[];
}

export type ExtendLockResult =
  | { status: 'extended'; lock: FileLock }
  | { status: 'not_held'; holder: string | null };  // holder is null when the file is unlocked
