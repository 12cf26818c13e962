import os from 'os';
import path from 'path';
import { rmSync, existsSync } from 'fs';
import type {
  AgentRegisterInput,
  DocumentBody,
  ProjectCreateInput,
  PutResult,
  WriteOptions,
} from '../../src/types/index.js';
import type { CoordinationConfig } from '../../src/config/index.js';
import { loadConfig } from '../../src/config/index.js';
import { FileStorageProvider } from '../../src/storage/FileStorageProvider.js';
import { AgentService } from '../../src/services/AgentService.js';
import { SessionLogService } from '../../src/services/SessionLogService.js';
import { ContextService } from '../../src/services/ContextService.js';
import { FileLockService } from '../../src/services/FileLockService.js';
import { SweeperService } from '../../src/services/SweeperService.js';
import { ProjectService } from '../../src/services/ProjectService.js';

export const createMockAgentInput = (overrides?: Partial<AgentRegisterInput>): AgentRegisterInput => {
  return {
    name: 'test-agent',
    type: 'custom',
    capabilities: ['python', 'typescript'],
    ...overrides,
  };
};

export const createMockProjectInput = (overrides?: Partial<ProjectCreateInput>): ProjectCreateInput => {
  return {
    name: 'test-project',
    description: 'A test project',
    ...overrides,
  };
};

// Helper function to create test data directory
export const createTestDataDir = (suffix: string = ''): string => {
  const unique = `${Date.now()}-${process.pid}-${Math.random().toString(36).slice(2, 8)}`;
  return path.join(os.tmpdir(), `agent-coord-test-${unique}${suffix}`);
};

export const removeTestDataDir = (dataDir: string): void => {
  if (existsSync(dataDir)) {
    rmSync(dataDir, { recursive: true, force: true });
  }
};

// Helper function to wait for a certain time (useful for testing time-based operations)
export const sleep = (ms: number): Promise<void> => {
  return new Promise(resolve => setTimeout(resolve, ms));
};

interface PutHold {
  gate: Promise<void>;
  signalEntered: () => void;
}

/**
 * File storage that can pause a put on a chosen key, so a test can let another
 * process write in between a service's read and its write.
 */
export class HeldStorageProvider extends FileStorageProvider {
  private holds: Map<string, PutHold> = new Map();

  /**
   * Pause the next put on `key` before it touches the file. `entered` resolves
   * once the put is waiting; `release` lets it continue.
   */
  holdNextPut(key: string): { entered: Promise<void>; release: () => void } {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    let signalEntered: () => void = () => undefined;
    const entered = new Promise<void>(resolve => {
      signalEntered = resolve;
    });

    this.holds.set(key, { gate, signalEntered });
    return { entered, release };
  }

  override async put(key: string, record: DocumentBody, expectedVersion: number, options?: WriteOptions): Promise<PutResult> {
    const hold = this.holds.get(key);
    if (hold) {
      this.holds.delete(key);
      hold.signalEntered();
      await hold.gate;
    }
    return super.put(key, record, expectedVersion, options);
  }
}

/**
 * One independent set of services over its own storage instance. Several of
 * these on one directory behave like separate processes: they share nothing
 * but the files.
 */
export interface TestProcess {
  config: CoordinationConfig;
  storage: FileStorageProvider;
  agents: AgentService;
  sessionLog: SessionLogService;
  contexts: ContextService;
  locks: FileLockService;
  sweeper: SweeperService;
  projects: ProjectService;
}

export const createTestProcess = async (
  dataDir: string,
  locks: Partial<CoordinationConfig['locks']> = {},
  sessionLog: Partial<CoordinationConfig['sessionLog']> = {},
  storageOverride?: FileStorageProvider
): Promise<TestProcess> => {
  const config = loadConfig({
    storage: { dataDir, maxRetries: 20 },
    locks: { sweepIntervalSeconds: 0, ...locks },
    sessionLog,
  });

  const storage = storageOverride ?? new FileStorageProvider(dataDir, {
    lockStaleMs: config.storage.lockStaleMs,
    maxRetries: config.storage.maxRetries,
  });
  await storage.initialize();

  const agents = new AgentService(storage);
  const log = new SessionLogService(storage, config.sessionLog);
  const lockService = new FileLockService(storage, agents, log, {
    defaultTtlSeconds: config.locks.defaultTtlSeconds,
    maxLocksPerAgent: config.locks.maxLocksPerAgent,
  });
  return {
    config,
    storage,
    agents,
    sessionLog: log,
    contexts: new ContextService(storage, agents, lockService, log),
    locks: lockService,
    sweeper: new SweeperService(storage, { intervalSeconds: config.locks.sweepIntervalSeconds }),
    projects: new ProjectService(storage),
  };
};
