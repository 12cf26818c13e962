/**
 * agent-coord
 * Coordination core for multiple coding agents working on shared projects:
 * agent identity, work contexts, file locks and session logs over a
 * file-backed store that is safe to share between processes.
 */

import { loadConfig } from './config/index.js';
import type { CoordinationConfigOverrides } from './config/index.js';
import { createStorageProvider } from './storage/index.js';
import { CoordinationService } from './services/CoordinationService.js';
import { logger } from './utils/logger.js';

export interface CoordinatorOptions {
  startSweeper?: boolean;  // defaults to true
}

/**
 * Load configuration, open storage and wire the services together
 */
export async function createCoordinator(
  overrides: CoordinationConfigOverrides = {},
  options: CoordinatorOptions = {}
): Promise<CoordinationService> {
  const config = loadConfig(overrides);
  logger.setLogLevel(config.logging.level);

  const storage = createStorageProvider(config);
  await storage.initialize();

  const coordinator = new CoordinationService(storage, config);
  if (options.startSweeper ?? true) {
    coordinator.sweeper.start();
  }

  logger.info('Coordinator ready', {
    dataDir: config.storage.dataDir,
    sweepIntervalSeconds: config.locks.sweepIntervalSeconds,
  });
  return coordinator;
}

export { loadConfig, getConfigExamples } from './config/index.js';
export type { CoordinationConfig, CoordinationConfigOverrides } from './config/index.js';
export { CoordinationService } from './services/CoordinationService.js';
export { AgentService, agentIdFor } from './services/AgentService.js';
export { ContextService } from './services/ContextService.js';
export { FileLockService } from './services/FileLockService.js';
export { SessionLogService } from './services/SessionLogService.js';
export { SweeperService } from './services/SweeperService.js';
export { ProjectService } from './services/ProjectService.js';
export { FileStorageProvider, BaseStorageProvider, createStorageProvider } from './storage/index.js';
export type { StorageProvider, MutateFn } from './storage/index.js';
export * from './utils/errors.js';
export { Logger, logger, createComponentLogger } from './utils/logger.js';
export type * from './types/index.js';
