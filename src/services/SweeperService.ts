import type { StorageProvider } from '../storage/index.js';
import { readRecord } from '../storage/index.js';
import type { SweepResult } from '../types/index.js';
import { validate, projectIdSchema, fileLockRecordSchema } from '../utils/validation.js';
import { toErrorWithMessage } from '../types/index.js';
import { createComponentLogger } from '../utils/logger.js';
import { slotGuard } from './FileLockService.js';

export interface SweeperOptions {
  intervalSeconds: number;  // 0 disables the periodic sweep
}

/**
 * Service for reclaiming expired and released lock slots.
 * Lock reads already ignore expired locks, so sweeping only frees disk space.
 */
export class SweeperService {
  private log = createComponentLogger('SweeperService');
  private interval: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(
    private storage: StorageProvider,
    private options: SweeperOptions
  ) {}

  /**
   * Start the periodic sweep
   */
  start(): void {
    this.stop();

    if (this.options.intervalSeconds <= 0) {
      this.log.info('Lock sweeper disabled');
      return;
    }

    this.interval = setInterval(() => {
      void this.runScheduledSweep();
    }, this.options.intervalSeconds * 1000);
    this.interval.unref();

    this.log.info('Lock sweeper started', { intervalSeconds: this.options.intervalSeconds });
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.log.info('Lock sweeper stopped');
    }
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  /**
   * Purge expired and tombstoned lock slots in one project
   */
  async sweepProject(projectId: string): Promise<SweepResult> {
    const validatedProjectId = validate(projectIdSchema, projectId);
    const keys = await this.storage.list(`locks/${validatedProjectId}`);
    const now = new Date();
    const errors: string[] = [];
    let purged = 0;

    for (const key of keys) {
      try {
        if (await this.sweepSlot(key, now)) {
          purged++;
        }
      } catch (error) {
        errors.push(`Failed to sweep ${key}: ${toErrorWithMessage(error).message}`);
      }
    }

    if (purged > 0 || errors.length > 0) {
      this.log.info('Swept lock slots', { projectId: validatedProjectId, purged, errors: errors.length });
    }

    return { projectId: validatedProjectId, purged, errors };
  }

  /**
   * Sweep every project that has lock slots
   */
  async sweepAll(): Promise<SweepResult[]> {
    return this.log.timeAsync('sweepAll', async () => {
      const keys = await this.storage.list('locks');
      const projectIds = [...new Set(keys.map(key => key.split('/')[1]))];

      const results: SweepResult[] = [];
      for (const projectId of projectIds) {
        results.push(await this.sweepProject(projectId));
      }
      return results;
    });
  }

  private async runScheduledSweep(): Promise<void> {
    if (this.sweeping) {
      return;
    }
    this.sweeping = true;
    try {
      await this.sweepAll();
    } catch (error) {
      this.log.error('Scheduled lock sweep failed', {}, error);
    } finally {
      this.sweeping = false;
    }
  }

  /**
   * Purge one slot if it is tombstoned or expired. A slot that changes while
   * being swept, even back to the same version, is left for the next run.
   */
  private async sweepSlot(key: string, now: Date): Promise<boolean> {
    const { record, version } = await readRecord(this.storage, key, fileLockRecordSchema);
    if (version === 0) {
      return false;
    }
    if (record && record.expiresAt.getTime() > now.getTime()) {
      return false;
    }

    const result = await this.storage.purge(key, version, slotGuard(record, version));
    return result.status === 'ok';
  }
}
