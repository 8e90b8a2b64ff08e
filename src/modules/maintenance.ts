// ===========================================
// MODULE: DATA RETENTION
// Daily cleanup of old alert, evaluation and activity rows
// ===========================================

import { CronJob } from 'cron';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { DecisionStore } from '../types/index.js';

// 04:00 UTC every day, outside the usual trading peaks
const CRON_SCHEDULE = '0 0 4 * * *';

export class RetentionJob {
  private cronJob: CronJob | null = null;

  constructor(
    private readonly store: DecisionStore,
    private readonly retentionDays: number
  ) {}

  /**
   * Start the daily cron job
   */
  start(): void {
    if (this.cronJob) {
      logger.warn('Retention job already running');
      return;
    }

    this.cronJob = new CronJob(
      CRON_SCHEDULE,
      async () => {
        await this.runCleanup();
      },
      null,
      true,
      'UTC'
    );

    logger.info({
      schedule: CRON_SCHEDULE,
      retentionDays: this.retentionDays,
      nextRun: this.cronJob.nextDate().toISO(),
    }, 'Retention job started');
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }
  }

  /**
   * Delete records older than the retention period (also called by cron)
   */
  async runCleanup(): Promise<Record<string, number>> {
    try {
      const removed = await this.store.cleanupOlderThan(this.retentionDays);
      const total = Object.values(removed).reduce((sum, n) => sum + n, 0);
      if (total > 0) {
        logger.info({ removed, total }, 'Old records cleaned up');
      }
      return removed;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Retention cleanup failed');
      return {};
    }
  }
}
