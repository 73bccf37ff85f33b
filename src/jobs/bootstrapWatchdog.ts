/**
 * Stalled Bootstrap Watchdog
 *
 * A hung download or package install would otherwise leave the record at
 * IN_PROGRESS forever. This job marks a run FAILED once its record has not
 * moved for longer than the stale timeout and its owner process is gone.
 * A live owner is bounded by its own step timeout instead.
 *
 * Schedule: every 5 minutes by default (BOOTSTRAP_WATCHDOG_CRON)
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { isProcessAlive } from '../services/bootstrap/bootstrapper.js';
import { ConfigError } from '../services/bootstrap/errors.js';
import { bootstrapEvents } from '../services/events/bootstrapEvents.js';
import type { StatusStore } from '../services/bootstrap/types.js';
import { toError, watchdogLogger } from '../utils/logger.js';

export interface WatchdogOptions {
  staleAfterMs: number;
  schedule: string;
  now?: () => Date;
  isProcessAlive?: (pid: number) => boolean;
}

export type WatchdogOutcome = 'idle' | 'healthy' | 'stalled';

export class StalledBootstrapWatchdog {
  private cronJob: ScheduledTask | null = null;
  private now: () => Date;
  private isAlive: (pid: number) => boolean;

  constructor(
    private store: StatusStore,
    private options: WatchdogOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.isAlive = options.isProcessAlive ?? isProcessAlive;
  }

  start() {
    if (this.cronJob) {
      watchdogLogger.info('Watchdog already running');
      return;
    }

    if (!cron.validate(this.options.schedule)) {
      throw new ConfigError(
        `Invalid watchdog schedule "${this.options.schedule}"`,
        'BOOTSTRAP_WATCHDOG_CRON'
      );
    }

    this.cronJob = cron.schedule(this.options.schedule, async () => {
      try {
        await this.check();
      } catch (error) {
        watchdogLogger.error('Watchdog check failed', { operation: 'watchdog' }, toError(error));
      }
    });

    watchdogLogger.info('Watchdog started', {
      operation: 'watchdog',
      schedule: this.options.schedule,
      staleAfterMs: this.options.staleAfterMs,
    });
  }

  stop() {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      watchdogLogger.info('Watchdog stopped');
    }
  }

  /**
   * Inspect the record once; fail it if it is IN_PROGRESS, stale and orphaned.
   */
  async check(): Promise<WatchdogOutcome> {
    const record = await this.store.read();
    if (record.state !== 'IN_PROGRESS') {
      return 'idle';
    }

    const idleMs = this.now().getTime() - Date.parse(record.updatedAt);
    if (idleMs <= this.options.staleAfterMs) {
      return 'healthy';
    }

    if (record.pid !== undefined && this.isAlive(record.pid)) {
      watchdogLogger.debug('Stale record still has a live owner', {
        operation: 'watchdog',
        step: record.step,
        pid: record.pid,
        idleMs,
      });
      return 'healthy';
    }

    const error = `Bootstrap stalled: no progress since ${record.updatedAt}`;
    const updatedAt = this.now().toISOString();
    await this.store.write({
      state: 'FAILED',
      updatedAt,
      startedAt: record.startedAt,
      step: record.step,
      error,
    });
    bootstrapEvents.emitStatus({ state: 'FAILED', timestamp: this.now(), step: record.step, error });

    watchdogLogger.warn('Marked stalled bootstrap as failed', {
      operation: 'watchdog',
      step: record.step,
      pid: record.pid,
      idleMs,
    });
    return 'stalled';
  }
}
