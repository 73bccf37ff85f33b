/**
 * In-process bootstrap supervisor.
 *
 * Runs the create phase as a tracked job so callers (the API) get an
 * immediate handle and can poll it, instead of firing the run into the
 * background and reading a log file afterwards. The job keeps the tail of
 * the run's log events.
 */

import { randomUUID } from 'crypto'
import { bootstrapLogger, toError } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import { bootstrapEvents } from '../events/bootstrapEvents.js'
import type { BootstrapEventEmitter, BootstrapLogEvent } from '../events/bootstrapEvents.js'
import type { RunOptions } from './bootstrapper.js'
import type { BootstrapResult } from './types.js'

export const JOB_LOG_LINES = 200

export type BootstrapJobState = 'RUNNING' | 'SUCCEEDED' | 'SKIPPED' | 'FAILED'

export interface BootstrapJob {
  id: string
  state: BootstrapJobState
  force: boolean
  startedAt: Date
  finishedAt?: Date
  result?: BootstrapResult
  error?: string
  /** Latest log lines of the run, oldest first */
  log: string[]
}

export interface BootstrapRunner {
  run(options?: RunOptions): Promise<BootstrapResult>
}

export class BootstrapSupervisor {
  private job: BootstrapJob | null = null
  private running: Promise<void> | null = null

  constructor(
    private bootstrapper: BootstrapRunner,
    private logger: Logger = bootstrapLogger,
    private events: BootstrapEventEmitter = bootstrapEvents
  ) {}

  /**
   * Start a run unless one is already going, in which case that job is
   * returned unchanged.
   */
  start(options: RunOptions = {}): BootstrapJob {
    if (this.job?.state === 'RUNNING') {
      return snapshot(this.job)
    }

    const job: BootstrapJob = {
      id: randomUUID(),
      state: 'RUNNING',
      force: options.force ?? false,
      startedAt: new Date(),
      log: [],
    }
    this.job = job
    this.logger.info('Bootstrap job started', { operation: 'supervise', jobId: job.id, force: job.force })

    const onLog = (event: BootstrapLogEvent) => {
      job.log.push(event.step ? `[${event.step}] ${event.message}` : event.message)
      if (job.log.length > JOB_LOG_LINES) job.log.shift()
    }
    this.events.onLog(onLog)

    this.running = this.bootstrapper
      .run(options)
      .finally(() => this.events.removeLogListener(onLog))
      .then(
        result => {
          job.state = result.skipped ? 'SKIPPED' : 'SUCCEEDED'
          job.result = result
          job.finishedAt = new Date()
          this.logger.info('Bootstrap job finished', { operation: 'supervise', jobId: job.id, state: job.state })
        },
        error => {
          const err = toError(error)
          job.state = 'FAILED'
          job.error = err.message
          job.finishedAt = new Date()
          this.logger.error('Bootstrap job failed', { operation: 'supervise', jobId: job.id }, err)
        }
      )

    return snapshot(job)
  }

  current(): BootstrapJob | null {
    return this.job ? snapshot(this.job) : null
  }

  /** Resolves once the current job (if any) has settled */
  async waitForIdle(): Promise<void> {
    await this.running
  }
}

function snapshot(job: BootstrapJob): BootstrapJob {
  return { ...job, log: [...job.log] }
}
