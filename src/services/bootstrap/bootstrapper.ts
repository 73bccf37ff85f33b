/**
 * Create-phase bootstrapper.
 *
 * Runs the plan once per instance: each step in order, stopping at the first
 * failure. Progress goes to the status record before each step so an
 * observer (start phase, watchdog, API) always sees where the run is. A
 * COMPLETED record is only written after the last step succeeds.
 */

import { bootstrapLogger, toError } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import { bootstrapEvents } from '../events/bootstrapEvents.js'
import type { BootstrapEventEmitter } from '../events/bootstrapEvents.js'
import { formatCommand } from './commandRunner.js'
import { BootstrapInProgressError, BootstrapStepError } from './errors.js'
import { planPath } from './plan.js'
import type {
  BootstrapPlan,
  BootstrapResult,
  BootstrapStep,
  CommandRunner,
  StatusRecord,
  StatusStore,
  StepResult,
} from './types.js'

export const DEFAULT_STEP_TIMEOUT_MS = 30 * 60 * 1000

export interface BootstrapperOptions {
  plan: BootstrapPlan
  store: StatusStore
  runner: CommandRunner
  stepTimeoutMs?: number
  cwd?: string
  logger?: Logger
  events?: BootstrapEventEmitter
  now?: () => Date
  pid?: number
  isProcessAlive?: (pid: number) => boolean
}

export interface RunOptions {
  /** Re-run even when the record already says COMPLETED */
  force?: boolean
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return error instanceof Error && 'code' in error && error.code === 'EPERM'
  }
}

export class CreatePhaseBootstrapper {
  private plan: BootstrapPlan
  private store: StatusStore
  private runner: CommandRunner
  private stepTimeoutMs: number
  private cwd?: string
  private logger: Logger
  private events: BootstrapEventEmitter
  private now: () => Date
  private pid: number
  private isAlive: (pid: number) => boolean

  constructor(options: BootstrapperOptions) {
    this.plan = options.plan
    this.store = options.store
    this.runner = options.runner
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS
    this.cwd = options.cwd
    this.logger = options.logger ?? bootstrapLogger
    this.events = options.events ?? bootstrapEvents
    this.now = options.now ?? (() => new Date())
    this.pid = options.pid ?? process.pid
    this.isAlive = options.isProcessAlive ?? isProcessAlive
  }

  async run(options: RunOptions = {}): Promise<BootstrapResult> {
    const holder = await this.store.claim(this.pid, this.isAlive)
    if (holder !== null) {
      throw new BootstrapInProgressError(holder)
    }

    try {
      return await this.runClaimed(options)
    } finally {
      await this.store.release(this.pid)
    }
  }

  /**
   * Throw BootstrapInProgressError when the record names another live owner.
   */
  async assertIdle(): Promise<void> {
    this.assertNoLiveOwner(await this.store.read())
  }

  private assertNoLiveOwner(record: StatusRecord): void {
    if (
      record.state === 'IN_PROGRESS' &&
      record.pid !== undefined &&
      record.pid !== this.pid &&
      this.isAlive(record.pid)
    ) {
      throw new BootstrapInProgressError(record.pid)
    }
  }

  private async runClaimed(options: RunOptions): Promise<BootstrapResult> {
    const current = await this.store.read()

    if (current.state === 'COMPLETED' && !options.force) {
      this.logger.info('Environment already bootstrapped, nothing to do', {
        operation: 'bootstrap',
        completedAt: current.completedAt,
      })
      return { skipped: true, state: 'COMPLETED', steps: [] }
    }

    // The setup script records its pid without taking the claim
    this.assertNoLiveOwner(current)

    if (current.state === 'IN_PROGRESS') {
      this.logger.warn('Previous bootstrap did not finish, starting over', {
        operation: 'bootstrap',
        step: current.step,
        pid: current.pid,
      })
    }

    const startedAt = this.now().toISOString()
    const base: StatusRecord = {
      state: 'IN_PROGRESS',
      updatedAt: startedAt,
      startedAt,
      pid: this.pid,
    }

    this.logger.info('Starting bootstrap', {
      operation: 'bootstrap',
      profile: this.plan.profileId,
      steps: this.plan.steps.length,
    })

    const results: StepResult[] = []
    for (const step of this.plan.steps) {
      await this.writeStatus({ ...base, updatedAt: this.now().toISOString(), step: step.id })
      results.push(await this.runStep(step, base))
    }

    const completedAt = this.now().toISOString()
    await this.writeStatus({
      state: 'COMPLETED',
      updatedAt: completedAt,
      startedAt,
      completedAt,
    })

    this.logger.info('Bootstrap completed', {
      operation: 'bootstrap',
      profile: this.plan.profileId,
      durationMs: results.reduce((sum, r) => sum + r.durationMs, 0),
    })

    return { skipped: false, state: 'COMPLETED', steps: results }
  }

  private async runStep(step: BootstrapStep, base: StatusRecord): Promise<StepResult> {
    this.logger.info(step.description, { operation: 'bootstrap', step: step.id })
    this.events.emitLog({ timestamp: this.now(), message: step.description, level: 'info', step: step.id })

    let failure: BootstrapStepError
    try {
      const result = await this.runner.run(
        {
          argv: step.argv,
          cwd: this.cwd,
          env: { PATH: planPath(this.plan) },
          timeoutMs: this.stepTimeoutMs,
        },
        (line, stream) => {
          this.logger.debug(line, { step: step.id, stream })
          this.events.emitLog({
            timestamp: this.now(),
            message: line,
            level: stream === 'stderr' ? 'warn' : 'info',
            step: step.id,
          })
        }
      )

      if (result.exitCode === 0) {
        return { id: step.id, durationMs: result.durationMs }
      }

      const detail = lastLine(result.stderr)
      failure = new BootstrapStepError(
        `Step ${step.id} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
        step.id,
        result.exitCode
      )
    } catch (error) {
      const cause = toError(error)
      failure = new BootstrapStepError(`Step ${step.id} failed: ${cause.message}`, step.id, null, cause)
    }

    this.logger.error(
      'Bootstrap step failed',
      { operation: 'bootstrap', step: step.id, command: formatCommand(step.argv) },
      failure
    )
    await this.writeStatus({
      state: 'FAILED',
      updatedAt: this.now().toISOString(),
      startedAt: base.startedAt,
      step: step.id,
      error: failure.message,
    })
    throw failure
  }

  private async writeStatus(record: StatusRecord): Promise<void> {
    await this.store.write(record)
    this.events.emitStatus({
      state: record.state,
      timestamp: this.now(),
      step: record.step,
      error: record.error,
    })
  }
}

function lastLine(text: string): string | undefined {
  const lines = text.split('\n').map(line => line.trim()).filter(Boolean)
  return lines[lines.length - 1]
}
