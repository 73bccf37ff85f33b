/**
 * Bootstrap domain types.
 *
 * The create phase moves an instance from NOT_STARTED to COMPLETED (or FAILED);
 * the start phase only reads that state. Both phases talk to the outside world
 * through the interfaces below so they can run against fakes in tests.
 */

// ─── Status record ───────────────────────────────────────────────

export type BootstrapState = 'NOT_STARTED' | 'IN_PROGRESS' | 'COMPLETED' | 'FAILED'

export const BOOTSTRAP_STATES: readonly BootstrapState[] = [
  'NOT_STARTED',
  'IN_PROGRESS',
  'COMPLETED',
  'FAILED',
]

export interface StatusRecord {
  state: BootstrapState
  /** ISO-8601 time of the last write */
  updatedAt: string
  startedAt?: string
  completedAt?: string
  /** Step currently running, or the one that failed */
  step?: string
  /** Failure message (FAILED only) */
  error?: string
  /** Worker process id while IN_PROGRESS */
  pid?: number
}

export interface StatusStore {
  read(): Promise<StatusRecord>
  write(record: StatusRecord): Promise<void>
  /**
   * Take the single-run claim for `pid`. Resolves to the pid of the live
   * holder when the claim is taken, otherwise null.
   */
  claim(pid: number, isAlive: (pid: number) => boolean): Promise<number | null>
  /** Drop the claim if `pid` still holds it */
  release(pid: number): Promise<void>
}

// ─── Filesystem layout ───────────────────────────────────────────

export interface BootstrapPaths {
  /** Notebook home, owned by the notebook user */
  homeDir: string
  /** Owns the private conda installation */
  workingDir: string
  condaPrefix: string
  envsRoot: string
  statusFile: string
  /** Zero-byte marker kept in sync with COMPLETED for older tooling */
  markerFile: string
  logFile: string
  setupScript: string
}

// ─── Plan ────────────────────────────────────────────────────────

export interface BootstrapStep {
  id: string
  description: string
  argv: string[]
}

export interface BootstrapPlan {
  profileId: string
  environmentName: string
  /** Prepended to PATH for every step */
  pathPrefix: string[]
  steps: BootstrapStep[]
}

export interface StepResult {
  id: string
  durationMs: number
}

export interface BootstrapResult {
  skipped: boolean
  state: BootstrapState
  steps: StepResult[]
}

// ─── Commands ────────────────────────────────────────────────────

export interface CommandSpec {
  argv: string[]
  cwd?: string
  env?: Record<string, string>
  timeoutMs?: number
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
  durationMs: number
}

export type OutputStream = 'stdout' | 'stderr'

export interface CommandRunner {
  /**
   * Runs a command to completion. A non-zero exit resolves; only spawn
   * failures and timeouts reject.
   */
  run(spec: CommandSpec, onOutput?: (line: string, stream: OutputStream) => void): Promise<CommandResult>
}

// ─── Start phase ─────────────────────────────────────────────────

export type InitSystem = 'systemd' | 'upstart'

export interface KernelSpec {
  name: string
  displayName: string
}

export interface KernelRegistrar {
  register(environment: string): Promise<KernelSpec>
}

export interface ServiceRestarter {
  readonly initSystem: InitSystem
  restart(): Promise<void>
}

export interface ActivationResult {
  ready: boolean
  kernels: KernelSpec[]
  restarted: boolean
  initSystem?: InitSystem
}
