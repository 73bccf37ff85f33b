import type { InitSystem } from './types.js'

export class ConfigError extends Error {
  constructor(message: string, public variable?: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class StatusStoreError extends Error {
  constructor(
    message: string,
    public path: string,
    public cause?: Error
  ) {
    super(message)
    this.name = 'StatusStoreError'
  }
}

export class BootstrapInProgressError extends Error {
  constructor(public pid: number) {
    super(`Bootstrap already running in process ${pid}`)
    this.name = 'BootstrapInProgressError'
  }
}

export class CommandTimeoutError extends Error {
  constructor(
    public command: string,
    public timeoutMs: number
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`)
    this.name = 'CommandTimeoutError'
  }
}

/**
 * A plan step that exited non-zero or could not be run at all.
 * `exitCode` is null when the process never produced one (spawn failure, timeout).
 */
export class BootstrapStepError extends Error {
  constructor(
    message: string,
    public stepId: string,
    public exitCode: number | null,
    public cause?: Error
  ) {
    super(message)
    this.name = 'BootstrapStepError'
  }
}

export class KernelRegistrationError extends Error {
  constructor(
    message: string,
    public environment: string,
    public cause?: Error
  ) {
    super(message)
    this.name = 'KernelRegistrationError'
  }
}

export class ServiceRestartError extends Error {
  constructor(
    message: string,
    public initSystem: InitSystem,
    public cause?: Error
  ) {
    super(message)
    this.name = 'ServiceRestartError'
  }
}
