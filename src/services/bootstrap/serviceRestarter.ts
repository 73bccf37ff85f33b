/**
 * Notebook server restart strategies.
 *
 * The init system is picked by probing for its runtime capability rather than
 * by matching OS release text: a booted systemd always exposes
 * /run/systemd/system, and Upstart ships an `initctl` binary.
 */

import { accessSync, constants, statSync } from 'fs'
import { ServiceRestartError } from './errors.js'
import type { CommandRunner, InitSystem, ServiceRestarter } from './types.js'

export const JUPYTER_SERVICE = 'jupyter-server'
export const SYSTEMD_RUNTIME_DIR = '/run/systemd/system'
export const INITCTL_CANDIDATES = ['/sbin/initctl', '/usr/sbin/initctl', '/bin/initctl']

export const SYSTEMD_RESTART_ARGV = ['sudo', 'systemctl', '--no-block', 'restart', `${JUPYTER_SERVICE}.service`]
export const UPSTART_RESTART_ARGV = ['sudo', 'initctl', 'restart', JUPYTER_SERVICE, '--no-wait']

const RESTART_TIMEOUT_MS = 60 * 1000

export interface InitProbe {
  isDirectory(path: string): boolean
  isExecutable(path: string): boolean
}

export const fsProbe: InitProbe = {
  isDirectory(path) {
    try {
      return statSync(path).isDirectory()
    } catch {
      return false
    }
  },
  isExecutable(path) {
    try {
      accessSync(path, constants.X_OK)
      return true
    } catch {
      return false
    }
  },
}

export function detectInitSystem(probe: InitProbe = fsProbe): InitSystem {
  if (probe.isDirectory(SYSTEMD_RUNTIME_DIR)) return 'systemd'
  if (INITCTL_CANDIDATES.some(path => probe.isExecutable(path))) return 'upstart'
  return 'systemd'
}

abstract class CommandRestarter implements ServiceRestarter {
  abstract readonly initSystem: InitSystem
  protected abstract readonly argv: string[]

  constructor(private runner: CommandRunner) {}

  async restart(): Promise<void> {
    let exitCode: number
    let stderr = ''
    try {
      const result = await this.runner.run({ argv: this.argv, timeoutMs: RESTART_TIMEOUT_MS })
      exitCode = result.exitCode
      stderr = result.stderr.trim()
    } catch (error) {
      const cause = error instanceof Error ? error : undefined
      throw new ServiceRestartError(
        `Failed to restart ${JUPYTER_SERVICE} via ${this.initSystem}: ${cause?.message ?? String(error)}`,
        this.initSystem,
        cause
      )
    }

    if (exitCode !== 0) {
      throw new ServiceRestartError(
        `Restarting ${JUPYTER_SERVICE} via ${this.initSystem} exited with code ${exitCode}${stderr ? `: ${stderr}` : ''}`,
        this.initSystem
      )
    }
  }
}

export class SystemdRestarter extends CommandRestarter {
  readonly initSystem = 'systemd'
  protected readonly argv = SYSTEMD_RESTART_ARGV
}

export class UpstartRestarter extends CommandRestarter {
  readonly initSystem = 'upstart'
  protected readonly argv = UPSTART_RESTART_ARGV
}

export function createServiceRestarter(initSystem: InitSystem, runner: CommandRunner): ServiceRestarter {
  switch (initSystem) {
    case 'systemd':
      return new SystemdRestarter(runner)
    case 'upstart':
      return new UpstartRestarter(runner)
  }
}
