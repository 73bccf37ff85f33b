import { describe, it, expect, vi } from 'vitest'
import {
  createServiceRestarter,
  detectInitSystem,
  SYSTEMD_RESTART_ARGV,
  UPSTART_RESTART_ARGV,
} from './serviceRestarter.js'
import type { InitProbe } from './serviceRestarter.js'
import { ServiceRestartError } from './errors.js'
import type { CommandResult, CommandRunner } from './types.js'

function probe(directories: string[], executables: string[]): InitProbe {
  return {
    isDirectory: path => directories.includes(path),
    isExecutable: path => executables.includes(path),
  }
}

function runnerReturning(result: Partial<CommandResult>): CommandRunner {
  return {
    run: vi.fn(async () => ({ exitCode: 0, stdout: '', stderr: '', durationMs: 1, ...result })),
  }
}

describe('detectInitSystem', () => {
  it('picks systemd when its runtime directory exists', () => {
    expect(detectInitSystem(probe(['/run/systemd/system'], ['/sbin/initctl']))).toBe('systemd')
  })

  it('picks upstart when only initctl is present', () => {
    expect(detectInitSystem(probe([], ['/sbin/initctl']))).toBe('upstart')
    expect(detectInitSystem(probe([], ['/usr/sbin/initctl']))).toBe('upstart')
  })

  it('falls back to systemd', () => {
    expect(detectInitSystem(probe([], []))).toBe('systemd')
  })
})

describe('createServiceRestarter', () => {
  it('restarts through systemctl without blocking', async () => {
    const runner = runnerReturning({})
    const restarter = createServiceRestarter('systemd', runner)

    await restarter.restart()

    expect(restarter.initSystem).toBe('systemd')
    expect(runner.run).toHaveBeenCalledWith({ argv: SYSTEMD_RESTART_ARGV, timeoutMs: 60000 })
    expect(SYSTEMD_RESTART_ARGV).toEqual(['sudo', 'systemctl', '--no-block', 'restart', 'jupyter-server.service'])
  })

  it('restarts through initctl on upstart', async () => {
    const runner = runnerReturning({})
    const restarter = createServiceRestarter('upstart', runner)

    await restarter.restart()

    expect(restarter.initSystem).toBe('upstart')
    expect(runner.run).toHaveBeenCalledWith({ argv: UPSTART_RESTART_ARGV, timeoutMs: 60000 })
    expect(UPSTART_RESTART_ARGV).toEqual(['sudo', 'initctl', 'restart', 'jupyter-server', '--no-wait'])
  })

  it('reports a failed restart with its output', async () => {
    const restarter = createServiceRestarter('systemd', runnerReturning({ exitCode: 5, stderr: 'Unit not found.\n' }))

    await expect(restarter.restart()).rejects.toThrow(
      'Restarting jupyter-server via systemd exited with code 5: Unit not found.'
    )
  })

  it('wraps runner errors', async () => {
    const runner: CommandRunner = {
      run: vi.fn(async () => {
        throw new Error('spawn sudo ENOENT')
      }),
    }

    const error = await createServiceRestarter('upstart', runner)
      .restart()
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ServiceRestartError)
    expect(error).toMatchObject({
      message: 'Failed to restart jupyter-server via upstart: spawn sudo ENOENT',
      initSystem: 'upstart',
    })
  })
})
