/**
 * Detached bootstrap worker.
 *
 * Hands the create phase to a separate process so the lifecycle hook (or the
 * CLI) returns immediately. The worker records its own pid and progress in
 * the status record; if it cannot even be spawned, the failure is written
 * there too rather than only to the log file.
 */

import { spawn } from 'child_process'
import type { ChildProcess, SpawnOptions } from 'child_process'
import { closeSync, mkdirSync, openSync } from 'fs'
import { dirname } from 'path'
import { bootstrapLogger, toError } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import type { StatusStore } from './types.js'

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess

export interface WorkerLaunchOptions {
  /** Entry script that understands the `bootstrap` command */
  cliPath: string
  logFile: string
  store: StatusStore
  force?: boolean
  /** Interpreter flags, e.g. a TypeScript loader when running from source */
  execArgv?: string[]
  spawnFn?: SpawnFn
  logger?: Logger
}

export interface LaunchedWorker {
  pid: number | undefined
  /** true once the process is running; false after a spawn failure has been recorded */
  spawned: Promise<boolean>
}

export function launchBootstrapWorker(options: WorkerLaunchOptions): LaunchedWorker {
  const spawnFn: SpawnFn = options.spawnFn ?? spawn
  const logger = options.logger ?? bootstrapLogger
  const args = [...(options.execArgv ?? process.execArgv), options.cliPath, 'bootstrap']
  if (options.force) args.push('--force')

  mkdirSync(dirname(options.logFile), { recursive: true })
  const fd = openSync(options.logFile, 'a')

  let child: ChildProcess
  try {
    child = spawnFn(process.execPath, args, {
      detached: true,
      stdio: ['ignore', fd, fd],
      env: process.env,
    })
  } finally {
    closeSync(fd)
  }

  const spawned = new Promise<boolean>(resolve => {
    child.once('spawn', () => resolve(true))
    child.once('error', error => {
      const err = toError(error)
      logger.error('Failed to launch bootstrap worker', { operation: 'launch-worker' }, err)
      const now = new Date().toISOString()
      options.store
        .write({ state: 'FAILED', updatedAt: now, error: `Worker failed to start: ${err.message}` })
        .catch(writeError => {
          logger.error('Failed to record worker launch failure', { operation: 'launch-worker' }, toError(writeError))
        })
        .finally(() => resolve(false))
    })
  })

  child.unref()
  logger.info('Bootstrap worker launched', {
    operation: 'launch-worker',
    pid: child.pid,
    logFile: options.logFile,
  })

  return { pid: child.pid, spawned }
}
