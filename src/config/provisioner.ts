import { resolveBootstrapPaths } from '../services/bootstrap/paths.js'
import { ConfigError } from '../services/bootstrap/errors.js'
import { DEFAULT_STEP_TIMEOUT_MS } from '../services/bootstrap/bootstrapper.js'
import type { BootstrapPaths, InitSystem } from '../services/bootstrap/types.js'
import { DEFAULT_PROFILE_ID, getProfileById } from '../templates/registry.js'
import { LogLevel, parseLogLevel } from '../utils/logger.js'

export const DEFAULT_STALE_AFTER_MS = 2 * 60 * 60 * 1000
export const DEFAULT_WATCHDOG_CRON = '*/5 * * * *'
export const DEFAULT_PORT = 4000

export interface ProvisionerConfig {
  paths: BootstrapPaths
  profileId: string
  stepTimeoutMs: number
  staleAfterMs: number
  watchdogCron: string
  /** Forced init system; detected on the host when unset */
  initSystem?: InitSystem
  port: number
  logLevel: LogLevel
  appUrl?: string
}

type Env = Record<string, string | undefined>

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`, key)
  }
  return value
}

function initSystemFrom(env: Env): InitSystem | undefined {
  const raw = env.NOTEBOOK_INIT_SYSTEM
  if (!raw) return undefined
  if (raw === 'systemd' || raw === 'upstart') return raw
  throw new ConfigError(`NOTEBOOK_INIT_SYSTEM must be "systemd" or "upstart", got "${raw}"`, 'NOTEBOOK_INIT_SYSTEM')
}

/**
 * Read configuration from the environment. Entry points load `.env` through
 * dotenv before calling this.
 */
export function loadConfig(env: Env = process.env): ProvisionerConfig {
  const profileId = env.BOOTSTRAP_PROFILE || DEFAULT_PROFILE_ID
  if (!getProfileById(profileId)) {
    throw new ConfigError(`Unknown bootstrap profile "${profileId}"`, 'BOOTSTRAP_PROFILE')
  }

  const stepTimeoutMs = positiveInt(env, 'BOOTSTRAP_STEP_TIMEOUT_MS', DEFAULT_STEP_TIMEOUT_MS)
  const staleAfterMs = positiveInt(env, 'BOOTSTRAP_STALE_AFTER_MS', DEFAULT_STALE_AFTER_MS)
  // The watchdog leaves a live worker to its step timeout
  if (staleAfterMs <= stepTimeoutMs) {
    throw new ConfigError(
      `BOOTSTRAP_STALE_AFTER_MS (${staleAfterMs}) must be greater than BOOTSTRAP_STEP_TIMEOUT_MS (${stepTimeoutMs})`,
      'BOOTSTRAP_STALE_AFTER_MS'
    )
  }

  return {
    paths: resolveBootstrapPaths({
      homeDir: env.NOTEBOOK_HOME || undefined,
      workingDir: env.NOTEBOOK_WORKING_DIR || undefined,
      statusFile: env.NOTEBOOK_STATUS_FILE || undefined,
      markerFile: env.NOTEBOOK_MARKER_FILE || undefined,
      logFile: env.NOTEBOOK_LOG_FILE || undefined,
    }),
    profileId,
    stepTimeoutMs,
    staleAfterMs,
    watchdogCron: env.BOOTSTRAP_WATCHDOG_CRON || DEFAULT_WATCHDOG_CRON,
    initSystem: initSystemFrom(env),
    port: positiveInt(env, 'PORT', DEFAULT_PORT),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    appUrl: env.APP_URL || undefined,
  }
}
