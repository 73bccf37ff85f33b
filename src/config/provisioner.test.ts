import { describe, it, expect } from 'vitest'
import { DEFAULT_PORT, DEFAULT_STALE_AFTER_MS, DEFAULT_WATCHDOG_CRON, loadConfig } from './provisioner.js'
import { ConfigError } from '../services/bootstrap/errors.js'
import { DEFAULT_STEP_TIMEOUT_MS } from '../services/bootstrap/bootstrapper.js'
import { LogLevel } from '../utils/logger.js'

describe('loadConfig', () => {
  it('falls back to the notebook defaults', () => {
    const config = loadConfig({})

    expect(config.profileId).toBe('tensorflow-gpu')
    expect(config.paths.homeDir).toBe('/home/ec2-user/SageMaker')
    expect(config.paths.envsRoot).toBe('/home/ec2-user/SageMaker/custom-miniconda/miniconda/envs')
    expect(config.paths.statusFile).toBe('/home/ec2-user/SageMaker/setup-status.json')
    expect(config.paths.markerFile).toBe('/home/ec2-user/SageMaker/setup-complete')
    expect(config.stepTimeoutMs).toBe(DEFAULT_STEP_TIMEOUT_MS)
    expect(config.staleAfterMs).toBe(DEFAULT_STALE_AFTER_MS)
    expect(config.watchdogCron).toBe(DEFAULT_WATCHDOG_CRON)
    expect(config.port).toBe(DEFAULT_PORT)
    expect(config.logLevel).toBe(LogLevel.INFO)
    expect(config.initSystem).toBeUndefined()
    expect(config.appUrl).toBeUndefined()
  })

  it('derives every path from NOTEBOOK_HOME', () => {
    const config = loadConfig({ NOTEBOOK_HOME: '/tmp/nb' })

    expect(config.paths).toEqual({
      homeDir: '/tmp/nb',
      workingDir: '/tmp/nb/custom-miniconda',
      condaPrefix: '/tmp/nb/custom-miniconda/miniconda',
      envsRoot: '/tmp/nb/custom-miniconda/miniconda/envs',
      statusFile: '/tmp/nb/setup-status.json',
      markerFile: '/tmp/nb/setup-complete',
      logFile: '/tmp/nb/setup.log',
      setupScript: '/tmp/nb/setup-environment.sh',
    })
  })

  it('reads explicit overrides', () => {
    const config = loadConfig({
      NOTEBOOK_STATUS_FILE: '/var/run/status.json',
      BOOTSTRAP_STEP_TIMEOUT_MS: '60000',
      NOTEBOOK_INIT_SYSTEM: 'upstart',
      PORT: '8080',
      LOG_LEVEL: 'debug',
      APP_URL: 'https://console.example.com',
    })

    expect(config.paths.statusFile).toBe('/var/run/status.json')
    expect(config.stepTimeoutMs).toBe(60000)
    expect(config.initSystem).toBe('upstart')
    expect(config.port).toBe(8080)
    expect(config.logLevel).toBe(LogLevel.DEBUG)
    expect(config.appUrl).toBe('https://console.example.com')
  })

  it('rejects an unknown profile', () => {
    expect(() => loadConfig({ BOOTSTRAP_PROFILE: 'cobol' })).toThrow(ConfigError)
    expect(() => loadConfig({ BOOTSTRAP_PROFILE: 'cobol' })).toThrow('Unknown bootstrap profile "cobol"')
  })

  it('rejects non-positive numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be a positive integer, got "eighty"')
    expect(() => loadConfig({ BOOTSTRAP_STALE_AFTER_MS: '0' })).toThrow(ConfigError)
  })

  it('requires the stale timeout to outlast a single step', () => {
    expect(() => loadConfig({ BOOTSTRAP_STEP_TIMEOUT_MS: '7200000', BOOTSTRAP_STALE_AFTER_MS: '3600000' })).toThrow(
      'BOOTSTRAP_STALE_AFTER_MS (3600000) must be greater than BOOTSTRAP_STEP_TIMEOUT_MS (7200000)'
    )
    expect(() => loadConfig({ BOOTSTRAP_STEP_TIMEOUT_MS: '60000', BOOTSTRAP_STALE_AFTER_MS: '60000' })).toThrow(
      ConfigError
    )
    expect(loadConfig({ BOOTSTRAP_STEP_TIMEOUT_MS: '60000', BOOTSTRAP_STALE_AFTER_MS: '60001' }).staleAfterMs).toBe(60001)
  })

  it('rejects an unknown init system', () => {
    expect(() => loadConfig({ NOTEBOOK_INIT_SYSTEM: 'sysvinit' })).toThrow(
      'NOTEBOOK_INIT_SYSTEM must be "systemd" or "upstart", got "sysvinit"'
    )
  })
})
