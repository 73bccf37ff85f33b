import { join } from 'path'
import type { BootstrapPaths } from './types.js'

export const DEFAULT_NOTEBOOK_HOME = '/home/ec2-user/SageMaker'

/**
 * Resolve the on-instance layout. Anything not overridden is derived from
 * `homeDir` (and `workingDir` for the conda tree).
 */
export function resolveBootstrapPaths(overrides: Partial<BootstrapPaths> = {}): BootstrapPaths {
  const homeDir = overrides.homeDir ?? DEFAULT_NOTEBOOK_HOME
  const workingDir = overrides.workingDir ?? join(homeDir, 'custom-miniconda')
  const condaPrefix = overrides.condaPrefix ?? join(workingDir, 'miniconda')

  return {
    homeDir,
    workingDir,
    condaPrefix,
    envsRoot: overrides.envsRoot ?? join(condaPrefix, 'envs'),
    statusFile: overrides.statusFile ?? join(homeDir, 'setup-status.json'),
    markerFile: overrides.markerFile ?? join(homeDir, 'setup-complete'),
    logFile: overrides.logFile ?? join(homeDir, 'setup.log'),
    setupScript: overrides.setupScript ?? join(homeDir, 'setup-environment.sh'),
  }
}

export function condaBinary(paths: BootstrapPaths): string {
  return join(paths.condaPrefix, 'bin', 'conda')
}

export function environmentBinary(paths: BootstrapPaths, environment: string, binary: string): string {
  return join(paths.envsRoot, environment, 'bin', binary)
}
