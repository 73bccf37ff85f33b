/**
 * Bootstrap runtime: wiring for both phases from a loaded config.
 */

import type { ProvisionerConfig } from '../../config/provisioner.js'
import { getProfileById } from '../../templates/registry.js'
import { StartPhaseActivator } from './activator.js'
import { CreatePhaseBootstrapper } from './bootstrapper.js'
import { SpawnCommandRunner } from './commandRunner.js'
import { ConfigError } from './errors.js'
import { IpykernelRegistrar } from './kernelRegistrar.js'
import { buildBootstrapPlan } from './plan.js'
import { createServiceRestarter, detectInitSystem } from './serviceRestarter.js'
import { FileStatusStore } from './statusStore.js'
import { BootstrapSupervisor } from './supervisor.js'
import type { BootstrapPlan, CommandRunner, StatusStore } from './types.js'

export interface ProvisionerServices {
  config: ProvisionerConfig
  plan: BootstrapPlan
  store: StatusStore
  bootstrapper: CreatePhaseBootstrapper
  activator: StartPhaseActivator
  supervisor: BootstrapSupervisor
}

export function createProvisionerServices(
  config: ProvisionerConfig,
  runner: CommandRunner = new SpawnCommandRunner(),
  store: StatusStore = new FileStatusStore(config.paths.statusFile, config.paths.markerFile),
): ProvisionerServices {
  const profile = getProfileById(config.profileId)
  if (!profile) {
    throw new ConfigError(`Unknown bootstrap profile "${config.profileId}"`, 'BOOTSTRAP_PROFILE')
  }

  const plan = buildBootstrapPlan(profile, config.paths)
  const bootstrapper = new CreatePhaseBootstrapper({
    plan,
    store,
    runner,
    stepTimeoutMs: config.stepTimeoutMs,
    cwd: config.paths.homeDir,
  })

  const activator = new StartPhaseActivator({
    store,
    envsRoot: config.paths.envsRoot,
    registrar: new IpykernelRegistrar(runner, config.paths),
    restarter: createServiceRestarter(config.initSystem ?? detectInitSystem(), runner),
  })

  return {
    config,
    plan,
    store,
    bootstrapper,
    activator,
    supervisor: new BootstrapSupervisor(bootstrapper),
  }
}

export { CreatePhaseBootstrapper } from './bootstrapper.js'
export { StartPhaseActivator, NOT_READY_MESSAGE } from './activator.js'
export { BootstrapSupervisor } from './supervisor.js'
export type { BootstrapJob, BootstrapJobState } from './supervisor.js'
export { FileStatusStore, MemoryStatusStore } from './statusStore.js'
export { launchBootstrapWorker } from './worker.js'
export { listEnvironments } from './environments.js'
export { kernelDisplayName } from './kernelRegistrar.js'
export * from './errors.js'
export type * from './types.js'
