/**
 * Start-phase activator.
 *
 * Runs on every instance start, including the first one, which usually races
 * the create phase. "Not ready yet" is a normal outcome: nothing is
 * registered and the next start tries again.
 */

import { activatorLogger } from '../../utils/logger.js'
import type { Logger } from '../../utils/logger.js'
import { listEnvironments } from './environments.js'
import type {
  ActivationResult,
  KernelRegistrar,
  KernelSpec,
  ServiceRestarter,
  StatusStore,
} from './types.js'

export const NOT_READY_MESSAGE = 'Setup still in progress or not started. Check setup.log for details.'

export interface ActivatorOptions {
  store: StatusStore
  envsRoot: string
  registrar: KernelRegistrar
  restarter: ServiceRestarter
  logger?: Logger
}

export class StartPhaseActivator {
  private logger: Logger

  constructor(private options: ActivatorOptions) {
    this.logger = options.logger ?? activatorLogger
  }

  async run(): Promise<ActivationResult> {
    const status = await this.options.store.read()

    if (status.state !== 'COMPLETED') {
      this.logger.info(NOT_READY_MESSAGE, { operation: 'activate', state: status.state, step: status.step })
      return { ready: false, kernels: [], restarted: false }
    }

    const environments = await listEnvironments(this.options.envsRoot)
    this.logger.info('Registering environments as kernels', {
      operation: 'activate',
      environments,
    })

    // First failure stops the remaining registrations
    const kernels: KernelSpec[] = []
    for (const environment of environments) {
      const kernel = await this.options.registrar.register(environment)
      this.logger.info('Registered kernel', {
        operation: 'activate',
        environment,
        displayName: kernel.displayName,
      })
      kernels.push(kernel)
    }

    const { restarter } = this.options
    this.logger.info('Restarting the Jupyter server', { operation: 'activate', initSystem: restarter.initSystem })
    await restarter.restart()

    return { ready: true, kernels, restarted: true, initSystem: restarter.initSystem }
  }
}
