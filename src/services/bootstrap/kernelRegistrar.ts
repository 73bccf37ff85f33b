import { KernelRegistrationError } from './errors.js'
import { environmentBinary } from './paths.js'
import type { BootstrapPaths, CommandResult, CommandRunner, KernelRegistrar, KernelSpec } from './types.js'

const REGISTRATION_TIMEOUT_MS = 2 * 60 * 1000

export function kernelDisplayName(environment: string): string {
  return `Custom (${environment})`
}

export function kernelInstallArgv(python: string, environment: string): string[] {
  return [
    python,
    '-m',
    'ipykernel',
    'install',
    '--user',
    '--name',
    environment,
    '--display-name',
    kernelDisplayName(environment),
  ]
}

/**
 * Registers an environment as a Jupyter kernel with the environment's own
 * interpreter, so no shell activation is needed.
 */
export class IpykernelRegistrar implements KernelRegistrar {
  constructor(
    private runner: CommandRunner,
    private paths: BootstrapPaths
  ) {}

  async register(environment: string): Promise<KernelSpec> {
    const python = environmentBinary(this.paths, environment, 'python')

    let result: CommandResult
    try {
      result = await this.runner.run({
        argv: kernelInstallArgv(python, environment),
        timeoutMs: REGISTRATION_TIMEOUT_MS,
      })
    } catch (error) {
      const cause = error instanceof Error ? error : undefined
      throw new KernelRegistrationError(
        `Failed to register kernel for ${environment}: ${cause?.message ?? String(error)}`,
        environment,
        cause
      )
    }

    if (result.exitCode !== 0) {
      throw new KernelRegistrationError(
        `Kernel registration for ${environment} exited with code ${result.exitCode}`,
        environment
      )
    }

    return { name: environment, displayName: kernelDisplayName(environment) }
  }
}
