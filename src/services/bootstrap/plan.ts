/**
 * Bootstrap plan builder.
 *
 * Turns a profile into the ordered argv steps of the create phase. The same
 * plan drives the in-process bootstrapper and the rendered on-create script,
 * so the two never drift apart.
 */

import { join } from 'path'
import type { BootstrapProfile, PackageInstall } from '../../templates/schema.js'
import { condaBinary, environmentBinary } from './paths.js'
import type { BootstrapPaths, BootstrapPlan, BootstrapStep } from './types.js'

export function buildBootstrapPlan(profile: BootstrapProfile, paths: BootstrapPaths): BootstrapPlan {
  const conda = condaBinary(paths)
  const installer = join(paths.workingDir, 'miniconda.sh')
  const env = profile.environmentName

  const steps: BootstrapStep[] = [
    {
      id: 'prepare',
      description: 'Create working directory',
      argv: ['mkdir', '-p', paths.workingDir],
    },
    {
      id: 'download-installer',
      description: 'Download Miniconda installer',
      argv: ['wget', '--quiet', profile.installerUrl, '-O', installer],
    },
    {
      id: 'run-installer',
      description: 'Install Miniconda',
      argv: ['bash', installer, '-b', '-u', '-p', paths.condaPrefix],
    },
    {
      id: 'remove-installer',
      description: 'Remove installer payload',
      argv: ['rm', '-f', installer],
    },
    {
      id: 'conda-init',
      description: 'Initialize conda shell integration',
      argv: [conda, 'init', 'bash'],
    },
    {
      id: 'create-environment',
      description: `Create environment ${env} (python ${profile.pythonVersion})`,
      argv: [conda, 'create', '--yes', '--name', env, `python=${profile.pythonVersion}`],
    },
    ...profile.packages.map(pkg => packageStep(pkg, paths, env)),
  ]

  return {
    profileId: profile.id,
    environmentName: env,
    pathPrefix: [join(paths.condaPrefix, 'bin')],
    steps,
  }
}

function packageStep(pkg: PackageInstall, paths: BootstrapPaths, env: string): BootstrapStep {
  const flags = pkg.flags ?? []

  if (pkg.manager === 'conda') {
    return {
      id: pkg.id,
      description: pkg.description,
      argv: [condaBinary(paths), 'install', '--yes', '--name', env, ...flags, ...pkg.specs],
    }
  }

  const index = pkg.indexUrl ? ['--index-url', pkg.indexUrl] : []
  return {
    id: pkg.id,
    description: pkg.description,
    argv: [environmentBinary(paths, env, 'pip'), 'install', ...flags, ...pkg.specs, ...index],
  }
}

/**
 * PATH for plan steps: the plan's prefix ahead of whatever the caller had.
 */
export function planPath(plan: BootstrapPlan, currentPath: string | undefined = process.env.PATH): string {
  return [...plan.pathPrefix, ...(currentPath ? [currentPath] : [])].join(':')
}
