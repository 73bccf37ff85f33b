/**
 * Bootstrap Resolvers
 *
 * Read-side: status record, plan, profiles, discovered environments.
 * Write-side: start the create phase as a supervised job, run the start phase.
 */

import { GraphQLError } from 'graphql'
import { kernelDisplayName, listEnvironments } from '../services/bootstrap/index.js'
import {
  BootstrapInProgressError,
  KernelRegistrationError,
  ServiceRestartError,
  StatusStoreError,
} from '../services/bootstrap/errors.js'
import { getAllProfiles } from '../templates/index.js'
import { apiLogger, toError } from '../utils/logger.js'
import type { ResolverContext } from './types.js'

/**
 * Map runtime errors onto GraphQL errors with a stable code.
 */
export function toGraphQLError(error: unknown): GraphQLError {
  if (error instanceof GraphQLError) return error

  const err = toError(error)
  if (err instanceof BootstrapInProgressError) {
    return new GraphQLError(err.message, { extensions: { code: 'CONFLICT', pid: err.pid } })
  }
  if (err instanceof KernelRegistrationError) {
    return new GraphQLError(err.message, {
      extensions: { code: 'KERNEL_REGISTRATION_FAILED', environment: err.environment },
    })
  }
  if (err instanceof ServiceRestartError) {
    return new GraphQLError(err.message, {
      extensions: { code: 'SERVICE_RESTART_FAILED', initSystem: err.initSystem },
    })
  }
  if (err instanceof StatusStoreError) {
    return new GraphQLError(err.message, { extensions: { code: 'STATUS_UNAVAILABLE' } })
  }

  apiLogger.error('Unexpected resolver error', { operation: 'graphql' }, err)
  return new GraphQLError('Internal error', { extensions: { code: 'INTERNAL_SERVER_ERROR' } })
}

// ─── Queries ─────────────────────────────────────────────────────

export const bootstrapQueries = {
  bootstrapStatus: async (_: unknown, __: unknown, context: ResolverContext) => {
    try {
      return await context.services.store.read()
    } catch (error) {
      throw toGraphQLError(error)
    }
  },

  bootstrapPlan: (_: unknown, __: unknown, context: ResolverContext) => {
    const { plan } = context.services
    return {
      profileId: plan.profileId,
      environmentName: plan.environmentName,
      steps: plan.steps.map(step => ({
        id: step.id,
        description: step.description,
        command: step.argv,
      })),
    }
  },

  bootstrapJob: (_: unknown, __: unknown, context: ResolverContext) => {
    return context.services.supervisor.current()
  },

  profiles: () => getAllProfiles(),

  environments: async (_: unknown, __: unknown, context: ResolverContext) => {
    const names = await listEnvironments(context.services.config.paths.envsRoot)
    return names.map(name => ({ name, displayName: kernelDisplayName(name) }))
  },
}

// ─── Mutations ───────────────────────────────────────────────────

export const bootstrapMutations = {
  startBootstrap: async (_: unknown, { force }: { force?: boolean | null }, context: ResolverContext) => {
    const { bootstrapper, supervisor } = context.services
    try {
      await bootstrapper.assertIdle()
    } catch (error) {
      throw toGraphQLError(error)
    }

    const job = supervisor.start({ force: force ?? false })
    apiLogger.info('Bootstrap requested', { operation: 'startBootstrap', jobId: job.id, state: job.state })
    return job
  },

  activateEnvironments: async (_: unknown, __: unknown, context: ResolverContext) => {
    try {
      return await context.services.activator.run()
    } catch (error) {
      throw toGraphQLError(error)
    }
  },
}
