/**
 * Stack Template Resolvers
 *
 * Public, read-only: render the CloudFormation stack and its lifecycle hooks
 * for the profile and layout this service is configured with.
 */

import { GraphQLError } from 'graphql'
import { getProfileById } from '../templates/registry.js'
import {
  renderLifecycleScripts,
  renderNotebookStack,
  StackConfigError,
} from '../templates/index.js'
import type { LifecycleScripts, NotebookStackConfig } from '../templates/index.js'
import type { ResolverContext } from './types.js'

export interface StackTemplateInput {
  notebookName?: string | null
  repoUrl?: string | null
  instanceType?: string | null
  volumeSizeGb?: number | null
  platformIdentifier?: string | null
  lifecycleConfigName?: string | null
}

function toOverrides(input?: StackTemplateInput | null): Partial<NotebookStackConfig> {
  if (!input) return {}
  return {
    notebookName: input.notebookName ?? undefined,
    repoUrl: input.repoUrl ?? undefined,
    instanceType: input.instanceType ?? undefined,
    volumeSizeGb: input.volumeSizeGb ?? undefined,
    platformIdentifier: input.platformIdentifier ?? undefined,
    lifecycleConfigName: input.lifecycleConfigName ?? undefined,
  }
}

function scriptsFor(context: ResolverContext): LifecycleScripts {
  const { config } = context.services
  return renderLifecycleScripts({
    profile: getProfileById(config.profileId),
    paths: config.paths,
    initSystem: config.initSystem,
  })
}

// ─── Queries ─────────────────────────────────────────────────────

export const stackQueries = {
  stackTemplate: (
    _: unknown,
    { input }: { input?: StackTemplateInput | null },
    context: ResolverContext,
  ) => {
    try {
      return renderNotebookStack(toOverrides(input), scriptsFor(context))
    } catch (error) {
      if (error instanceof StackConfigError) {
        throw new GraphQLError(error.message, {
          extensions: { code: 'BAD_USER_INPUT', field: error.field },
        })
      }
      throw error
    }
  },

  lifecycleScripts: (_: unknown, __: unknown, context: ResolverContext) => scriptsFor(context),
}
