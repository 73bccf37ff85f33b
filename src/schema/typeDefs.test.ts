import { describe, it, expect } from 'vitest'
import { graphql } from 'graphql'
import { makeExecutableSchema } from '@graphql-tools/schema'
import { typeDefs } from './typeDefs.js'
import { resolvers } from '../resolvers/index.js'
import type { ResolverContext } from '../resolvers/index.js'
import { loadConfig } from '../config/provisioner.js'
import { createProvisionerServices, MemoryStatusStore } from '../services/bootstrap/index.js'

const schema = makeExecutableSchema({ typeDefs, resolvers })

const contextValue: ResolverContext = {
  services: createProvisionerServices(
    loadConfig({ NOTEBOOK_HOME: '/srv/notebook', NOTEBOOK_INIT_SYSTEM: 'upstart' }),
    { run: async () => ({ exitCode: 0, stdout: '', stderr: '', durationMs: 0 }) },
    new MemoryStatusStore({
      state: 'IN_PROGRESS',
      updatedAt: '2024-05-01T12:00:00.000Z',
      step: 'install-tensorflow',
      pid: 77,
    })
  ),
}

describe('GraphQL schema', () => {
  it('resolves the bootstrap status', async () => {
    const result = await graphql({
      schema,
      contextValue,
      source: '{ bootstrapStatus { state step pid } }',
    })

    expect(result.errors).toBeUndefined()
    expect(result.data).toEqual({
      bootstrapStatus: { state: 'IN_PROGRESS', step: 'install-tensorflow', pid: 77 },
    })
  })

  it('resolves plan steps with their commands', async () => {
    const result = await graphql({
      schema,
      contextValue,
      source: '{ bootstrapPlan { profileId steps { id command } } }',
    })

    expect(result.errors).toBeUndefined()
    expect(result.data?.bootstrapPlan).toMatchObject({
      profileId: 'tensorflow-gpu',
      steps: expect.arrayContaining([
        { id: 'conda-init', command: ['/srv/notebook/custom-miniconda/miniconda/bin/conda', 'init', 'bash'] },
      ]),
    })
  })

  it('reports invalid stack input as a GraphQL error', async () => {
    const result = await graphql({
      schema,
      contextValue,
      source: '{ stackTemplate(input: { volumeSizeGb: 1 }) }',
    })

    expect(result.errors?.[0].message).toBe(
      'Volume size must be a whole number of GB between 5 and 16384, got 1'
    )
    expect(result.errors?.[0].extensions).toEqual({ code: 'BAD_USER_INPUT', field: 'volumeSizeGb' })
  })
})
