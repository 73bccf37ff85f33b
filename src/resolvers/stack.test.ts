import { describe, it, expect } from 'vitest'
import { GraphQLError } from 'graphql'
import { parse } from 'yaml'
import { resolvers } from './index.js'
import type { ResolverContext } from './index.js'
import { loadConfig } from '../config/provisioner.js'
import { createProvisionerServices, MemoryStatusStore } from '../services/bootstrap/index.js'
import type { CommandRunner } from '../services/bootstrap/index.js'

const runner: CommandRunner = {
  run: async () => ({ exitCode: 0, stdout: '', stderr: '', durationMs: 0 }),
}

const context: ResolverContext = {
  services: createProvisionerServices(
    loadConfig({ NOTEBOOK_HOME: '/srv/notebook', NOTEBOOK_INIT_SYSTEM: 'systemd' }),
    runner,
    new MemoryStatusStore()
  ),
}

describe('Stack Resolvers', () => {
  describe('stackTemplate', () => {
    it('should render the default stack', () => {
      const template = parse(resolvers.Query.stackTemplate({}, {}, context))

      expect(template.Parameters.NotebookName.Default).toBe('LLMsFromScratchNotebook')
      expect(template.Resources.NotebookInstance.Properties.InstanceType).toBe('ml.g4dn.xlarge')
    })

    it('should apply input and treat nulls as defaults', () => {
      const template = parse(
        resolvers.Query.stackTemplate(
          {},
          { input: { notebookName: 'ResearchLab', volumeSizeGb: null, instanceType: 'ml.p3.2xlarge' } },
          context
        )
      )

      expect(template.Parameters.NotebookName.Default).toBe('ResearchLab')
      expect(template.Resources.NotebookInstance.Properties.InstanceType).toBe('ml.p3.2xlarge')
      expect(template.Resources.NotebookInstance.Properties.VolumeSizeInGB).toBe(50)
    })

    it('should embed scripts for the configured layout', () => {
      const template = parse(resolvers.Query.stackTemplate({}, {}, context))
      const onStart = template.Resources.NotebookLifecycleConfig.Properties.OnStart[0].Content['Fn::Base64']

      expect(onStart).toContain('STATUS_FILE=/srv/notebook/setup-status.json')
    })

    it('should reject invalid input as BAD_USER_INPUT', () => {
      let caught: unknown
      try {
        resolvers.Query.stackTemplate({}, { input: { instanceType: 'p3.2xlarge' } }, context)
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(GraphQLError)
      expect(caught).toMatchObject({ extensions: { code: 'BAD_USER_INPUT', field: 'instanceType' } })
    })
  })

  describe('lifecycleScripts', () => {
    it('should render both hooks with the configured init system', () => {
      const scripts = resolvers.Query.lifecycleScripts({}, {}, context)

      expect(scripts.onCreate).toContain('sudo -u ec2-user -i nohup /srv/notebook/setup-environment.sh')
      expect(scripts.onStart.trimEnd().endsWith('sudo systemctl --no-block restart jupyter-server.service')).toBe(
        true
      )
    })
  })
})
