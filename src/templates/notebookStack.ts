/**
 * Notebook Stack Generator
 *
 * Builds the CloudFormation template for a GPU notebook instance: execution
 * role, rotating KMS key + alias, lifecycle configuration carrying both
 * bootstrap hooks, and the notebook instance tying them together.
 */

import { stringify } from 'yaml'
import { renderLifecycleScripts } from './lifecycleScripts.js'
import type {
  CloudFormationTemplate,
  LifecycleScripts,
  NotebookStackConfig,
} from './schema.js'

export const DEFAULT_STACK_CONFIG: NotebookStackConfig = {
  notebookName: 'LLMsFromScratchNotebook',
  repoUrl: 'https://github.com/rasbt/LLMs-from-scratch.git',
  instanceType: 'ml.g4dn.xlarge',
  volumeSizeGb: 50,
  platformIdentifier: 'notebook-al2-v2',
  lifecycleConfigName: 'TensorConfigv241128',
  description:
    'GPU-enabled Jupyter notebook with an execution role, a rotating KMS key and a bootstrapped conda environment',
}

export const MANAGED_POLICY_ARNS = [
  'arn:aws:iam::aws:policy/AmazonSageMakerFullAccess',
  'arn:aws:iam::aws:policy/AmazonBedrockFullAccess',
]

// Logical resource ids
const ROLE = 'NotebookExecutionRole'
const KEY = 'NotebookKmsKey'
const KEY_ALIAS = 'NotebookKmsKeyAlias'
const LIFECYCLE = 'NotebookLifecycleConfig'
const INSTANCE = 'NotebookInstance'

const RESOURCE_NAME_PATTERN = /^[a-zA-Z0-9](-*[a-zA-Z0-9])*$/
const INSTANCE_TYPE_PATTERN = /^ml\.[a-z0-9]+\.[a-z0-9]+$/
const MIN_VOLUME_GB = 5
const MAX_VOLUME_GB = 16384
const MAX_NAME_LENGTH = 63

export class StackConfigError extends Error {
  constructor(
    message: string,
    public field: keyof NotebookStackConfig
  ) {
    super(message)
    this.name = 'StackConfigError'
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws StackConfigError naming the first invalid field
 */
export function resolveStackConfig(overrides: Partial<NotebookStackConfig> = {}): NotebookStackConfig {
  const config: NotebookStackConfig = { ...DEFAULT_STACK_CONFIG }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value })
    }
  }
  validateStackConfig(config)
  return config
}

export function validateStackConfig(config: NotebookStackConfig): void {
  checkResourceName(config.notebookName, 'notebookName')
  checkResourceName(config.lifecycleConfigName, 'lifecycleConfigName')

  if (!INSTANCE_TYPE_PATTERN.test(config.instanceType)) {
    throw new StackConfigError(
      `Invalid instance type "${config.instanceType}". Expected an ml.<family>.<size> type such as ml.g4dn.xlarge`,
      'instanceType'
    )
  }

  if (
    !Number.isInteger(config.volumeSizeGb) ||
    config.volumeSizeGb < MIN_VOLUME_GB ||
    config.volumeSizeGb > MAX_VOLUME_GB
  ) {
    throw new StackConfigError(
      `Volume size must be a whole number of GB between ${MIN_VOLUME_GB} and ${MAX_VOLUME_GB}, got ${config.volumeSizeGb}`,
      'volumeSizeGb'
    )
  }

  let url: URL
  try {
    url = new URL(config.repoUrl)
  } catch {
    throw new StackConfigError(`Invalid repository URL "${config.repoUrl}"`, 'repoUrl')
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new StackConfigError(
      `Invalid repository URL "${config.repoUrl}". Must use http:// or https://`,
      'repoUrl'
    )
  }

  if (!config.platformIdentifier.startsWith('notebook-')) {
    throw new StackConfigError(
      `Invalid platform identifier "${config.platformIdentifier}"`,
      'platformIdentifier'
    )
  }
}

function checkResourceName(value: string, field: 'notebookName' | 'lifecycleConfigName'): void {
  if (value.length === 0 || value.length > MAX_NAME_LENGTH || !RESOURCE_NAME_PATTERN.test(value)) {
    throw new StackConfigError(
      `Invalid ${field} "${value}". Use up to ${MAX_NAME_LENGTH} letters, digits and hyphens, starting and ending with a letter or digit`,
      field
    )
  }
}

/**
 * Generate the stack template object. Lifecycle scripts default to the
 * default profile on the standard notebook layout.
 */
export function generateNotebookStack(
  overrides: Partial<NotebookStackConfig> = {},
  scripts: LifecycleScripts = renderLifecycleScripts(),
): CloudFormationTemplate {
  const config = resolveStackConfig(overrides)

  return {
    AWSTemplateFormatVersion: '2010-09-09',
    Description: config.description,

    Parameters: {
      NotebookName: {
        Type: 'String',
        Default: config.notebookName,
        Description: 'Name of the notebook instance',
        AllowedPattern: RESOURCE_NAME_PATTERN.source,
        MaxLength: MAX_NAME_LENGTH,
      },
      DefaultRepoUrl: {
        Type: 'String',
        Default: config.repoUrl,
        Description: 'Git repository cloned into the notebook',
      },
    },

    Resources: {
      [ROLE]: {
        Type: 'AWS::IAM::Role',
        Properties: {
          AssumeRolePolicyDocument: {
            Version: '2012-10-17',
            Statement: [
              {
                Effect: 'Allow',
                Principal: { Service: ['sagemaker.amazonaws.com'] },
                Action: ['sts:AssumeRole'],
              },
            ],
          },
          ManagedPolicyArns: [...MANAGED_POLICY_ARNS],
        },
      },

      [KEY]: {
        Type: 'AWS::KMS::Key',
        Properties: {
          Description: 'KMS key for the notebook instance volume',
          EnableKeyRotation: true,
          KeyPolicy: {
            Version: '2012-10-17',
            Statement: [
              {
                Effect: 'Allow',
                Principal: { AWS: { 'Fn::Sub': 'arn:aws:iam::${AWS::AccountId}:root' } },
                Action: 'kms:*',
                Resource: '*',
              },
            ],
          },
        },
      },

      [KEY_ALIAS]: {
        Type: 'AWS::KMS::Alias',
        Properties: {
          AliasName: { 'Fn::Sub': 'alias/${NotebookName}-kms-key' },
          TargetKeyId: { Ref: KEY },
        },
      },

      [LIFECYCLE]: {
        Type: 'AWS::SageMaker::NotebookInstanceLifecycleConfig',
        Properties: {
          NotebookInstanceLifecycleConfigName: config.lifecycleConfigName,
          OnCreate: [{ Content: { 'Fn::Base64': scripts.onCreate } }],
          OnStart: [{ Content: { 'Fn::Base64': scripts.onStart } }],
        },
      },

      [INSTANCE]: {
        Type: 'AWS::SageMaker::NotebookInstance',
        Properties: {
          InstanceType: config.instanceType,
          NotebookInstanceName: { Ref: 'NotebookName' },
          RoleArn: { 'Fn::GetAtt': [ROLE, 'Arn'] },
          DefaultCodeRepository: { Ref: 'DefaultRepoUrl' },
          KmsKeyId: { 'Fn::GetAtt': [KEY, 'Arn'] },
          PlatformIdentifier: config.platformIdentifier,
          VolumeSizeInGB: config.volumeSizeGb,
          LifecycleConfigName: {
            'Fn::GetAtt': [LIFECYCLE, 'NotebookInstanceLifecycleConfigName'],
          },
        },
      },
    },

    Outputs: {
      NotebookInstanceName: {
        Description: 'The name of the created notebook instance',
        Value: { Ref: INSTANCE },
      },
      ExecutionRoleArn: {
        Description: 'The ARN of the notebook execution role',
        Value: { 'Fn::GetAtt': [ROLE, 'Arn'] },
      },
      KmsKeyArn: {
        Description: 'The ARN of the KMS key encrypting the notebook volume',
        Value: { 'Fn::GetAtt': [KEY, 'Arn'] },
      },
    },
  }
}

/**
 * Render the stack as CloudFormation YAML.
 */
export function renderNotebookStack(
  overrides: Partial<NotebookStackConfig> = {},
  scripts?: LifecycleScripts,
): string {
  const template = generateNotebookStack(overrides, scripts)
  return stringify(template, { lineWidth: 0 })
}
