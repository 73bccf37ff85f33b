/**
 * Template Type System
 *
 * Two kinds of static, code-defined templates live here:
 *   - bootstrap profiles: what the create phase installs on the instance
 *   - the notebook stack: the CloudFormation resources that host it
 */

// ─── Bootstrap profiles ──────────────────────────────────────────

export type PackageManager = 'conda' | 'pip'

export interface PackageInstall {
  /** Plan step id (e.g. "install-pytorch") */
  id: string
  /** Human-readable description, echoed into the setup log */
  description: string
  manager: PackageManager
  /** Package specs exactly as the manager takes them (e.g. "torch==2.1.0") */
  specs: string[]
  /** Extra flags placed before the specs (e.g. "--quiet") */
  flags?: string[]
  /** pip only: alternate package index */
  indexUrl?: string
}

export interface BootstrapProfile {
  /** Unique profile identifier (e.g. "tensorflow-gpu") */
  id: string
  name: string
  description: string
  /** Miniconda installer to download */
  installerUrl: string
  /** Conda environment created for the kernel; also the kernel name */
  environmentName: string
  pythonVersion: string
  /** Installed in order, after the environment is created */
  packages: PackageInstall[]
}

// ─── Notebook stack ──────────────────────────────────────────────

export interface NotebookStackConfig {
  /** Default for the NotebookName parameter */
  notebookName: string
  /** Default for the DefaultRepoUrl parameter */
  repoUrl: string
  /** SageMaker instance type (e.g. "ml.g4dn.xlarge") */
  instanceType: string
  volumeSizeGb: number
  /** Notebook platform (e.g. "notebook-al2-v2") */
  platformIdentifier: string
  lifecycleConfigName: string
  description: string
}

export interface LifecycleScripts {
  onCreate: string
  onStart: string
}

// ─── CloudFormation document ─────────────────────────────────────
// Only the shapes this stack emits; intrinsics use their long JSON form so
// the YAML needs no custom tags.

export type CfnRef = { Ref: string }
export type CfnGetAtt = { 'Fn::GetAtt': [string, string] }
export type CfnSub = { 'Fn::Sub': string }
export type CfnBase64 = { 'Fn::Base64': string }
export type CfnValue = string | number | boolean | CfnRef | CfnGetAtt | CfnSub | CfnBase64

export interface CfnParameter {
  Type: 'String' | 'Number'
  Default?: string | number
  Description?: string
  AllowedPattern?: string
  MaxLength?: number
}

export interface CfnPolicyStatement {
  Effect: 'Allow' | 'Deny'
  Principal: { Service: string[] } | { AWS: CfnValue }
  Action: string | string[]
  Resource?: string
}

export interface CfnPolicyDocument {
  Version: '2012-10-17'
  Statement: CfnPolicyStatement[]
}

export type CfnPropertyValue =
  | CfnValue
  | CfnPolicyDocument
  | CfnValue[]
  | Array<{ Content: CfnBase64 }>

export interface CfnResource {
  Type: string
  Properties: Record<string, CfnPropertyValue>
}

export interface CfnOutput {
  Description: string
  Value: CfnValue
}

export interface CloudFormationTemplate {
  AWSTemplateFormatVersion: '2010-09-09'
  Description: string
  Parameters: Record<string, CfnParameter>
  Resources: Record<string, CfnResource>
  Outputs: Record<string, CfnOutput>
}
