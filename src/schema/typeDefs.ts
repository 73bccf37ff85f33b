export const typeDefs = /* GraphQL */ `
  # ============================================
  # SCALARS
  # ============================================

  scalar Date

  # ============================================
  # BOOTSTRAP STATUS
  # ============================================

  enum BootstrapState {
    NOT_STARTED
    IN_PROGRESS
    COMPLETED
    FAILED
  }

  """
  The status record shared by the create and start phases
  """
  type BootstrapStatus {
    state: BootstrapState!
    updatedAt: String!
    startedAt: String
    completedAt: String
    step: String
    error: String
    pid: Int
  }

  type BootstrapStep {
    id: ID!
    description: String!
    command: [String!]!
  }

  type BootstrapPlan {
    profileId: String!
    environmentName: String!
    steps: [BootstrapStep!]!
  }

  type BootstrapProfile {
    id: ID!
    name: String!
    description: String!
    environmentName: String!
    pythonVersion: String!
  }

  enum BootstrapJobState {
    RUNNING
    SUCCEEDED
    SKIPPED
    FAILED
  }

  type BootstrapJob {
    id: ID!
    state: BootstrapJobState!
    force: Boolean!
    startedAt: Date!
    finishedAt: Date
    error: String
    log: [String!]!
  }

  # ============================================
  # KERNELS
  # ============================================

  type NotebookEnvironment {
    name: String!
    displayName: String!
  }

  type KernelSpec {
    name: String!
    displayName: String!
  }

  type ActivationResult {
    ready: Boolean!
    kernels: [KernelSpec!]!
    restarted: Boolean!
    initSystem: String
  }

  # ============================================
  # STACK TEMPLATE
  # ============================================

  input StackTemplateInput {
    notebookName: String
    repoUrl: String
    instanceType: String
    volumeSizeGb: Int
    platformIdentifier: String
    lifecycleConfigName: String
  }

  type LifecycleScripts {
    onCreate: String!
    onStart: String!
  }

  type Version {
    commitHash: String!
  }

  # ============================================
  # ROOT TYPES
  # ============================================

  type Query {
    version: Version!
    bootstrapStatus: BootstrapStatus!
    bootstrapPlan: BootstrapPlan!
    bootstrapJob: BootstrapJob
    profiles: [BootstrapProfile!]!
    environments: [NotebookEnvironment!]!
    stackTemplate(input: StackTemplateInput): String!
    lifecycleScripts: LifecycleScripts!
  }

  type Mutation {
    startBootstrap(force: Boolean): BootstrapJob!
    activateEnvironments: ActivationResult!
  }
`
