/**
 * Template System: public API
 */
export type {
  BootstrapProfile,
  PackageInstall,
  PackageManager,
  NotebookStackConfig,
  LifecycleScripts,
  CloudFormationTemplate,
} from './schema.js'

export {
  getAllProfiles,
  getProfileById,
  getDefaultProfile,
  DEFAULT_PROFILE_ID,
} from './registry.js'

export {
  generateNotebookStack,
  renderNotebookStack,
  resolveStackConfig,
  validateStackConfig,
  StackConfigError,
  DEFAULT_STACK_CONFIG,
} from './notebookStack.js'

export {
  renderLifecycleScripts,
  renderOnCreateScript,
  renderOnStartScript,
  renderSetupScript,
} from './lifecycleScripts.js'
