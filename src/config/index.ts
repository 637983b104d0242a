export {
  WorkspaceConfigSchema,
  loadWorkspaceConfig,
  createValidatedConfig,
  DEFAULT_WORKSPACE_CONFIG,
} from './workspace-config.js';
export type {
  WorkspaceConfig,
  WorkspaceConfigInput,
  ValidatedWorkspaceConfig,
  LoadConfigResult,
} from './workspace-config.js';
