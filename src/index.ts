import 'reflect-metadata';

// Workspace
export { CompilationWorkspace } from './workspace/compilation-workspace.js';
export type { WorkspaceDeps } from './workspace/compilation-workspace.js';
export { createWorkspace } from './workspace/create-workspace.js';
export { withWorkspace } from './workspace/with-workspace.js';
export { WorkspaceFactory } from './workspace/workspace-factory.js';
export { LocationRegistry } from './workspace/location-registry.js';
export type { LocationDefinition } from './workspace/location-registry.js';
export {
  StandardLocations,
  STANDARD_LOCATIONS,
  defineLocation,
  moduleLocation,
  isModuleLocation,
  sameLocation,
} from './workspace/location.js';
export type { Location, ModuleLocation, GroupLocation, LocationOptions } from './workspace/location.js';
export { normalizeRelativePath } from './workspace/relative-path.js';
export type { RelativePath } from './workspace/relative-path.js';
export {
  DEFAULT_FILE_KIND_RULES,
  inferFileKind,
  binaryNameToPath,
  pathToBinaryName,
} from './workspace/file-kind.js';
export type { FileKind, FileKindRules } from './workspace/file-kind.js';

// Containers
export * from './containers/index.js';

// Suggestions
export * from './suggestions/index.js';

// Diagnostics
export * from './diagnostics/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './core/errors/index.js';

// Logging
export * from './core/logging/index.js';

// Ports
export type { FileSystemPort, FsError, FsEntry, FsStat } from './ports/fs.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';
export type { ThreadIdentity, ThreadIdentityPort } from './ports/thread-identity.port.js';
export { NodeFileSystem } from './infra/local/fs/index.js';
export { NodeTimeClock } from './infra/local/time-clock/index.js';
export { NodeThreadIdentity } from './infra/local/thread-identity/index.js';

// DI
export { DI } from './di/tokens.js';
export { initializeContainer, resetContainer, isInitialized, container } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
