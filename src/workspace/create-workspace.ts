import type { Result } from 'neverthrow';
import type { ConfigInvalidError } from '../core/errors/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import { loadWorkspaceConfig } from '../config/workspace-config.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { NodeTimeClock } from '../infra/local/time-clock/index.js';
import { NodeThreadIdentity } from '../infra/local/thread-identity/index.js';
import type { WorkspaceDeps } from './compilation-workspace.js';
import { CompilationWorkspace } from './compilation-workspace.js';

/**
 * Build a workspace without the DI container. Ports default to the Node
 * adapters; pass `overrides` to replace any of them.
 */
export function createWorkspace(
  config: unknown = {},
  overrides: Partial<Omit<WorkspaceDeps, 'config'>> = {}
): Result<CompilationWorkspace, ConfigInvalidError> {
  return loadWorkspaceConfig(config).map(
    (validated) =>
      new CompilationWorkspace({
        config: validated,
        fs: overrides.fs ?? new NodeFileSystem(),
        clock: overrides.clock ?? new NodeTimeClock(),
        threads: overrides.threads ?? new NodeThreadIdentity(),
        loggerFactory: overrides.loggerFactory ?? new PinoLoggerFactory(),
      })
  );
}
