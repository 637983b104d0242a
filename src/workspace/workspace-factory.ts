import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ValidatedWorkspaceConfig } from '../config/workspace-config.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ThreadIdentityPort } from '../ports/thread-identity.port.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { CompilationWorkspace } from './compilation-workspace.js';

/**
 * Builds workspaces from the registered config and ports. One factory, many
 * workspaces: each compilation run gets its own.
 */
@singleton()
export class WorkspaceFactory {
  constructor(
    @inject(DI.Config.Workspace) private readonly config: ValidatedWorkspaceConfig,
    @inject(DI.Ports.FileSystem) private readonly fs: FileSystemPort,
    @inject(DI.Ports.TimeClock) private readonly clock: TimeClockPort,
    @inject(DI.Ports.ThreadIdentity) private readonly threads: ThreadIdentityPort,
    @inject(DI.Logging.Factory) private readonly loggerFactory: ILoggerFactory
  ) {}

  create(config: ValidatedWorkspaceConfig = this.config): CompilationWorkspace {
    return new CompilationWorkspace({
      config,
      fs: this.fs,
      clock: this.clock,
      threads: this.threads,
      loggerFactory: this.loggerFactory,
    });
  }
}
