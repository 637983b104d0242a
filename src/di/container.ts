import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { ValidatedWorkspaceConfig } from '../config/workspace-config.js';
import { loadWorkspaceConfig } from '../config/workspace-config.js';
import { WorkspaceFault, formatErrorForLogs } from '../core/errors/index.js';
import { PinoLoggerFactory, getBootstrapLogger } from '../core/logging/index.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ThreadIdentityPort } from '../ports/thread-identity.port.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { NodeTimeClock } from '../infra/local/time-clock/index.js';
import { NodeThreadIdentity } from '../infra/local/thread-identity/index.js';
import { WorkspaceFactory } from '../workspace/workspace-factory.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  /** Raw workspace configuration; validated here. */
  readonly config?: unknown;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// Every step skips tokens that are already registered, so tests can inject
// fakes before initialization.
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): void {
  if (container.isRegistered(DI.Config.Workspace)) return;

  const result = loadWorkspaceConfig(options.config ?? {});
  if (result.isErr()) {
    getBootstrapLogger().error(formatErrorForLogs(result.error), 'Invalid workspace configuration');
    throw new WorkspaceFault(result.error);
  }

  container.register<ValidatedWorkspaceConfig>(DI.Config.Workspace, { useValue: result.value });
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;

  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

function registerPorts(): void {
  if (!container.isRegistered(DI.Ports.FileSystem)) {
    container.register<FileSystemPort>(DI.Ports.FileSystem, {
      useFactory: instanceCachingFactory(() => new NodeFileSystem()),
    });
  }
  if (!container.isRegistered(DI.Ports.TimeClock)) {
    container.register<TimeClockPort>(DI.Ports.TimeClock, {
      useFactory: instanceCachingFactory(() => new NodeTimeClock()),
    });
  }
  if (!container.isRegistered(DI.Ports.ThreadIdentity)) {
    container.register<ThreadIdentityPort>(DI.Ports.ThreadIdentity, {
      useFactory: instanceCachingFactory(() => new NodeThreadIdentity()),
    });
  }
}

function registerServices(): void {
  if (container.isRegistered(DI.Services.WorkspaceFactory)) return;

  container.register<WorkspaceFactory>(DI.Services.WorkspaceFactory, {
    useFactory: instanceCachingFactory((c) => c.resolve(WorkspaceFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent.
 *
 * Throws WorkspaceFault when the configuration is invalid.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerConfig(options);
  registerLogging();
  registerPorts();
  registerServices();
  initialized = true;
  getBootstrapLogger().debug('DI container initialized');
}

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Reset the container (tests only).
 */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
}

export { container };
