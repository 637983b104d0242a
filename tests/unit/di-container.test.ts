import { describe, it, expect, afterEach } from 'vitest';
import { container } from 'tsyringe';
import { DI } from '../../src/di/tokens.js';
import { initializeContainer, isInitialized, resetContainer } from '../../src/di/container.js';
import type { WorkspaceFactory } from '../../src/workspace/workspace-factory.js';
import type { ValidatedWorkspaceConfig } from '../../src/config/workspace-config.js';
import { CompilationWorkspace } from '../../src/workspace/compilation-workspace.js';
import { StandardLocations } from '../../src/workspace/location.js';
import { WorkspaceFault } from '../../src/core/errors/index.js';
import { diagnostic } from '../../src/diagnostics/diagnostic.js';
import { expectOk } from '../helpers/result-helpers.js';
import { setupTest, teardownTest } from '../di/test-container.js';

describe('DI container', () => {
  afterEach(() => {
    teardownTest();
  });

  it('builds workspaces from the registered fakes', async () => {
    const { fs, clock } = setupTest();
    fs.seed('/src/com/A.java', 'class A {}');

    const factory = container.resolve<WorkspaceFactory>(DI.Services.WorkspaceFactory);
    const ws = factory.create();
    ws.addDirectory(StandardLocations.SOURCE_PATH, '/src');

    expect(ws).toBeInstanceOf(CompilationWorkspace);
    expect(expectOk(await ws.resolve(StandardLocations.SOURCE_PATH, 'com/A.java'), 'resolving')?.kind).toBe('source');
    expect(ws.diagnostics.record(diagnostic({ kind: 'note', message: 'n' })).timestampNanos).toBe(clock.nowNanos());
  });

  it('shares one factory and builds a fresh workspace per call', () => {
    setupTest();

    const factory = container.resolve<WorkspaceFactory>(DI.Services.WorkspaceFactory);

    expect(container.resolve<WorkspaceFactory>(DI.Services.WorkspaceFactory)).toBe(factory);
    expect(factory.create()).not.toBe(factory.create());
  });

  it('validates the raw configuration it is given', () => {
    resetContainer();

    initializeContainer({ config: { suggestions: { maxResults: 2 } } });

    expect(isInitialized()).toBe(true);
    expect(container.resolve<ValidatedWorkspaceConfig>(DI.Config.Workspace).suggestions.maxResults).toBe(2);
  });

  it('refuses an invalid configuration', () => {
    resetContainer();

    expect(() => initializeContainer({ config: { output: { kind: 'cloud' } } })).toThrow(WorkspaceFault);
    expect(isInitialized()).toBe(false);
  });

  it('is idempotent', () => {
    resetContainer();
    initializeContainer({ config: { snippet: { contextLines: 1 } } });
    initializeContainer({ config: { snippet: { contextLines: 5 } } });

    expect(container.resolve<ValidatedWorkspaceConfig>(DI.Config.Workspace).snippet.contextLines).toBe(1);
  });
});
