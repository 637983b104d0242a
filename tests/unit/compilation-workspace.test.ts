import { describe, it, expect, vi } from 'vitest';
import { strToU8, zipSync } from 'fflate';

import { CompilationWorkspace } from '../../src/workspace/compilation-workspace.js';
import { withWorkspace } from '../../src/workspace/with-workspace.js';
import { createWorkspace } from '../../src/workspace/create-workspace.js';
import { StandardLocations, defineLocation } from '../../src/workspace/location.js';
import { loadWorkspaceConfig } from '../../src/config/workspace-config.js';
import { ArchiveContainer } from '../../src/containers/archive-container.js';
import { diagnostic, sourceFromHandle } from '../../src/diagnostics/diagnostic.js';
import { WorkspaceFault } from '../../src/core/errors/index.js';
import { InMemoryFileSystem, FakeTimeClock, FakeThreadIdentity } from '../fakes/index.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { expectOk, expectErr } from '../helpers/result-helpers.js';
import { memory, rel, text, StuckContainer } from '../helpers/fixtures.js';

const { SOURCE_PATH, CLASS_PATH, CLASS_OUTPUT, MODULE_SOURCE_PATH } = StandardLocations;

function newWorkspace(config: unknown = {}, fs = new InMemoryFileSystem(), loggers = new FakeLoggerFactory()): CompilationWorkspace {
  return new CompilationWorkspace({
    config: expectOk(loadWorkspaceConfig(config), 'config'),
    fs,
    clock: new FakeTimeClock(),
    threads: new FakeThreadIdentity(),
    loggerFactory: loggers,
  });
}

describe('CompilationWorkspace', () => {
  describe('lookups', () => {
    it('resolves files added to a package-oriented location', async () => {
      const ws = newWorkspace();
      expectOk(ws.addMemoryFiles(SOURCE_PATH, { 'com/example/App.java': 'class App {}' }), 'adding files');

      const handle = expectOk(await ws.resolve(SOURCE_PATH, 'com/example/App.java'), 'resolving');

      expect(handle?.kind).toBe('source');
      expect(handle?.uri).toBe('memory:SOURCE_PATH/com/example/App.java');
      expect(handle?.location).toBe(SOURCE_PATH);
    });

    it('treats a location without containers as empty', async () => {
      const ws = newWorkspace();

      expect(expectOk(await ws.resolve(CLASS_PATH, 'A.class'), 'resolving')).toBeNull();
      expect(expectOk(await ws.listAll(CLASS_PATH), 'listing')).toEqual([]);
      expect(ws.hasLocation(CLASS_PATH)).toBe(false);

      const error = expectErr(await ws.findFileOrSuggest(CLASS_PATH, 'A.class'), 'finding');
      expect(error.message).toBe('No file matching "A.class" was found in CLASS_PATH. No similar results found.');
    });

    it('suggests close paths for a missing file', async () => {
      const ws = newWorkspace();
      expectOk(ws.addMemoryFiles(SOURCE_PATH, { 'com/example/Widget.java': '' }), 'adding files');

      const error = expectErr(await ws.findFileOrSuggest(SOURCE_PATH, 'com/example/Widgt.java'), 'finding');

      expect(error._tag).toBe('FileNotFound');
      if (error._tag === 'FileNotFound') {
        expect(error.suggestions).toEqual(['com/example/Widget.java']);
      }
    });

    it('suggests close location names', () => {
      const error = expectErr(newWorkspace().location('CLASS_OUTPT'), 'finding location');

      expect(error._tag).toBe('LocationNotFound');
      expect(error.suggestions[0]).toBe('CLASS_OUTPUT');
    });

    it('registers configured locations', async () => {
      const ws = newWorkspace({ locations: [{ name: 'GENERATED' }] });
      const generated = expectOk(ws.location('GENERATED'), 'finding location');
      expectOk(ws.addMemoryFiles(generated, { 'Gen.java': 'gen' }), 'adding files');

      expect(ws.hasLocation(generated)).toBe(true);
      expect(expectOk(await ws.listAll(generated), 'listing').map((h) => h.relativePath)).toEqual(['Gen.java']);
    });

    it('adds directories and archives through the file system port', async () => {
      const fs = new InMemoryFileSystem();
      fs.seed('/src/com/A.java', 'a');
      fs.seed('/libs/dep.zip', zipSync({ 'com/Dep.class': strToU8('dep') }));
      const ws = newWorkspace({}, fs);

      ws.addDirectory(SOURCE_PATH, '/src');
      expectOk(await ws.addArchive(CLASS_PATH, '/libs/dep.zip'), 'adding archive');

      expect(expectOk(await ws.resolve(SOURCE_PATH, 'com/A.java'), 'resolving source')?.uri).toBe('file:///src/com/A.java');
      const dep = expectOk(await ws.classLoadingView(CLASS_PATH).fetch('com.Dep'), 'fetching class');
      expect(text(dep)).toBe('dep');
    });

    it('reports an unreadable archive without registering it', async () => {
      const fs = new InMemoryFileSystem();
      const ws = newWorkspace({}, fs);

      const error = expectErr(await ws.addArchive(CLASS_PATH, '/libs/missing.zip'), 'adding archive');

      expect(error._tag).toBe('BackingStoreFailed');
      expect(ws.hasLocation(CLASS_PATH)).toBe(false);
    });

    it('rejects an archive for a sealed group before reading it', async () => {
      const fs = new InMemoryFileSystem();
      fs.seed('/libs/dep.zip', zipSync({ 'com/Dep.class': strToU8('dep') }));
      const ws = newWorkspace({}, fs);
      expectOk(ws.addMemoryFiles(CLASS_PATH, { 'com/A.class': 'a' }), 'adding files');
      expectOk(await ws.resolve(CLASS_PATH, 'com/A.class'), 'first lookup');

      expect(() => ws.addArchive(CLASS_PATH, '/libs/dep.zip')).toThrow(
        'Cannot add a container on location CLASS_PATH: the group is sealed; containers must be added before the first lookup'
      );
      expect(ws.getContainerGroup(CLASS_PATH).containers()).toHaveLength(1);
    });

    it('needs a module name to add an archive to a module-oriented location', () => {
      expect(() => newWorkspace().addArchive(MODULE_SOURCE_PATH, '/libs/dep.zip')).toThrow(
        'Cannot add an archive on location MODULE_SOURCE_PATH: the location is module-oriented; add containers to a module'
      );
    });

    it('closes an archive whose group was sealed while it was being read', async () => {
      const fs = new InMemoryFileSystem();
      fs.seed('/libs/dep.zip', zipSync({ 'com/Dep.class': strToU8('dep') }));
      const ws = newWorkspace({}, fs);
      expectOk(ws.addMemoryFiles(CLASS_PATH, { 'com/A.class': 'a' }), 'adding files');
      const close = vi.spyOn(ArchiveContainer.prototype, 'close');

      try {
        const pending = ws.addArchive(CLASS_PATH, '/libs/dep.zip');
        const lookup = ws.resolve(CLASS_PATH, 'com/A.class');

        await expect(Promise.resolve(pending)).rejects.toThrow(WorkspaceFault);
        expectOk(await lookup, 'first lookup');
        expect(close).toHaveBeenCalledTimes(1);
        expect(ws.getContainerGroup(CLASS_PATH).containers()).toHaveLength(1);
      } finally {
        close.mockRestore();
      }
    });
  });

  describe('modules', () => {
    it('resolves files inside a module', async () => {
      const ws = newWorkspace();
      expectOk(await ws.addModuleRoot(MODULE_SOURCE_PATH, memory('mods', { 'app/com/A.java': 'a', 'lib/com/B.java': 'b' })), 'adding root');

      expect(ws.getModulePartition(MODULE_SOURCE_PATH).moduleNames()).toEqual(['app', 'lib']);
      expect(expectOk(await ws.resolve(MODULE_SOURCE_PATH, 'com/A.java', 'app'), 'resolving')?.relativePath).toBe('com/A.java');
      expect(expectOk(await ws.resolve(MODULE_SOURCE_PATH, 'com/A.java', 'lib'), 'isolation')).toBeNull();
      expect(expectOk(await ws.resolve(MODULE_SOURCE_PATH, 'com/A.java', 'missing'), 'unknown module')).toBeNull();
      expect(expectOk(await ws.listAll(MODULE_SOURCE_PATH), 'listing all')).toHaveLength(2);
    });

    it('needs a module name for module-oriented lookups', () => {
      expect(() => newWorkspace().resolve(MODULE_SOURCE_PATH, 'com/A.java')).toThrow(
        'Cannot resolve a file on location MODULE_SOURCE_PATH: a module name is required for a module-oriented location'
      );
    });
  });

  describe('misuse', () => {
    it('rejects locations the workspace does not know', () => {
      const ws = newWorkspace();

      expect(() => ws.addContainer(defineLocation('NOPE'), memory('x'))).toThrow(
        'Cannot add a container on location NOPE: the location is not registered with this workspace'
      );
      expect(() => ws.getContainerGroup(defineLocation('SOURCE_PATH', { output: true }))).toThrow(WorkspaceFault);
    });

    it('rejects plain containers on module-oriented locations', () => {
      expect(() => newWorkspace().addContainer(MODULE_SOURCE_PATH, memory('x'))).toThrow(
        'Cannot add a container on location MODULE_SOURCE_PATH: the location is module-oriented; add containers to a module'
      );
    });

    it('rejects module names on package-oriented locations', () => {
      expect(() => newWorkspace().listAll(SOURCE_PATH, 'app')).toThrow(
        'Cannot list files on location SOURCE_PATH: module name "app" given for a location that is not module-oriented'
      );
    });

    it('rejects containers after the first lookup', async () => {
      const ws = newWorkspace();
      expectOk(ws.addMemoryFiles(SOURCE_PATH, { 'A.java': 'a' }), 'adding files');
      expectOk(await ws.resolve(SOURCE_PATH, 'A.java'), 'first lookup');

      expect(() => ws.addContainer(SOURCE_PATH, memory('late'))).toThrow(WorkspaceFault);
    });
  });

  describe('output', () => {
    it('serves written output to lookups and class loading', async () => {
      const ws = newWorkspace();
      const out = ws.getOrCreateContainer(CLASS_OUTPUT);
      expectOk(await out.write(rel('com/A.class'), strToU8('compiled')), 'writing');

      expect(ws.getOrCreateContainer(CLASS_OUTPUT)).toBe(out);
      expect(expectOk(await ws.resolve(CLASS_OUTPUT, 'com/A.class'), 'resolving')?.kind).toBe('class');
      expect(text(expectOk(await ws.classLoadingView(CLASS_OUTPUT).fetch('com.A'), 'fetching'))).toBe('compiled');
    });

    it('writes under the configured directory root', async () => {
      const fs = new InMemoryFileSystem();
      const ws = newWorkspace({ output: { kind: 'directory', root: '/out' } }, fs);

      expectOk(await ws.getOrCreateContainer(CLASS_OUTPUT).write(rel('A.class'), strToU8('a')), 'writing');

      expect(fs.fileText('/out/CLASS_OUTPUT/A.class')).toBe('a');
    });

    it('uses an explicitly added output container', () => {
      const ws = newWorkspace();
      const explicit = memory('explicit');
      ws.addContainer(CLASS_OUTPUT, explicit);

      expect(ws.getOrCreateContainer(CLASS_OUTPUT)).toBe(explicit);
    });
  });

  describe('diagnostics', () => {
    it('describes recorded diagnostics with their source', async () => {
      const ws = newWorkspace();
      expectOk(ws.addMemoryFiles(SOURCE_PATH, { 'A.java': 'class A {\n  int x\n}' }), 'adding files');
      const handle = expectOk(await ws.resolve(SOURCE_PATH, 'A.java'), 'resolving') ?? expect.unreachable();

      ws.record(
        diagnostic({
          kind: 'error',
          code: 'compiler.err.expected',
          source: sourceFromHandle(handle),
          startPosition: 16,
          endPosition: 17,
          lineNumber: 2,
          columnNumber: 7,
          message: "';' expected",
        })
      );

      expect(ws.diagnostics.size).toBe(1);
      expect(await ws.describeDiagnostics()).toBe(
        [
          '[ERROR] compiler.err.expected A.java (at line 2, col 7)',
          '',
          '    1 | class A {',
          '    2 |   int x',
          '      +       ^',
          '    3 | }',
          '',
          "    ';' expected",
        ].join('\n')
      );
    });
  });

  describe('close', () => {
    it('closes every container and rejects later use', async () => {
      const ws = newWorkspace();
      const sources = expectOk(ws.addMemoryFiles(SOURCE_PATH, { 'A.java': 'a' }), 'adding files');
      const out = ws.getOrCreateContainer(CLASS_OUTPUT);

      expectOk(await ws.close(), 'closing');

      expect(ws.closed).toBe(true);
      expect(sources.closed).toBe(true);
      expect(out.closed).toBe(true);
      expect(ws.diagnostics.state).toBe('closed');
      expect(() => ws.resolve(SOURCE_PATH, 'A.java')).toThrow('Cannot resolve a file: workspace has already been closed');
      expectOk(await ws.close(), 'closing twice');
    });

    it('aggregates close failures and still closes everything else', async () => {
      const loggers = new FakeLoggerFactory();
      const ws = newWorkspace({}, new InMemoryFileSystem(), loggers);
      const healthy = memory('healthy');
      ws.addContainer(SOURCE_PATH, new StuckContainer('stuck-a'));
      ws.addContainer(SOURCE_PATH, healthy);
      ws.addContainer(CLASS_PATH, new StuckContainer('stuck-b'));

      const error = expectErr(await ws.close(), 'closing');

      expect(error._tag).toBe('CloseFailed');
      expect(error.resource).toBe('workspace');
      expect(error.failures.map((f) => f.message)).toEqual([
        'Failed to close "." in memory:stuck-a: lock held',
        'Failed to close "." in memory:stuck-b: lock held',
      ]);
      expect(healthy.closed).toBe(true);
      expect(loggers.sink.hasEntry('error', 'Workspace closed with failures')).toBe(true);
    });
  });
});

describe('withWorkspace', () => {
  it('returns the result and closes the workspace', async () => {
    const ws = newWorkspace();

    const result = await withWorkspace(ws, () => 42);

    expect(expectOk(result, 'running')).toBe(42);
    expect(ws.closed).toBe(true);
  });

  it('closes the workspace when the callback throws', async () => {
    const ws = newWorkspace();

    await expect(
      withWorkspace(ws, () => {
        throw new Error('compile failed');
      })
    ).rejects.toThrow('compile failed');
    expect(ws.closed).toBe(true);
  });
});

describe('createWorkspace', () => {
  it('validates the configuration', () => {
    const error = expectErr(createWorkspace({ snippet: { contextLines: -1 } }), 'invalid config');

    expect(error.issues).toEqual([{ path: 'snippet.contextLines', message: 'contextLines cannot be negative' }]);
  });

  it('builds a workspace with the given ports', () => {
    const ws = expectOk(createWorkspace({}, { loggerFactory: new FakeLoggerFactory() }), 'creating');

    expect(ws.config.suggestions.maxResults).toBe(5);
    expect(ws.closed).toBe(false);
  });
});
