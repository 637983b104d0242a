import { okAsync, errAsync, ResultAsync, type Result } from 'neverthrow';
import type {
  CloseFailedError,
  FileNotFoundError,
  InvalidPathError,
  LocationNotFoundError,
  StorageError,
} from '../core/errors/index.js';
import { Err, WorkspaceFault } from '../core/errors/index.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { ValidatedWorkspaceConfig } from '../config/workspace-config.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ThreadIdentityPort } from '../ports/thread-identity.port.js';
import { FuzzyMatcher } from '../suggestions/index.js';
import type { Container } from '../containers/container.js';
import { ContainerGroup } from '../containers/container-group.js';
import { ModulePartition } from '../containers/module-partition.js';
import { OutputAllocator } from '../containers/output-allocator.js';
import { MemoryContainer, type MemoryFiles } from '../containers/memory-container.js';
import { DirectoryContainer } from '../containers/directory-container.js';
import { ArchiveContainer } from '../containers/archive-container.js';
import type { ClassLoadingView } from '../containers/class-loading-view.js';
import type { FileHandle } from '../containers/file-handle.js';
import { DiagnosticTraceCollector } from '../diagnostics/diagnostic-trace-collector.js';
import type { Diagnostic } from '../diagnostics/diagnostic.js';
import { describeDiagnostics } from '../diagnostics/diagnostic-representation.js';
import type { Location } from './location.js';
import { LocationRegistry } from './location-registry.js';

export interface WorkspaceDeps {
  readonly config: ValidatedWorkspaceConfig;
  readonly fs: FileSystemPort;
  readonly clock: TimeClockPort;
  readonly threads: ThreadIdentityPort;
  readonly loggerFactory: ILoggerFactory;
}

/**
 * Virtual file system for one compilation run.
 *
 * Binds locations to container groups (or module partitions), allocates
 * output containers on demand and collects the diagnostics reported during
 * the run. Configure first, then query: a group is sealed by its first lookup.
 */
export class CompilationWorkspace {
  readonly locations: LocationRegistry;
  readonly diagnostics: DiagnosticTraceCollector;

  private readonly groups = new Map<string, ContainerGroup>();
  private readonly partitions = new Map<string, ModulePartition>();
  private readonly outputs: OutputAllocator;
  private readonly logger: Logger;
  private _closed = false;

  constructor(private readonly deps: WorkspaceDeps) {
    const { config } = deps;
    this.logger = deps.loggerFactory.create('CompilationWorkspace');
    this.locations = new LocationRegistry(config.locations, new FuzzyMatcher(config.suggestions));
    this.outputs = new OutputAllocator({
      backing: config.output,
      fs: deps.fs,
      fileKinds: config.fileKinds,
      suggestions: config.suggestions,
      logger: deps.loggerFactory.create('OutputAllocator'),
    });
    this.diagnostics = new DiagnosticTraceCollector({
      clock: deps.clock,
      threads: deps.threads,
      logger: deps.loggerFactory.create('Diagnostics'),
      options: config.diagnostics,
    });
  }

  get config(): ValidatedWorkspaceConfig {
    return this.deps.config;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Registered location by name, or LocationNotFound with suggestions. */
  location(name: string): Result<Location, LocationNotFoundError> {
    return this.locations.find(name);
  }

  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  /**
   * Append `container` to the group of a package-oriented location. For an
   * output location the container replaces the one that would be allocated.
   */
  addContainer(location: Location, container: Container): void {
    this.requireLocation(location, 'add a container');
    if (location.isModuleOriented) {
      this.misuse(location, 'add a container', 'the location is module-oriented; add containers to a module');
    }

    if (location.isOutput) {
      this.outputs.adoptContainer(location, container);
    } else {
      this.packageGroup(location).addContainer(container);
    }
  }

  addModuleContainer(location: Location, moduleName: string, container: Container): void {
    this.requireLocation(location, 'add a module container');
    if (!location.isModuleOriented) {
      this.misuse(location, 'add a module container', 'the location is not module-oriented');
    }

    if (location.isOutput) {
      this.outputs.adoptContainer(location, container, moduleName);
    } else {
      this.inputPartition(location).addModuleContainer(moduleName, container);
    }
  }

  /**
   * Register each top-level directory of `root` as a module of `location`.
   */
  addModuleRoot(location: Location, root: Container): ResultAsync<readonly string[], StorageError> {
    this.requireLocation(location, 'add a module root');
    if (!location.isModuleOriented || location.isOutput) {
      this.misuse(location, 'add a module root', 'module roots can only be added to module-oriented input locations');
    }
    return this.inputPartition(location).addModuleRoot(root);
  }

  addDirectory(location: Location, directory: string, moduleName?: string): DirectoryContainer {
    const container = new DirectoryContainer(directory, this.deps.fs, { writable: location.isOutput });
    this.attach(location, container, moduleName);
    return container;
  }

  /**
   * Open the archive at `archivePath` and add it to `location`.
   *
   * Misuse that can be detected before the archive is read throws
   * synchronously. If the target group stops accepting containers while the
   * archive is being read, the archive is closed again and the returned
   * result rejects with the misuse fault.
   */
  addArchive(location: Location, archivePath: string, moduleName?: string): ResultAsync<ArchiveContainer, StorageError> {
    this.assertCanAttach(location, moduleName, 'add an archive');
    if (location.isOutput) {
      this.misuse(location, 'add an archive', 'archives are read-only and cannot hold output');
    }

    return ArchiveContainer.open(archivePath, this.deps.fs).andThen((archive): ResultAsync<ArchiveContainer, StorageError> => {
      try {
        this.attach(location, archive, moduleName);
        return okAsync(archive);
      } catch (error) {
        return archive.close().map((): ArchiveContainer => {
          throw error;
        });
      }
    });
  }

  addMemoryFiles(location: Location, files: MemoryFiles, moduleName?: string): Result<MemoryContainer, InvalidPathError> {
    const name = moduleName === undefined ? location.name : `${location.name}[${moduleName}]`;
    return MemoryContainer.withFiles(name, files).map((container) => {
      this.attach(location, container, moduleName);
      return container;
    });
  }

  // ---------------------------------------------------------------------------
  // Groups and partitions
  // ---------------------------------------------------------------------------

  /** Group for a package-oriented location, created on first use. */
  getContainerGroup(location: Location): ContainerGroup {
    this.requireLocation(location, 'get a container group');
    if (location.isModuleOriented) {
      this.misuse(location, 'get a container group', 'the location is module-oriented; use getModulePartition');
    }
    return location.isOutput ? this.outputs.getOrCreateGroup(location) : this.packageGroup(location);
  }

  /** Existing group for a package-oriented location, without creating one. */
  findContainerGroup(location: Location): ContainerGroup | null {
    this.requireLocation(location, 'find a container group');
    if (location.isModuleOriented) return null;
    return location.isOutput ? this.outputs.findGroup(location) : (this.groups.get(location.name) ?? null);
  }

  getModulePartition(location: Location): ModulePartition {
    this.requireLocation(location, 'get a module partition');
    if (!location.isModuleOriented) {
      this.misuse(location, 'get a module partition', 'the location is not module-oriented');
    }
    return location.isOutput ? this.outputs.partitionFor(location) : this.inputPartition(location);
  }

  getOrCreateModule(location: Location, moduleName: string): ContainerGroup {
    return this.getModulePartition(location).getOrCreateModule(moduleName);
  }

  getModule(location: Location, moduleName: string): ContainerGroup | null {
    return this.getModulePartition(location).getModule(moduleName);
  }

  /** True when the location has at least one container (or module). */
  hasLocation(location: Location): boolean {
    this.assertOpen('check a location');
    if (!this.locations.has(location)) return false;
    if (location.isModuleOriented) {
      const partition = location.isOutput ? this.outputs.partitionFor(location) : this.partitions.get(location.name);
      return partition !== undefined && !partition.isEmpty();
    }
    const group = this.findContainerGroup(location);
    return group !== null && !group.isEmpty();
  }

  // ---------------------------------------------------------------------------
  // Lookups
  // ---------------------------------------------------------------------------

  resolve(location: Location, path: string, moduleName?: string): ResultAsync<FileHandle | null, StorageError> {
    const group = this.existingGroup(location, moduleName, 'resolve a file');
    return group === null ? okAsync(null) : group.resolve(path);
  }

  findFileOrSuggest(
    location: Location,
    path: string,
    moduleName?: string
  ): ResultAsync<FileHandle, FileNotFoundError | StorageError> {
    const group = this.existingGroup(location, moduleName, 'resolve a file');
    if (group === null) {
      const name = moduleName === undefined ? location.name : `${location.name}[${moduleName}]`;
      return errAsync(Err.fileNotFound(name, path));
    }
    return group.findFileOrSuggest(path);
  }

  listAll(location: Location, moduleName?: string): ResultAsync<readonly FileHandle[], StorageError> {
    if (location.isModuleOriented && moduleName === undefined) {
      this.requireLocation(location, 'list files');
      const partition = location.isOutput ? this.outputs.partitionFor(location) : this.partitions.get(location.name);
      return partition === undefined ? okAsync([]) : partition.listAll();
    }
    const group = this.existingGroup(location, moduleName, 'list files');
    return group === null ? okAsync([]) : group.listAll();
  }

  // ---------------------------------------------------------------------------
  // Output
  // ---------------------------------------------------------------------------

  getOrCreateContainer(location: Location, moduleName?: string): Container {
    this.requireLocation(location, 'allocate an output container');
    return this.outputs.getOrCreateContainer(location, moduleName);
  }

  classLoadingView(location: Location, moduleName?: string): ClassLoadingView {
    this.requireLocation(location, 'open a class-loading view');
    if (location.isOutput) {
      return this.outputs.classLoadingView(location, moduleName);
    }
    return moduleName === undefined
      ? this.getContainerGroup(location).classLoadingView()
      : this.getOrCreateModule(location, moduleName).classLoadingView();
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  record(diagnostic: Diagnostic): void {
    this.diagnostics.record(diagnostic);
  }

  /** Every recorded diagnostic in readable form, with source snippets. */
  describeDiagnostics(): Promise<string> {
    return describeDiagnostics(this.diagnostics.drain(), {
      contextLines: this.deps.config.snippet.contextLines,
      logger: this.logger,
    });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Close the diagnostic log and every container, best effort. Failures of
   * individual containers are aggregated into one CloseFailed error.
   */
  close(): ResultAsync<void, CloseFailedError> {
    if (this._closed) return okAsync(undefined);
    this._closed = true;
    this.diagnostics.close();

    const closes: ResultAsync<void, CloseFailedError>[] = [
      ...[...this.groups.values()].map((g) => g.close()),
      ...[...this.partitions.values()].map((p) => p.close()),
      this.outputs.close(),
    ];

    return ResultAsync.combineWithAllErrors(closes)
      .map(() => {
        this.logger.debug({ groups: this.groups.size, partitions: this.partitions.size }, 'Workspace closed');
      })
      .mapErr((failures) => {
        const error = Err.closeFailed('workspace', failures.flatMap((f) => f.failures));
        this.logger.error({ err: error }, 'Workspace closed with failures');
        return error;
      });
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private attach(location: Location, container: Container, moduleName: string | undefined): void {
    if (moduleName === undefined) {
      this.addContainer(location, container);
    } else {
      this.addModuleContainer(location, moduleName, container);
    }
  }

  private assertCanAttach(location: Location, moduleName: string | undefined, operation: string): void {
    this.requireLocation(location, operation);

    if (moduleName === undefined) {
      if (location.isModuleOriented) {
        this.misuse(location, operation, 'the location is module-oriented; add containers to a module');
      }
      if (!location.isOutput) this.groups.get(location.name)?.assertCanAdd();
      return;
    }

    if (!location.isModuleOriented) {
      this.misuse(location, operation, 'the location is not module-oriented');
    }
    if (!location.isOutput) this.partitions.get(location.name)?.getModule(moduleName)?.assertCanAdd();
  }

  private packageGroup(location: Location): ContainerGroup {
    const existing = this.groups.get(location.name);
    if (existing !== undefined) return existing;

    const group = new ContainerGroup({
      location,
      fileKinds: this.deps.config.fileKinds,
      suggestions: this.deps.config.suggestions,
      logger: this.logger,
    });
    this.groups.set(location.name, group);
    return group;
  }

  private inputPartition(location: Location): ModulePartition {
    const existing = this.partitions.get(location.name);
    if (existing !== undefined) return existing;

    const partition = new ModulePartition({
      location,
      fileKinds: this.deps.config.fileKinds,
      suggestions: this.deps.config.suggestions,
      logger: this.logger,
    });
    this.partitions.set(location.name, partition);
    return partition;
  }

  private existingGroup(location: Location, moduleName: string | undefined, operation: string): ContainerGroup | null {
    this.requireLocation(location, operation);

    if (moduleName === undefined) {
      if (location.isModuleOriented) {
        this.misuse(location, operation, 'a module name is required for a module-oriented location');
      }
      return this.findContainerGroup(location);
    }

    if (!location.isModuleOriented) {
      this.misuse(location, operation, `module name "${moduleName}" given for a location that is not module-oriented`);
    }
    return location.isOutput
      ? this.outputs.findGroup(location, moduleName)
      : (this.partitions.get(location.name)?.getModule(moduleName) ?? null);
  }

  private requireLocation(location: Location, operation: string): void {
    this.assertOpen(operation);
    if (!this.locations.has(location)) {
      this.misuse(location, operation, 'the location is not registered with this workspace');
    }
  }

  private assertOpen(operation: string): void {
    if (this._closed) {
      throw new WorkspaceFault(Err.postCloseUsage('workspace', operation));
    }
  }

  private misuse(location: Location, operation: string, details: string): never {
    throw new WorkspaceFault(Err.configurationMisuse(location.name, operation, details));
  }
}
