import * as nodePath from 'path';
import { okAsync, ResultAsync } from 'neverthrow';
import type { CloseFailedError, StorageError } from '../core/errors/index.js';
import { Err, WorkspaceFault } from '../core/errors/index.js';
import type { Logger } from '../core/logging/index.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { SuggestionConfig } from '../suggestions/index.js';
import type { Location } from '../workspace/location.js';
import type { FileKindRules } from '../workspace/file-kind.js';
import type { Container } from './container.js';
import { assertAvailable, ContainerGroup } from './container-group.js';
import { ModulePartition } from './module-partition.js';
import { MemoryContainer } from './memory-container.js';
import { DirectoryContainer } from './directory-container.js';
import type { ClassLoadingView } from './class-loading-view.js';

export type OutputBacking =
  | { readonly kind: 'memory' }
  | { readonly kind: 'directory'; readonly root: string };

export interface OutputAllocatorOptions {
  readonly backing: OutputBacking;
  readonly fs: FileSystemPort;
  readonly fileKinds: FileKindRules;
  readonly suggestions: SuggestionConfig;
  readonly logger: Logger;
}

/**
 * Lazily allocates one writable container per output location (or per module
 * of a module-oriented output location).
 *
 * Allocation is synchronous: there is no await between the lookup and the
 * insert, so interleaved callers always observe the same container.
 */
export class OutputAllocator {
  private readonly groups = new Map<string, ContainerGroup>();
  private readonly partitions = new Map<string, ModulePartition>();
  private readonly allocated = new Map<string, Container>();
  private pendingAdoption: Container | null = null;
  private _closed = false;

  constructor(private readonly options: OutputAllocatorOptions) {}

  get closed(): boolean {
    return this._closed;
  }

  getOrCreateContainer(location: Location, moduleName?: string): Container {
    const group = this.getOrCreateGroup(location, moduleName);
    const container = this.allocated.get(group.location.name);
    if (container === undefined) {
      // Every output group is created together with its container.
      throw new WorkspaceFault(Err.configurationMisuse(group.location.name, 'allocate an output container', 'group has no container'));
    }
    return container;
  }

  /**
   * The group holding the output container for `location` (and `moduleName`),
   * allocating both on first use.
   */
  getOrCreateGroup(location: Location, moduleName?: string): ContainerGroup {
    this.validate(location, moduleName, 'allocate an output container');

    if (moduleName !== undefined) {
      return this.partitionFor(location).getOrCreateModule(moduleName);
    }

    const existing = this.groups.get(location.name);
    if (existing !== undefined) return existing;

    const group = this.newGroup(location);
    this.attach(group, [location.name]);
    this.groups.set(location.name, group);
    return group;
  }

  /** Existing group for `location` (and `moduleName`), without allocating. */
  findGroup(location: Location, moduleName?: string): ContainerGroup | null {
    this.validate(location, moduleName, 'look up an output container');
    if (moduleName !== undefined) {
      return this.partitions.get(location.name)?.getModule(moduleName) ?? null;
    }
    return this.groups.get(location.name) ?? null;
  }

  /**
   * Use `container` as the output container instead of allocating one.
   * Only possible before the first allocation for that key.
   */
  adoptContainer(location: Location, container: Container, moduleName?: string): ContainerGroup {
    this.validate(location, moduleName, 'adopt an output container');
    const key = moduleName === undefined ? location.name : `${location.name}[${moduleName}]`;

    if (!container.capabilities.writable) {
      throw new WorkspaceFault(Err.configurationMisuse(location.name, 'adopt an output container', `${container.id} is not writable`));
    }
    assertAvailable(container, (details) => {
      throw new WorkspaceFault(Err.configurationMisuse(location.name, 'adopt an output container', details));
    });
    if (this.allocated.has(key)) {
      throw new WorkspaceFault(
        Err.configurationMisuse(location.name, 'adopt an output container', `an output container for ${key} already exists`)
      );
    }

    this.pendingAdoption = container;
    try {
      return this.getOrCreateGroup(location, moduleName);
    } finally {
      this.pendingAdoption = null;
    }
  }

  /** Partition of a module-oriented output location. */
  partitionFor(location: Location): ModulePartition {
    this.assertOpen('open an output module partition');
    if (!location.isOutput || !location.isModuleOriented) {
      throw new WorkspaceFault(
        Err.configurationMisuse(location.name, 'open an output module partition', 'the location is not a module-oriented output location')
      );
    }

    const existing = this.partitions.get(location.name);
    if (existing !== undefined) return existing;

    const partition = new ModulePartition({
      location,
      fileKinds: this.options.fileKinds,
      suggestions: this.options.suggestions,
      logger: this.options.logger,
      onModuleCreated: (group, moduleName) => this.attach(group, [location.name, moduleName]),
    });
    this.partitions.set(location.name, partition);
    return partition;
  }

  classLoadingView(location: Location, moduleName?: string): ClassLoadingView {
    return this.getOrCreateGroup(location, moduleName).classLoadingView();
  }

  close(): ResultAsync<void, CloseFailedError> {
    if (this._closed) return okAsync(undefined);
    this._closed = true;

    const closes: ResultAsync<void, StorageError>[] = [
      ...[...this.groups.values()].map((g) => g.close()),
      ...[...this.partitions.values()].map((p) => p.close()),
    ];

    return ResultAsync.combineWithAllErrors(closes)
      .map(() => undefined)
      .mapErr((failures) => Err.closeFailed('output allocator', failures));
  }

  private attach(group: ContainerGroup, keySegments: readonly string[]): void {
    const container = this.pendingAdoption ?? this.allocate(group.location.name, keySegments);
    group.addContainer(container);
    this.allocated.set(group.location.name, container);
    this.options.logger.debug(
      { location: group.location.name, containerId: container.id, adopted: this.pendingAdoption !== null },
      'Output container ready'
    );
  }

  private allocate(name: string, keySegments: readonly string[]): Container {
    const { backing } = this.options;
    if (backing.kind === 'memory') {
      return new MemoryContainer(name);
    }
    return new DirectoryContainer(nodePath.join(backing.root, ...keySegments), this.options.fs, { writable: true });
  }

  private newGroup(location: Location): ContainerGroup {
    return new ContainerGroup({
      location,
      fileKinds: this.options.fileKinds,
      suggestions: this.options.suggestions,
      logger: this.options.logger,
    });
  }

  private validate(location: Location, moduleName: string | undefined, operation: string): void {
    this.assertOpen(operation);

    if (!location.isOutput) {
      throw new WorkspaceFault(Err.configurationMisuse(location.name, operation, 'the location is not an output location'));
    }
    if (moduleName !== undefined && !location.isModuleOriented) {
      throw new WorkspaceFault(
        Err.configurationMisuse(location.name, operation, `module name "${moduleName}" given for a location that is not module-oriented`)
      );
    }
    if (moduleName === undefined && location.isModuleOriented) {
      throw new WorkspaceFault(
        Err.configurationMisuse(location.name, operation, 'a module name is required for a module-oriented location')
      );
    }
  }

  private assertOpen(operation: string): void {
    if (this._closed) {
      throw new WorkspaceFault(Err.postCloseUsage('output allocator', operation));
    }
  }
}
