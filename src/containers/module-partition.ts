import { ok, err, okAsync, ResultAsync, type Result } from 'neverthrow';
import type { CloseFailedError, ModuleNotFoundError, StorageError } from '../core/errors/index.js';
import { Err, WorkspaceFault } from '../core/errors/index.js';
import type { Logger } from '../core/logging/index.js';
import type { SuggestionConfig } from '../suggestions/index.js';
import { FuzzyMatcher } from '../suggestions/index.js';
import type { Location } from '../workspace/location.js';
import { moduleLocation } from '../workspace/location.js';
import type { RelativePath } from '../workspace/relative-path.js';
import type { FileKindRules } from '../workspace/file-kind.js';
import type { Container } from './container.js';
import { ContainerGroup } from './container-group.js';
import type { FileHandle } from './file-handle.js';
import { PrefixedContainer } from './prefixed-container.js';

export interface ModulePartitionOptions {
  readonly location: Location;
  readonly fileKinds: FileKindRules;
  readonly suggestions: SuggestionConfig;
  readonly logger: Logger;
  /** Called once for every module group the partition creates. */
  readonly onModuleCreated?: (group: ContainerGroup, moduleName: string) => void;
}

/**
 * Module name to container group, for a module-oriented location.
 *
 * Module names are compared exactly; no case folding or normalization.
 */
export class ModulePartition {
  readonly location: Location;

  private readonly modules = new Map<string, ContainerGroup>();
  private readonly roots: Container[] = [];
  private readonly matcher: FuzzyMatcher;
  private _closed = false;

  constructor(private readonly options: ModulePartitionOptions) {
    if (!options.location.isModuleOriented) {
      throw new WorkspaceFault(
        Err.configurationMisuse(options.location.name, 'create a module partition', 'the location is not module-oriented')
      );
    }
    this.location = options.location;
    this.matcher = new FuzzyMatcher(options.suggestions);
  }

  get closed(): boolean {
    return this._closed;
  }

  getOrCreateModule(moduleName: string): ContainerGroup {
    this.assertOpen('create a module');
    if (moduleName === '') {
      throw new WorkspaceFault(Err.configurationMisuse(this.location.name, 'create a module', 'module name is empty'));
    }

    const existing = this.modules.get(moduleName);
    if (existing !== undefined) return existing;

    const group = new ContainerGroup({
      location: moduleLocation(this.location, moduleName),
      fileKinds: this.options.fileKinds,
      suggestions: this.options.suggestions,
      logger: this.options.logger,
    });
    // Registered only once the callback accepted the group.
    this.options.onModuleCreated?.(group, moduleName);
    this.modules.set(moduleName, group);
    return group;
  }

  getModule(moduleName: string): ContainerGroup | null {
    this.assertOpen('look up a module');
    return this.modules.get(moduleName) ?? null;
  }

  hasModule(moduleName: string): boolean {
    return this.modules.has(moduleName);
  }

  /** Module names in creation order. */
  moduleNames(): readonly string[] {
    return [...this.modules.keys()];
  }

  isEmpty(): boolean {
    return this.modules.size === 0;
  }

  findModuleOrSuggest(moduleName: string): Result<ContainerGroup, ModuleNotFoundError> {
    const group = this.getModule(moduleName);
    if (group !== null) return ok(group);
    return err(Err.moduleNotFound(this.location.name, moduleName, this.matcher.suggestNames(moduleName, this.modules.keys())));
  }

  addModuleContainer(moduleName: string, container: Container): ContainerGroup {
    const group = this.getOrCreateModule(moduleName);
    group.addContainer(container);
    return group;
  }

  /**
   * Register every top-level directory of `root` as a module whose files live
   * under that directory. Returns the discovered module names.
   *
   * The partition owns `root` from this call on and closes it in `close`.
   * Modules are added all or nothing: when a discovered module's group no
   * longer accepts containers, no module is touched.
   */
  addModuleRoot(root: Container): ResultAsync<readonly string[], StorageError> {
    this.assertOpen('add a module root');
    if (root.closed) {
      throw new WorkspaceFault(Err.configurationMisuse(this.location.name, 'add a module root', `${root.id} is closed`));
    }
    this.roots.push(root);

    return root.listDirectories().map((names) => {
      this.assertOpen('add a module root');
      for (const name of names) {
        this.modules.get(name)?.assertCanAdd();
      }

      if (names.length === 0) {
        this.options.logger.warn({ location: this.location.name, containerId: root.id }, 'Module root contains no modules');
      }
      for (const name of names) {
        // Directory names come from a listing, so they are single valid segments.
        this.addModuleContainer(name, new PrefixedContainer(root, name as RelativePath));
      }
      return names;
    });
  }

  /** Every file of every module, in module creation order. */
  listAll(): ResultAsync<readonly FileHandle[], StorageError> {
    this.assertOpen('list files');
    return ResultAsync.combine([...this.modules.values()].map((g) => g.listAll())).map((lists) => lists.flat());
  }

  close(): ResultAsync<void, CloseFailedError> {
    if (this._closed) return okAsync(undefined);
    this._closed = true;

    const closes: ResultAsync<void, StorageError>[] = [
      ...[...this.modules.values()].map((g) => g.close()),
      ...this.roots.map((r) => r.close()),
    ];

    return ResultAsync.combineWithAllErrors(closes)
      .map(() => undefined)
      .mapErr((failures) => Err.closeFailed(this.location.name, failures));
  }

  private assertOpen(operation: string): void {
    if (this._closed) {
      throw new WorkspaceFault(Err.postCloseUsage(`module partition ${this.location.name}`, operation));
    }
  }
}
