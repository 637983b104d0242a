import { okAsync, errAsync, ResultAsync } from 'neverthrow';
import type { CloseFailedError, FileNotFoundError, StorageError } from '../core/errors/index.js';
import { Err, WorkspaceFault } from '../core/errors/index.js';
import type { Logger } from '../core/logging/index.js';
import type { SuggestionConfig } from '../suggestions/index.js';
import { FuzzyMatcher } from '../suggestions/index.js';
import type { GroupLocation } from '../workspace/location.js';
import { normalizeRelativePath, type RelativePath } from '../workspace/relative-path.js';
import type { FileKindRules } from '../workspace/file-kind.js';
import { binaryNameToPath, primaryExtension } from '../workspace/file-kind.js';
import type { Container } from './container.js';
import type { FileHandle } from './file-handle.js';
import { createFileHandle, sameFile } from './file-handle.js';
import { ClassLoadingView } from './class-loading-view.js';

export interface ContainerGroupOptions {
  readonly location: GroupLocation;
  readonly fileKinds: FileKindRules;
  readonly suggestions: SuggestionConfig;
  readonly logger: Logger;
}

// Which group owns each container. A container belongs to exactly one group.
const owners = new WeakMap<Container, string>();

/**
 * Check that `container` can join a group: it is open and no group owns it.
 * `reject` receives the reason and must throw.
 */
export function assertAvailable(container: Container, reject: (details: string) => never): void {
  const owner = owners.get(container);
  if (owner !== undefined) {
    reject(`${container.id} already belongs to ${owner}`);
  }
  if (container.closed) {
    reject(`${container.id} is closed`);
  }
}

/**
 * Ordered containers bound to one location.
 *
 * Lookups search the containers in insertion order and the first hit wins;
 * results are never merged. The group is append-only until its first query,
 * after which it is sealed.
 */
export class ContainerGroup {
  readonly location: GroupLocation;

  private readonly members: Container[] = [];
  private readonly fileKinds: FileKindRules;
  private readonly matcher: FuzzyMatcher;
  private readonly logger: Logger;
  private view: ClassLoadingView | null = null;
  private sealed = false;
  private _closed = false;

  constructor(options: ContainerGroupOptions) {
    this.location = options.location;
    this.fileKinds = options.fileKinds;
    this.matcher = new FuzzyMatcher(options.suggestions);
    this.logger = options.logger;
  }

  get closed(): boolean {
    return this._closed;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Append a container. Throws WorkspaceFault once the group has been queried,
   * or when the container already belongs to a group.
   */
  addContainer(container: Container): void {
    this.assertCanAdd(container);

    owners.set(container, this.location.name);
    this.members.push(container);
    this.logger.debug({ location: this.location.name, containerId: container.id }, 'Added container');
  }

  /**
   * Throw the WorkspaceFault `addContainer` would throw, without adding
   * anything. Without a container only the group's own state is checked.
   */
  assertCanAdd(container?: Container): void {
    this.assertOpen('add a container');

    if (this.sealed) {
      this.misuse('add a container', 'the group is sealed; containers must be added before the first lookup');
    }
    if (container !== undefined) {
      assertAvailable(container, (details) => this.misuse('add a container', details));
    }
  }

  containers(): readonly Container[] {
    return [...this.members];
  }

  isEmpty(): boolean {
    return this.members.length === 0;
  }

  /**
   * First file at `path` across the containers, or null. An invalid path is a miss.
   */
  resolve(path: string): ResultAsync<FileHandle | null, StorageError> {
    this.beginQuery('resolve a file');

    const normalized = normalizeRelativePath(path);
    if (normalized.isErr()) return okAsync(null);

    return this.searchFrom(0, normalized.value);
  }

  /**
   * Resolve a dotted name (`a.b.C`) as a file of the given kind.
   */
  resolveBinaryName(binaryName: string, kind: 'source' | 'class'): ResultAsync<FileHandle | null, StorageError> {
    return this.resolve(binaryNameToPath(binaryName, primaryExtension(this.fileKinds, kind)));
  }

  /**
   * Every file of every container, in container order. Duplicates across
   * containers are kept.
   */
  listAll(): ResultAsync<readonly FileHandle[], StorageError> {
    this.beginQuery('list files');

    return ResultAsync.combine(
      this.members.map((container) =>
        container
          .listFiles()
          .map((paths) => paths.map((p) => createFileHandle(this.location, container, p, this.fileKinds)))
      )
    ).map((lists) => lists.flat());
  }

  contains(handle: FileHandle): ResultAsync<boolean, StorageError> {
    if (!this.members.includes(handle.container)) return okAsync(false);
    return this.resolve(handle.relativePath).map((found) => found !== null && sameFile(found, handle));
  }

  /**
   * Resolve `path`, turning a miss into FileNotFound with suggestions drawn
   * from every file in the group.
   */
  findFileOrSuggest(path: string): ResultAsync<FileHandle, FileNotFoundError | StorageError> {
    return this.resolve(path).andThen((handle) => {
      if (handle !== null) return okAsync(handle);

      return this.listAll().andThen((all) => {
        // The same path in several containers is suggested once.
        const paths = new Set(all.map((h) => h.relativePath));
        return errAsync(Err.fileNotFound(this.location.name, path, this.matcher.suggestPaths(path, paths)));
      });
    });
  }

  classLoadingView(): ClassLoadingView {
    this.assertOpen('open a class-loading view');
    if (this.view === null) {
      this.view = new ClassLoadingView(this, primaryExtension(this.fileKinds, 'class'));
    }
    return this.view;
  }

  /**
   * Close every container, best effort. Failures are aggregated.
   */
  close(): ResultAsync<void, CloseFailedError> {
    if (this._closed) return okAsync(undefined);
    this._closed = true;
    this.view = null;

    return ResultAsync.combineWithAllErrors(this.members.map((c) => c.close()))
      .map(() => undefined)
      .mapErr((failures) => Err.closeFailed(this.location.name, failures));
  }

  private searchFrom(index: number, path: RelativePath): ResultAsync<FileHandle | null, StorageError> {
    const container = this.members[index];
    if (container === undefined) return okAsync(null);

    return container
      .exists(path)
      .andThen((found) =>
        found
          ? okAsync(createFileHandle(this.location, container, path, this.fileKinds))
          : this.searchFrom(index + 1, path)
      );
  }

  private beginQuery(operation: string): void {
    this.assertOpen(operation);
    this.sealed = true;
  }

  private assertOpen(operation: string): void {
    if (this._closed) {
      throw new WorkspaceFault(Err.postCloseUsage(`container group ${this.location.name}`, operation));
    }
  }

  private misuse(operation: string, details: string): never {
    throw new WorkspaceFault(Err.configurationMisuse(this.location.name, operation, details));
  }
}

