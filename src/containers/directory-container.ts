import * as nodePath from 'path';
import { pathToFileURL } from 'url';
import { okAsync, errAsync, ResultAsync } from 'neverthrow';
import type { StorageError, StorageOperation } from '../core/errors/index.js';
import { Err } from '../core/errors/index.js';
import type { FileSystemPort, FsError } from '../ports/fs.port.js';
import type { RelativePath } from '../workspace/relative-path.js';
import { segmentsOf } from '../workspace/relative-path.js';
import type { Container, ContainerCapabilities } from './container.js';
import { assertContainerOpen, compareNames } from './container.js';

export interface DirectoryContainerOptions {
  readonly writable?: boolean;
}

/**
 * A directory on disk. A root that does not exist yet lists as empty; writes
 * create it.
 */
export class DirectoryContainer implements Container {
  readonly kind = 'directory' as const;
  readonly id: string;
  readonly capabilities: ContainerCapabilities;
  readonly root: string;

  private _closed = false;

  constructor(
    root: string,
    private readonly fs: FileSystemPort,
    options: DirectoryContainerOptions = {}
  ) {
    this.root = nodePath.resolve(root);
    this.id = `directory:${this.root}`;
    this.capabilities = { readable: true, writable: options.writable ?? false };
  }

  get closed(): boolean {
    return this._closed;
  }

  exists(path: RelativePath): ResultAsync<boolean, StorageError> {
    assertContainerOpen(this, 'check a file');
    return this.fs
      .stat(this.absolute(path))
      .map((stat) => !stat.isDirectory)
      .orElse((e) => (isMissing(e) ? okAsync(false) : errAsync(this.fail('stat', path, e))));
  }

  read(path: RelativePath): ResultAsync<Uint8Array | null, StorageError> {
    assertContainerOpen(this, 'read a file');
    return this.fs
      .readFileBytes(this.absolute(path))
      .map((bytes): Uint8Array | null => bytes)
      .orElse((e) => (isMissing(e) ? okAsync(null) : errAsync(this.fail('read', path, e))));
  }

  write(path: RelativePath, bytes: Uint8Array): ResultAsync<void, StorageError> {
    assertContainerOpen(this, 'write a file');
    if (!this.capabilities.writable) {
      return errAsync(Err.containerReadOnly(this.id, path));
    }

    const target = this.absolute(path);
    return this.fs
      .mkdirp(nodePath.dirname(target))
      .andThen(() => this.fs.writeFileBytes(target, bytes))
      .mapErr((e) => this.fail('write', path, e));
  }

  listFiles(): ResultAsync<readonly RelativePath[], StorageError> {
    assertContainerOpen(this, 'list files');
    return this.walk([]);
  }

  listDirectories(): ResultAsync<readonly string[], StorageError> {
    assertContainerOpen(this, 'list directories');
    return this.fs
      .readdir(this.root)
      .map((entries) => entries.filter((e) => e.isDirectory).map((e) => e.name).sort(compareNames))
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync([]) : errAsync(this.fail('list', '.', e))));
  }

  uriFor(path: RelativePath): string {
    return pathToFileURL(this.absolute(path)).href;
  }

  close(): ResultAsync<void, StorageError> {
    this._closed = true;
    return okAsync(undefined);
  }

  private absolute(path: RelativePath): string {
    return nodePath.join(this.root, ...segmentsOf(path));
  }

  private walk(segments: readonly string[]): ResultAsync<RelativePath[], StorageError> {
    const relative = segments.join('/');

    return this.fs
      .readdir(nodePath.join(this.root, ...segments))
      .orElse((e) => (segments.length === 0 && e.code === 'FS_NOT_FOUND' ? okAsync([]) : errAsync(e)))
      .mapErr((e) => this.fail('list', relative === '' ? '.' : relative, e))
      .andThen((entries) => {
        const sorted = [...entries].sort((a, b) => compareNames(a.name, b.name));
        const children = sorted.map((entry) =>
          entry.isDirectory
            ? this.walk([...segments, entry.name])
            : okAsync<RelativePath[], StorageError>([[...segments, entry.name].join('/') as RelativePath])
        );
        return ResultAsync.combine(children).map((lists) => lists.flat());
      });
  }

  private fail(operation: StorageOperation, path: string, error: FsError): StorageError {
    return Err.backingStoreFailed(this.id, path, operation, error.message);
  }
}

// Reading a directory as a file reports FS_UNSUPPORTED; it is not a file either way.
function isMissing(error: FsError): boolean {
  return error.code === 'FS_NOT_FOUND' || error.code === 'FS_UNSUPPORTED';
}
