import { unzipSync } from 'fflate';
import { ok, err, okAsync, errAsync, type Result, type ResultAsync } from 'neverthrow';
import type { StorageError } from '../core/errors/index.js';
import { Err } from '../core/errors/index.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { RelativePath } from '../workspace/relative-path.js';
import { normalizeRelativePath, parentSegments } from '../workspace/relative-path.js';
import type { Container, ContainerCapabilities } from './container.js';
import { assertContainerOpen, compareNames } from './container.js';

/**
 * A read-only zip archive, decompressed once when opened.
 *
 * Directory entries and entries whose names do not normalize are skipped.
 * When two entries normalize to the same path the first one wins.
 */
export class ArchiveContainer implements Container {
  readonly kind = 'archive' as const;
  readonly capabilities: ContainerCapabilities = { readable: true, writable: false };
  readonly id: string;

  private _closed = false;

  private constructor(
    readonly source: string,
    private readonly entries: Map<RelativePath, Uint8Array>,
    private readonly directories: Set<RelativePath>
  ) {
    this.id = `archive:${source}`;
  }

  static open(archivePath: string, fs: FileSystemPort): ResultAsync<ArchiveContainer, StorageError> {
    return fs
      .readFileBytes(archivePath)
      .mapErr((e): StorageError => Err.backingStoreFailed(`archive:${archivePath}`, archivePath, 'open', e.message))
      .andThen((bytes) => {
        const opened = ArchiveContainer.fromBytes(archivePath, bytes);
        return opened.isOk() ? okAsync(opened.value) : errAsync(opened.error);
      });
  }

  static fromBytes(source: string, bytes: Uint8Array): Result<ArchiveContainer, StorageError> {
    let unzipped: Record<string, Uint8Array>;
    try {
      unzipped = unzipSync(bytes);
    } catch (e) {
      const details = e instanceof Error ? e.message : String(e);
      return err(Err.backingStoreFailed(`archive:${source}`, source, 'open', `not a readable zip archive (${details})`));
    }

    const entries = new Map<RelativePath, Uint8Array>();
    const directories = new Set<RelativePath>();

    for (const [name, data] of Object.entries(unzipped)) {
      const path = normalizeRelativePath(name);
      if (path.isErr()) continue;

      if (name.endsWith('/')) {
        addWithParents(directories, [...parentSegments(path.value), lastSegment(path.value)]);
        continue;
      }
      if (entries.has(path.value)) continue;

      entries.set(path.value, data);
      addWithParents(directories, parentSegments(path.value));
    }

    return ok(new ArchiveContainer(source, entries, directories));
  }

  get closed(): boolean {
    return this._closed;
  }

  exists(path: RelativePath): ResultAsync<boolean, StorageError> {
    assertContainerOpen(this, 'check a file');
    return okAsync(this.entries.has(path));
  }

  read(path: RelativePath): ResultAsync<Uint8Array | null, StorageError> {
    assertContainerOpen(this, 'read a file');
    const data = this.entries.get(path);
    return okAsync(data === undefined ? null : new Uint8Array(data));
  }

  write(path: RelativePath, _bytes: Uint8Array): ResultAsync<void, StorageError> {
    assertContainerOpen(this, 'write a file');
    return errAsync(Err.containerReadOnly(this.id, path));
  }

  listFiles(): ResultAsync<readonly RelativePath[], StorageError> {
    assertContainerOpen(this, 'list files');
    return okAsync([...this.entries.keys()].sort(compareNames));
  }

  listDirectories(): ResultAsync<readonly string[], StorageError> {
    assertContainerOpen(this, 'list directories');
    return okAsync([...this.directories].filter((d) => !d.includes('/')).sort(compareNames));
  }

  uriFor(path: RelativePath): string {
    return `${this.id}!/${path}`;
  }

  close(): ResultAsync<void, StorageError> {
    this._closed = true;
    this.entries.clear();
    this.directories.clear();
    return okAsync(undefined);
  }
}

function lastSegment(path: RelativePath): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

function addWithParents(directories: Set<RelativePath>, segments: readonly string[]): void {
  let current = '';
  for (const segment of segments) {
    current = current === '' ? segment : `${current}/${segment}`;
    directories.add(current as RelativePath);
  }
}
