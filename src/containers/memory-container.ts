import { okAsync, errAsync, ok, err, type Result, type ResultAsync } from 'neverthrow';
import type { InvalidPathError, StorageError } from '../core/errors/index.js';
import { Err } from '../core/errors/index.js';
import type { RelativePath } from '../workspace/relative-path.js';
import { normalizeRelativePath, parentSegments } from '../workspace/relative-path.js';
import type { Container, ContainerCapabilities } from './container.js';
import { assertContainerOpen, compareNames } from './container.js';

export type MemoryFiles = Readonly<Record<string, string | Uint8Array>>;

const encoder = new TextEncoder();

/**
 * In-memory tree. Default backing for output locations and for sources a test
 * declares inline.
 *
 * Bytes are copied on the way in and on the way out, so callers never share a
 * buffer with the container.
 */
export class MemoryContainer implements Container {
  readonly kind = 'memory' as const;
  readonly capabilities: ContainerCapabilities = { readable: true, writable: true };
  readonly id: string;

  private readonly files = new Map<RelativePath, Uint8Array>();
  private readonly directories = new Set<RelativePath>();
  private _closed = false;

  constructor(name: string) {
    this.id = `memory:${name}`;
  }

  /**
   * Create a container pre-populated with `files` (text is stored as UTF-8).
   */
  static withFiles(name: string, files: MemoryFiles = {}): Result<MemoryContainer, InvalidPathError> {
    const container = new MemoryContainer(name);

    for (const [rawPath, content] of Object.entries(files)) {
      const path = normalizeRelativePath(rawPath);
      if (path.isErr()) return err(path.error);

      const stored = container.put(path.value, typeof content === 'string' ? encoder.encode(content) : content);
      if (stored.isErr()) return err(Err.invalidPath(rawPath, stored.error.message));
    }

    return ok(container);
  }

  get closed(): boolean {
    return this._closed;
  }

  get fileCount(): number {
    return this.files.size;
  }

  exists(path: RelativePath): ResultAsync<boolean, StorageError> {
    assertContainerOpen(this, 'check a file');
    return okAsync(this.files.has(path));
  }

  read(path: RelativePath): ResultAsync<Uint8Array | null, StorageError> {
    assertContainerOpen(this, 'read a file');
    const bytes = this.files.get(path);
    return okAsync(bytes === undefined ? null : new Uint8Array(bytes));
  }

  write(path: RelativePath, bytes: Uint8Array): ResultAsync<void, StorageError> {
    assertContainerOpen(this, 'write a file');
    const stored = this.put(path, bytes);
    return stored.isOk() ? okAsync(undefined) : errAsync(stored.error);
  }

  listFiles(): ResultAsync<readonly RelativePath[], StorageError> {
    assertContainerOpen(this, 'list files');
    return okAsync([...this.files.keys()].sort(compareNames));
  }

  listDirectories(): ResultAsync<readonly string[], StorageError> {
    assertContainerOpen(this, 'list directories');
    return okAsync([...this.directories].filter((d) => !d.includes('/')).sort(compareNames));
  }

  uriFor(path: RelativePath): string {
    return `${this.id}/${path}`;
  }

  close(): ResultAsync<void, StorageError> {
    if (!this._closed) {
      this._closed = true;
      this.files.clear();
      this.directories.clear();
    }
    return okAsync(undefined);
  }

  private put(path: RelativePath, bytes: Uint8Array): Result<void, StorageError> {
    if (this.directories.has(path)) {
      return err(Err.backingStoreFailed(this.id, path, 'write', 'a directory already exists at this path'));
    }

    const parents: RelativePath[] = [];
    let current = '';
    for (const segment of parentSegments(path)) {
      current = current === '' ? segment : `${current}/${segment}`;
      const parent = current as RelativePath;
      if (this.files.has(parent)) {
        return err(Err.backingStoreFailed(this.id, path, 'write', `"${parent}" is a file, not a directory`));
      }
      parents.push(parent);
    }

    for (const parent of parents) {
      this.directories.add(parent);
    }
    this.files.set(path, new Uint8Array(bytes));
    return ok(undefined);
  }
}
