/**
 * In-memory fake for the filesystem port.
 *
 * - Absolute POSIX paths, `/` separated
 * - mkdirp tracks directories; writeFileBytes needs an existing parent
 * - `failNext` injects one failure for a path, for backing-store error tests
 */

import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { FileSystemPort, FsEntry, FsError, FsStat } from '../../src/ports/fs.port.js';

type FileSystemEntry = { kind: 'file'; bytes: Uint8Array } | { kind: 'dir' };

export class InMemoryFileSystem implements FileSystemPort {
  private readonly entries = new Map<string, FileSystemEntry>([['/', { kind: 'dir' }]]);
  private readonly failures = new Map<string, FsError>();

  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    const injected = this.takeFailure(dirPath);
    if (injected) return errAsync(injected);

    let current = '';
    for (const part of dirPath.split('/').filter((p) => p.length > 0)) {
      current += '/' + part;
      const entry = this.entries.get(current);
      if (entry === undefined) {
        this.entries.set(current, { kind: 'dir' });
      } else if (entry.kind !== 'dir') {
        return errAsync({ code: 'FS_IO_ERROR' as const, message: `Path exists and is not a directory: ${current}` });
      }
    }
    return okAsync(undefined);
  }

  readdir(dirPath: string): ResultAsync<readonly FsEntry[], FsError> {
    const injected = this.takeFailure(dirPath);
    if (injected) return errAsync(injected);

    const dir = trimSlash(dirPath);
    const entry = this.entries.get(dir);
    if (entry === undefined) return errAsync({ code: 'FS_NOT_FOUND' as const, message: `Directory not found: ${dirPath}` });
    if (entry.kind !== 'dir') return errAsync({ code: 'FS_UNSUPPORTED' as const, message: `Not a directory: ${dirPath}` });

    const prefix = dir === '/' ? '/' : `${dir}/`;
    const children: FsEntry[] = [];
    for (const [path, child] of this.entries) {
      if (path === dir || !path.startsWith(prefix)) continue;
      const rest = path.slice(prefix.length);
      if (rest.includes('/')) continue;
      children.push({ name: rest, isDirectory: child.kind === 'dir' });
    }
    return okAsync(children);
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    const injected = this.takeFailure(filePath);
    if (injected) return errAsync(injected);

    const entry = this.entries.get(trimSlash(filePath));
    if (entry === undefined) return errAsync({ code: 'FS_NOT_FOUND' as const, message: `File not found: ${filePath}` });
    if (entry.kind !== 'file') return errAsync({ code: 'FS_UNSUPPORTED' as const, message: `Path is a directory: ${filePath}` });
    return okAsync(new Uint8Array(entry.bytes));
  }

  stat(filePath: string): ResultAsync<FsStat, FsError> {
    const injected = this.takeFailure(filePath);
    if (injected) return errAsync(injected);

    const entry = this.entries.get(trimSlash(filePath));
    if (entry === undefined) return errAsync({ code: 'FS_NOT_FOUND' as const, message: `Path not found: ${filePath}` });
    return okAsync({
      sizeBytes: entry.kind === 'file' ? entry.bytes.length : 0,
      isDirectory: entry.kind === 'dir',
    });
  }

  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    const injected = this.takeFailure(filePath);
    if (injected) return errAsync(injected);

    const path = trimSlash(filePath);
    const parent = path.slice(0, path.lastIndexOf('/')) || '/';
    if (this.entries.get(parent)?.kind !== 'dir') {
      return errAsync({ code: 'FS_NOT_FOUND' as const, message: `Parent directory does not exist: ${parent}` });
    }
    if (this.entries.get(path)?.kind === 'dir') {
      return errAsync({ code: 'FS_UNSUPPORTED' as const, message: `Path is a directory: ${filePath}` });
    }

    this.entries.set(path, { kind: 'file', bytes: new Uint8Array(bytes) });
    return okAsync(undefined);
  }

  // ═══════════════════════════════════════════════════════════════════
  // Test Helpers
  // ═══════════════════════════════════════════════════════════════════

  /** Seed a file, creating its parent directories. */
  seed(filePath: string, content: string | Uint8Array): void {
    const path = trimSlash(filePath);
    let current = '';
    for (const part of path.split('/').filter((p) => p.length > 0).slice(0, -1)) {
      current += '/' + part;
      this.entries.set(current, { kind: 'dir' });
    }
    this.entries.set(path, {
      kind: 'file',
      bytes: typeof content === 'string' ? new TextEncoder().encode(content) : new Uint8Array(content),
    });
  }

  /** Fail the next operation on `path` with `error`. */
  failNext(path: string, error: FsError): void {
    this.failures.set(trimSlash(path), error);
  }

  fileText(filePath: string): string | null {
    const entry = this.entries.get(trimSlash(filePath));
    return entry?.kind === 'file' ? new TextDecoder().decode(entry.bytes) : null;
  }

  has(path: string): boolean {
    return this.entries.has(trimSlash(path));
  }

  private takeFailure(path: string): FsError | undefined {
    const key = trimSlash(path);
    const failure = this.failures.get(key);
    this.failures.delete(key);
    return failure;
  }
}

function trimSlash(path: string): string {
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
}
