import type { ResultAsync } from 'neverthrow';
import type { StorageError } from '../core/errors/index.js';
import { Err, WorkspaceFault } from '../core/errors/index.js';
import type { RelativePath } from '../workspace/relative-path.js';

export type ContainerKind = 'directory' | 'archive' | 'memory';

export interface ContainerCapabilities {
  readonly readable: boolean;
  readonly writable: boolean;
}

/**
 * One backing root: a directory tree, an archive, or an in-memory tree.
 *
 * Paths are relative to the container's own root and already normalized.
 * Every operation on a closed container throws a WorkspaceFault.
 */
export interface Container {
  readonly id: string;
  readonly kind: ContainerKind;
  readonly capabilities: ContainerCapabilities;
  readonly closed: boolean;

  /** True when a regular file exists at `path`. */
  exists(path: RelativePath): ResultAsync<boolean, StorageError>;

  /** File bytes, or null when no regular file exists at `path`. */
  read(path: RelativePath): ResultAsync<Uint8Array | null, StorageError>;

  /** Create or replace a file, creating every missing parent segment. */
  write(path: RelativePath, bytes: Uint8Array): ResultAsync<void, StorageError>;

  /** Every regular file beneath the root, sorted. */
  listFiles(): ResultAsync<readonly RelativePath[], StorageError>;

  /** Names of the directories directly beneath the root, sorted. */
  listDirectories(): ResultAsync<readonly string[], StorageError>;

  uriFor(path: RelativePath): string;

  /** Release the backing storage. Closing twice is a no-op. */
  close(): ResultAsync<void, StorageError>;
}

export function assertContainerOpen(container: Container, operation: string): void {
  if (container.closed) {
    throw new WorkspaceFault(Err.postCloseUsage(container.id, operation));
  }
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
