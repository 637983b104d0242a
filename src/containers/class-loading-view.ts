import { okAsync, type ResultAsync } from 'neverthrow';
import type { StorageError } from '../core/errors/index.js';
import { normalizeRelativePath, type RelativePath } from '../workspace/relative-path.js';
import { binaryNameToPath } from '../workspace/file-kind.js';
import type { ContainerGroup } from './container-group.js';
import type { FileHandle } from './file-handle.js';
import { binaryNameOf } from './file-handle.js';

/**
 * Capability to fetch compiled artifacts by fully-qualified name.
 */
export interface ByteSource {
  fetch(name: string): ResultAsync<Uint8Array | null, StorageError>;
}

/**
 * Live class-loading view over a container group.
 *
 * Names are resolved against the group's containers on every fetch, so bytes
 * written after the view was created are visible. Nothing is cached.
 */
export class ClassLoadingView implements ByteSource {
  constructor(
    private readonly group: ContainerGroup,
    private readonly classExtension: string
  ) {}

  fetch(name: string): ResultAsync<Uint8Array | null, StorageError> {
    return this.fetchResource(binaryNameToPath(name, this.classExtension));
  }

  fetchResource(path: string): ResultAsync<Uint8Array | null, StorageError> {
    const normalized = normalizeRelativePath(path);
    return normalized.isErr() ? okAsync(null) : this.readFirst(normalized.value);
  }

  /**
   * Names of every class artifact, first occurrence only, in container order.
   */
  listArtifacts(): ResultAsync<readonly string[], StorageError> {
    return this.group.listAll().map((handles) => {
      const names = new Set<string>();
      for (const handle of handles) {
        if (handle.kind === 'class') names.add(binaryNameOf(handle));
      }
      return [...names];
    });
  }

  private readFirst(path: RelativePath): ResultAsync<Uint8Array | null, StorageError> {
    return this.group
      .resolve(path)
      .andThen((handle: FileHandle | null) => (handle === null ? okAsync(null) : handle.container.read(handle.relativePath)));
  }
}
