import { okAsync, type ResultAsync } from 'neverthrow';
import type { StorageError } from '../core/errors/index.js';
import type { RelativePath } from '../workspace/relative-path.js';
import { joinRelative, segmentsOf, stripPrefix } from '../workspace/relative-path.js';
import type { Container, ContainerKind, ContainerCapabilities } from './container.js';
import { assertContainerOpen, compareNames } from './container.js';

/**
 * View of one subdirectory of another container, used when a module root is
 * split into one container per module.
 *
 * Closing the view leaves the parent open; whoever added the root closes it.
 */
export class PrefixedContainer implements Container {
  readonly id: string;
  readonly kind: ContainerKind;
  readonly capabilities: ContainerCapabilities;

  private _closed = false;

  constructor(
    private readonly parent: Container,
    readonly prefix: RelativePath
  ) {
    this.id = `${parent.id}/${prefix}`;
    this.kind = parent.kind;
    this.capabilities = parent.capabilities;
  }

  get closed(): boolean {
    return this._closed || this.parent.closed;
  }

  exists(path: RelativePath): ResultAsync<boolean, StorageError> {
    assertContainerOpen(this, 'check a file');
    return this.parent.exists(joinRelative(this.prefix, path));
  }

  read(path: RelativePath): ResultAsync<Uint8Array | null, StorageError> {
    assertContainerOpen(this, 'read a file');
    return this.parent.read(joinRelative(this.prefix, path));
  }

  write(path: RelativePath, bytes: Uint8Array): ResultAsync<void, StorageError> {
    assertContainerOpen(this, 'write a file');
    return this.parent.write(joinRelative(this.prefix, path), bytes);
  }

  listFiles(): ResultAsync<readonly RelativePath[], StorageError> {
    assertContainerOpen(this, 'list files');
    return this.parent.listFiles().map((paths) =>
      paths.flatMap((p) => {
        const stripped = stripPrefix(this.prefix, p);
        return stripped === null ? [] : [stripped];
      })
    );
  }

  // Derived from files, so empty subdirectories are not reported.
  listDirectories(): ResultAsync<readonly string[], StorageError> {
    return this.listFiles().map((paths) => {
      const names = new Set<string>();
      for (const p of paths) {
        const segments = segmentsOf(p);
        if (segments.length > 1) names.add(segments[0]);
      }
      return [...names].sort(compareNames);
    });
  }

  uriFor(path: RelativePath): string {
    return this.parent.uriFor(joinRelative(this.prefix, path));
  }

  close(): ResultAsync<void, StorageError> {
    this._closed = true;
    return okAsync(undefined);
  }
}

