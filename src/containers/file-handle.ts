import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { FileNotFoundError, StorageError } from '../core/errors/index.js';
import { Err } from '../core/errors/index.js';
import type { GroupLocation } from '../workspace/location.js';
import type { RelativePath } from '../workspace/relative-path.js';
import type { FileKind, FileKindRules } from '../workspace/file-kind.js';
import { inferFileKind, pathToBinaryName } from '../workspace/file-kind.js';
import type { Container } from './container.js';

/**
 * A file found in a container group. Immutable once returned.
 */
export interface FileHandle {
  readonly location: GroupLocation;
  readonly container: Container;
  readonly relativePath: RelativePath;
  readonly kind: FileKind;
  readonly uri: string;
}

export function createFileHandle(
  location: GroupLocation,
  container: Container,
  relativePath: RelativePath,
  rules: FileKindRules
): FileHandle {
  return Object.freeze({
    location,
    container,
    relativePath,
    kind: inferFileKind(relativePath, rules),
    uri: container.uriFor(relativePath),
  });
}

export function sameFile(a: FileHandle, b: FileHandle): boolean {
  return a.container === b.container && a.relativePath === b.relativePath;
}

/**
 * Dotted name of a handle, e.g. `com/example/Foo.class` -> `com.example.Foo`.
 */
export function binaryNameOf(handle: FileHandle): string {
  return pathToBinaryName(handle.relativePath);
}

export function readFileHandle(handle: FileHandle): ResultAsync<Uint8Array, FileNotFoundError | StorageError> {
  return handle.container
    .read(handle.relativePath)
    .andThen((bytes) =>
      bytes === null
        ? errAsync(Err.fileNotFound(handle.location.name, handle.relativePath))
        : okAsync(bytes)
    );
}

const decoder = new TextDecoder('utf-8');

export function readFileHandleText(handle: FileHandle): ResultAsync<string, FileNotFoundError | StorageError> {
  return readFileHandle(handle).map((bytes) => decoder.decode(bytes));
}
