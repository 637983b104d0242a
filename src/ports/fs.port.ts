import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_UNSUPPORTED'; readonly message: string };

export interface FsEntry {
  readonly name: string;
  readonly isDirectory: boolean;
}

export interface FsStat {
  readonly sizeBytes: number;
  readonly isDirectory: boolean;
}

/**
 * Port: Directory operations.
 * Used by: directory containers (output allocation, listing).
 */
export interface DirectoryOpsPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;

  /**
   * List directory entries (names only, not full paths) with their type.
   */
  readdir(dirPath: string): ResultAsync<readonly FsEntry[], FsError>;
}

/**
 * Port: File reading and metadata.
 * Used by: directory and archive containers.
 */
export interface FileReadPort {
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError>;
  stat(filePath: string): ResultAsync<FsStat, FsError>;
}

/**
 * Port: File writing.
 * Used by: writable directory containers.
 */
export interface FileWritePort {
  /**
   * Write file bytes, creating or truncating the file. Parent directories must exist.
   */
  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
}

/**
 * Composite port covering everything the on-disk backings need.
 */
export interface FileSystemPort extends DirectoryOpsPort, FileReadPort, FileWritePort {}
