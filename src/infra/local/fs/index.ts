import * as fs from 'fs/promises';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FileSystemPort, FsEntry, FsError, FsStat } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  // Node errors expose a string `code` property; treat it as best-effort.
  const code = (e as { readonly code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  if (code === 'EISDIR' || code === 'ENOTDIR') return { code: 'FS_UNSUPPORTED', message: `Wrong entry type at ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  readdir(dirPath: string): ResultAsync<readonly FsEntry[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath, { withFileTypes: true }), (e) => mapFsError(e, dirPath)).map((entries) =>
      entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }))
    );
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(fs.readFile(filePath), (e) => mapFsError(e, filePath)).map((b) => new Uint8Array(b));
  }

  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.writeFile(filePath, Buffer.from(bytes)), (e) => mapFsError(e, filePath));
  }

  stat(filePath: string): ResultAsync<FsStat, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map((s) => ({
      sizeBytes: s.size,
      isDirectory: s.isDirectory(),
    }));
  }
}
