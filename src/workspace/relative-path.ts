/**
 * Relative paths inside a container.
 *
 * Rules:
 * - `/` is the only separator; a backslash is an ordinary character
 * - leading `/`, empty and `.` segments are dropped, `..` removes the previous segment
 * - a path that normalizes to nothing, climbs above the root, or contains NUL is invalid
 *
 * An invalid path is never returned by a lookup or a listing and is rejected for writes.
 */

import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import type { InvalidPathError } from '../core/errors/index.js';
import { Err } from '../core/errors/index.js';

export type RelativePath = Brand<string, 'RelativePath'>;

export function normalizeRelativePath(raw: string): Result<RelativePath, InvalidPathError> {
  if (raw.includes('\u0000')) {
    return err(Err.invalidPath(raw, 'contains a NUL character'));
  }

  const segments: string[] = [];

  for (const segment of raw.split('/')) {
    if (segment === '' || segment === '.') continue;

    if (segment === '..') {
      if (segments.length === 0) {
        return err(Err.invalidPath(raw, 'climbs above the container root'));
      }
      segments.pop();
      continue;
    }

    segments.push(segment);
  }

  if (segments.length === 0) {
    return err(Err.invalidPath(raw, 'path is empty'));
  }

  return ok(segments.join('/') as RelativePath);
}

export function segmentsOf(path: RelativePath): readonly string[] {
  return path.split('/');
}

/**
 * Parent directory segments of a path (empty for a file at the root).
 */
export function parentSegments(path: RelativePath): readonly string[] {
  return segmentsOf(path).slice(0, -1);
}

export function fileNameOf(path: RelativePath): string {
  const segments = segmentsOf(path);
  return segments[segments.length - 1];
}

/**
 * Join a normalized prefix and a normalized path.
 */
export function joinRelative(prefix: RelativePath, path: RelativePath): RelativePath {
  return `${prefix}/${path}` as RelativePath;
}

/**
 * Strip `prefix/` from `path`, or return null when `path` is not beneath `prefix`.
 */
export function stripPrefix(prefix: RelativePath, path: RelativePath): RelativePath | null {
  const head = `${prefix}/`;
  return path.startsWith(head) ? (path.slice(head.length) as RelativePath) : null;
}
