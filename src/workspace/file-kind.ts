/**
 * File kinds and binary-name mapping.
 *
 * Kind is inferred from the file extension:
 * - a configured source extension gives `source`
 * - a configured class extension gives `class`
 * - any other extension gives `resource`
 * - no extension gives `other`
 */

import type { RelativePath } from './relative-path.js';
import { fileNameOf, segmentsOf } from './relative-path.js';

export type FileKind = 'source' | 'class' | 'resource' | 'other';

export interface FileKindRules {
  readonly sourceExtensions: readonly string[];
  readonly classExtensions: readonly string[];
}

export const DEFAULT_FILE_KIND_RULES: FileKindRules = {
  sourceExtensions: ['.java'],
  classExtensions: ['.class'],
} as const;

function extensionOf(fileName: string): string | null {
  const dot = fileName.lastIndexOf('.');
  // A leading dot (".gitkeep") is a hidden file name, not an extension.
  return dot <= 0 ? null : fileName.slice(dot);
}

export function inferFileKind(path: RelativePath, rules: FileKindRules): FileKind {
  const extension = extensionOf(fileNameOf(path));

  if (extension === null) return 'other';
  if (rules.sourceExtensions.includes(extension)) return 'source';
  if (rules.classExtensions.includes(extension)) return 'class';
  return 'resource';
}

/**
 * `com.example.Foo` + `.class` -> `com/example/Foo.class`
 */
export function binaryNameToPath(binaryName: string, extension: string): string {
  return `${binaryName.split('.').join('/')}${extension}`;
}

/**
 * `com/example/Foo.class` -> `com.example.Foo`
 */
export function pathToBinaryName(path: RelativePath): string {
  const segments = [...segmentsOf(path)];
  const last = segments.pop() ?? '';
  const extension = extensionOf(last);
  const stem = extension === null ? last : last.slice(0, -extension.length);
  return [...segments, stem].join('.');
}

/**
 * Extension used when mapping binary names of the given kind to paths.
 */
export function primaryExtension(rules: FileKindRules, kind: 'source' | 'class'): string {
  const extensions = kind === 'source' ? rules.sourceExtensions : rules.classExtensions;
  return extensions[0];
}
