import { okAsync, type ResultAsync } from 'neverthrow';
import type { FileNotFoundError, StorageError } from '../core/errors/index.js';
import type { FileHandle } from '../containers/file-handle.js';
import { readFileHandleText } from '../containers/file-handle.js';

export type DiagnosticKind = 'error' | 'warning' | 'mandatory_warning' | 'note' | 'other';

/** Marker for a position the reporter did not provide. */
export const NOPOS = -1;

/**
 * Where a diagnostic points: a display name and a way to read the text.
 */
export interface DiagnosticSource {
  readonly name: string;
  readonly handle: FileHandle | null;
  readText(): ResultAsync<string, FileNotFoundError | StorageError>;
}

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly source: DiagnosticSource | null;
  /** Offsets are zero-based character offsets into the source text. */
  readonly startPosition: number;
  readonly endPosition: number;
  readonly position: number;
  /** One-based. */
  readonly lineNumber: number;
  /** One-based. */
  readonly columnNumber: number;
  readonly code: string | null;
  readonly message: string;
}

export interface StackFrame {
  readonly functionName: string | null;
  readonly fileName: string | null;
  readonly lineNumber: number | null;
  readonly columnNumber: number | null;
  /** The frame as the runtime printed it. */
  readonly raw: string;
}

/**
 * A diagnostic plus where and when it was reported.
 */
export interface TraceDiagnostic extends Diagnostic {
  readonly timestamp: Date;
  readonly timestampNanos: bigint;
  readonly threadId: number;
  readonly threadName: string;
  readonly callStack: readonly StackFrame[];
}

export function sourceFromHandle(handle: FileHandle): DiagnosticSource {
  return {
    name: handle.relativePath,
    handle,
    readText: () => readFileHandleText(handle),
  };
}

export function inlineSource(name: string, text: string): DiagnosticSource {
  return {
    name,
    handle: null,
    readText: () => okAsync(text),
  };
}

/**
 * Fill in the optional parts of a diagnostic with NOPOS and nulls.
 */
export function diagnostic(
  input: Pick<Diagnostic, 'kind' | 'message'> & Partial<Omit<Diagnostic, 'kind' | 'message'>>
): Diagnostic {
  return {
    kind: input.kind,
    source: input.source ?? null,
    startPosition: input.startPosition ?? NOPOS,
    endPosition: input.endPosition ?? NOPOS,
    position: input.position ?? input.startPosition ?? NOPOS,
    lineNumber: input.lineNumber ?? NOPOS,
    columnNumber: input.columnNumber ?? NOPOS,
    code: input.code ?? null,
    message: input.message,
  };
}
