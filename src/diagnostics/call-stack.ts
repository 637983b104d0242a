import type { StackFrame } from './diagnostic.js';

// "    at fn (file:line:col)" or "    at file:line:col"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;

export function parseStackFrame(line: string): StackFrame {
  const raw = line.trim();
  const match = FRAME_PATTERN.exec(line);
  if (match === null) {
    return { functionName: null, fileName: null, lineNumber: null, columnNumber: null, raw };
  }

  const [, functionName, fileName, lineNumber, columnNumber] = match;
  return {
    functionName: functionName ?? null,
    fileName,
    lineNumber: Number(lineNumber),
    columnNumber: Number(columnNumber),
    raw,
  };
}

/**
 * Frames of the current call stack, innermost first, starting at the caller of
 * `below`. At most `depth` frames are kept.
 */
export function captureCallStack(below: (...args: never[]) => unknown, depth: number): readonly StackFrame[] {
  if (depth <= 0) return [];

  const holder: { stack?: string } = {};
  const previousLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = depth;
  try {
    Error.captureStackTrace(holder, below);
  } finally {
    Error.stackTraceLimit = previousLimit;
  }

  return (holder.stack ?? '')
    .split('\n')
    .filter((line) => /^\s*at /.test(line))
    .slice(0, depth)
    .map(parseStackFrame);
}

export function formatCallStack(frames: readonly StackFrame[]): string {
  return frames.map((f) => `    at ${f.raw.replace(/^at /, '')}`).join('\n');
}
