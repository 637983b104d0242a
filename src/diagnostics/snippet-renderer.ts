/**
 * Source snippets with a line-number gutter and carets under a span.
 *
 *     1 | class A {
 *     2 |   int x
 *       +       ^
 *     3 | }
 */

export const SNIPPET_PADDING = '    ';

export const DEFAULT_CONTEXT_LINES = 2;

export interface SnippetPosition {
  /** Zero-based offset of the first character of the span. */
  readonly startPosition: number;
  /** Zero-based offset just past the span. */
  readonly endPosition: number;
  /** One-based line containing `startPosition`. */
  readonly lineNumber: number;
}

interface SnippetLine {
  readonly number: number;
  readonly text: string;
  readonly caret: { readonly column: number; readonly width: number } | null;
}

/**
 * Render the lines around `position`, or null when the position is missing or
 * does not fit `content`.
 */
export function renderSnippet(
  content: string,
  position: SnippetPosition,
  contextLines: number = DEFAULT_CONTEXT_LINES
): string | null {
  const lines = snippetLines(content, position, contextLines);
  if (lines === null || lines.length === 0) return null;

  const width = String(lines[lines.length - 1].number).length;
  const gutterBlank = ' '.repeat(width);
  const out: string[] = [];

  for (const line of lines) {
    out.push(`${SNIPPET_PADDING}${String(line.number).padStart(width)} | ${line.text}`);
    if (line.caret !== null) {
      out.push(`${SNIPPET_PADDING}${gutterBlank} + ${' '.repeat(line.caret.column)}${'^'.repeat(line.caret.width)}`);
    }
  }

  return out.join('\n');
}

function snippetLines(content: string, position: SnippetPosition, contextLines: number): SnippetLine[] | null {
  const start = position.startPosition;
  const end = Math.min(position.endPosition, content.length);
  const { lineNumber } = position;

  if (!Number.isInteger(start) || !Number.isInteger(end) || !Number.isInteger(lineNumber)) return null;
  if (start < 0 || end < start || start > content.length || lineNumber < 1) return null;

  const firstLine = Math.max(1, lineNumber - Math.max(0, contextLines));
  const windowStart = indexOfLine(content, firstLine);
  if (windowStart === -1 || windowStart > start) return null;

  let windowEnd = end >= content.length || content[end] === '\n' ? end : indexOfEndOfLine(content, end);
  for (let i = 0; i < contextLines && windowEnd < content.length; i++) {
    windowEnd = indexOfEndOfLine(content, windowEnd + 1);
  }

  const texts = content.slice(windowStart, windowEnd).split('\n');
  const lines: SnippetLine[] = [];
  let lineStart = windowStart;

  texts.forEach((text, i) => {
    const lineEnd = lineStart + text.length;
    lines.push({ number: firstLine + i, text, caret: caretFor(start, end, lineStart, lineEnd) });
    lineStart = lineEnd + 1;
  });

  // The empty remainder after a final newline is not a line of its own unless the span is on it.
  const last = lines[lines.length - 1];
  if (lines.length > 1 && last.text === '' && last.caret === null) {
    lines.pop();
  }

  return lines;
}

function caretFor(
  start: number,
  end: number,
  lineStart: number,
  lineEnd: number
): SnippetLine['caret'] {
  const startsOnLine = start >= lineStart && start <= lineEnd;

  if (start === end) {
    return startsOnLine ? { column: start - lineStart, width: 1 } : null;
  }

  const from = Math.max(start, lineStart);
  const to = Math.min(end, lineEnd);
  if (from < to) return { column: from - lineStart, width: to - from };
  return startsOnLine ? { column: start - lineStart, width: 1 } : null;
}

/** Offset of the first character of one-based `line`, or -1 past the last line. */
function indexOfLine(content: string, line: number): number {
  let offset = 0;
  for (let current = 1; current < line; current++) {
    const newline = content.indexOf('\n', offset);
    if (newline === -1) return -1;
    offset = newline + 1;
  }
  return offset;
}

function indexOfEndOfLine(content: string, from: number): number {
  const newline = content.indexOf('\n', from);
  return newline === -1 ? content.length : newline;
}
