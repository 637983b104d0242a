import type { Logger } from '../core/logging/index.js';
import type { Diagnostic } from './diagnostic.js';
import { DEFAULT_CONTEXT_LINES, SNIPPET_PADDING, renderSnippet } from './snippet-renderer.js';

/**
 * Human-readable form of a diagnostic:
 *
 *     [ERROR] compiler.err.expected Foo.java (at line 2, col 8)
 *
 *         <snippet>
 *
 *         ';' expected
 *
 * The snippet is included only when `sourceText` is given and the diagnostic
 * has a position.
 */
export function describeDiagnostic(
  diagnostic: Diagnostic,
  sourceText: string | null,
  contextLines: number = DEFAULT_CONTEXT_LINES
): string {
  let header = `[${diagnostic.kind.toUpperCase()}]`;
  if (diagnostic.code !== null && diagnostic.code !== '') {
    header += ` ${diagnostic.code}`;
  }
  if (diagnostic.source !== null) {
    header += ` ${diagnostic.source.name} (at line ${diagnostic.lineNumber}, col ${diagnostic.columnNumber})`;
  }

  const snippet = sourceText === null ? null : renderSnippet(sourceText, diagnostic, contextLines);
  const message = diagnostic.message
    .split('\n')
    .map((line) => `${SNIPPET_PADDING}${line}`)
    .join('\n');

  return snippet === null ? `${header}\n\n${message}` : `${header}\n\n${snippet}\n\n${message}`;
}

export interface DescribeOptions {
  readonly contextLines?: number;
  readonly logger?: Logger;
}

/**
 * Describe a diagnostic, reading its source for the snippet. A source that
 * cannot be read is logged and the snippet left out.
 */
export async function describeDiagnosticWithSource(
  diagnostic: Diagnostic,
  options: DescribeOptions = {}
): Promise<string> {
  const source = diagnostic.source;
  const text =
    source === null
      ? null
      : (await source.readText()).match(
          (value): string | null => value,
          (error) => {
            options.logger?.debug({ source: source.name, err: error }, 'Could not read diagnostic source');
            return null;
          }
        );

  return describeDiagnostic(diagnostic, text, options.contextLines);
}

/**
 * Describe every diagnostic of a log, separated by blank lines.
 */
export async function describeDiagnostics(
  diagnostics: readonly Diagnostic[],
  options: DescribeOptions = {}
): Promise<string> {
  const described: string[] = [];
  for (const d of diagnostics) {
    described.push(await describeDiagnosticWithSource(d, options));
  }
  return described.join('\n\n');
}
