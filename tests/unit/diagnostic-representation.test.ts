import { describe, it, expect } from 'vitest';
import { errAsync } from 'neverthrow';
import {
  describeDiagnostic,
  describeDiagnosticWithSource,
  describeDiagnostics,
} from '../../src/diagnostics/diagnostic-representation.js';
import { diagnostic, inlineSource, type DiagnosticSource } from '../../src/diagnostics/diagnostic.js';
import { Err } from '../../src/core/errors/index.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';

const content = 'class A {\n  int x\n}';
const snippet = ['    1 | class A {', '    2 |   int x', '      +       ^', '    3 | }'].join('\n');

const expected = diagnostic({
  kind: 'error',
  code: 'compiler.err.expected',
  source: inlineSource('A.java', content),
  startPosition: 16,
  endPosition: 17,
  lineNumber: 2,
  columnNumber: 7,
  message: "';' expected",
});

describe('describeDiagnostic', () => {
  it('combines header, snippet and indented message', () => {
    expect(describeDiagnostic(expected, content)).toBe(
      `[ERROR] compiler.err.expected A.java (at line 2, col 7)\n\n${snippet}\n\n    ';' expected`
    );
  });

  it('leaves the snippet out without source text', () => {
    expect(describeDiagnostic(expected, null)).toBe(
      "[ERROR] compiler.err.expected A.java (at line 2, col 7)\n\n    ';' expected"
    );
  });

  it('indents every line of a diagnostic without source or code', () => {
    const note = diagnostic({ kind: 'note', message: 'line one\nline two' });

    expect(describeDiagnostic(note, null)).toBe('[NOTE]\n\n    line one\n    line two');
  });

  it('upper-cases the kind', () => {
    expect(describeDiagnostic(diagnostic({ kind: 'mandatory_warning', message: 'm' }), null)).toBe(
      '[MANDATORY_WARNING]\n\n    m'
    );
  });
});

describe('describeDiagnosticWithSource', () => {
  it('reads the source for the snippet', async () => {
    expect(await describeDiagnosticWithSource(expected)).toBe(describeDiagnostic(expected, content));
  });

  it('logs and skips a source that cannot be read', async () => {
    const loggers = new FakeLoggerFactory();
    const missing: DiagnosticSource = {
      name: 'Gone.java',
      handle: null,
      readText: () => errAsync(Err.fileNotFound('SOURCE_PATH', 'Gone.java')),
    };
    const d = diagnostic({ kind: 'warning', source: missing, startPosition: 0, endPosition: 1, lineNumber: 1, columnNumber: 1, message: 'w' });

    expect(await describeDiagnosticWithSource(d, { logger: loggers.create('Describe') })).toBe(
      '[WARNING] Gone.java (at line 1, col 1)\n\n    w'
    );
    expect(loggers.sink.hasEntry('debug', 'Could not read diagnostic source')).toBe(true);
  });
});

describe('describeDiagnostics', () => {
  it('separates diagnostics with a blank line', async () => {
    const first = diagnostic({ kind: 'note', message: 'first' });
    const second = diagnostic({ kind: 'other', message: 'second' });

    expect(await describeDiagnostics([first, second])).toBe('[NOTE]\n\n    first\n\n[OTHER]\n\n    second');
  });

  it('describes an empty log as an empty string', async () => {
    expect(await describeDiagnostics([])).toBe('');
  });
});
