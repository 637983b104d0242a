import { describe, it, expect } from 'vitest';
import { captureCallStack, formatCallStack, parseStackFrame } from '../../src/diagnostics/call-stack.js';

describe('parseStackFrame', () => {
  it('parses a named frame', () => {
    expect(parseStackFrame('    at Compiler.report (/src/compiler.ts:10:5)')).toEqual({
      functionName: 'Compiler.report',
      fileName: '/src/compiler.ts',
      lineNumber: 10,
      columnNumber: 5,
      raw: 'at Compiler.report (/src/compiler.ts:10:5)',
    });
  });

  it('parses an anonymous frame', () => {
    expect(parseStackFrame('    at /src/compiler.ts:3:1')).toEqual({
      functionName: null,
      fileName: '/src/compiler.ts',
      lineNumber: 3,
      columnNumber: 1,
      raw: 'at /src/compiler.ts:3:1',
    });
  });

  it('keeps colons inside file URLs', () => {
    const frame = parseStackFrame('    at new Widget (file:///app/widget.ts:1:2)');

    expect(frame.functionName).toBe('new Widget');
    expect(frame.fileName).toBe('file:///app/widget.ts');
  });

  it('keeps frames without a location as raw text', () => {
    expect(parseStackFrame('    at async Promise.all (index 0)')).toEqual({
      functionName: null,
      fileName: null,
      lineNumber: null,
      columnNumber: null,
      raw: 'at async Promise.all (index 0)',
    });
  });
});

describe('captureCallStack', () => {
  function reporter(depth: number) {
    return captureCallStack(reporter, depth);
  }

  it('starts below the given function and honours the depth', () => {
    const frames = reporter(3);

    expect(frames.length).toBeGreaterThan(0);
    expect(frames.length).toBeLessThanOrEqual(3);
    expect(frames.some((f) => f.functionName === 'reporter')).toBe(false);
  });

  it('captures nothing for a depth of zero', () => {
    expect(reporter(0)).toEqual([]);
  });
});

describe('formatCallStack', () => {
  it('prints one indented line per frame', () => {
    const frames = [parseStackFrame('at a (/a.ts:1:2)'), parseStackFrame('    at /b.ts:3:4')];

    expect(formatCallStack(frames)).toBe('    at a (/a.ts:1:2)\n    at /b.ts:3:4');
  });
});
