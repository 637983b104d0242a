export type { DiagnosticKind, Diagnostic, DiagnosticSource, StackFrame, TraceDiagnostic } from './diagnostic.js';
export { NOPOS, diagnostic, sourceFromHandle, inlineSource } from './diagnostic.js';
export { captureCallStack, parseStackFrame, formatCallStack } from './call-stack.js';
export { DiagnosticTraceCollector } from './diagnostic-trace-collector.js';
export type {
  CollectorState,
  DiagnosticTraceOptions,
  DiagnosticTraceCollectorDeps,
  DiagnosticListener,
} from './diagnostic-trace-collector.js';
export { renderSnippet, SNIPPET_PADDING, DEFAULT_CONTEXT_LINES } from './snippet-renderer.js';
export type { SnippetPosition } from './snippet-renderer.js';
export { describeDiagnostic, describeDiagnosticWithSource, describeDiagnostics } from './diagnostic-representation.js';
export type { DescribeOptions } from './diagnostic-representation.js';
