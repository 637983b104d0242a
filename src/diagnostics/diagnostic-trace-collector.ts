import { Err, WorkspaceFault } from '../core/errors/index.js';
import type { Logger } from '../core/logging/index.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ThreadIdentityPort } from '../ports/thread-identity.port.js';
import type { Diagnostic, TraceDiagnostic } from './diagnostic.js';
import { captureCallStack, formatCallStack } from './call-stack.js';

export type CollectorState = 'open' | 'closed';

export interface DiagnosticTraceOptions {
  /** Log every recorded diagnostic. */
  readonly logging: boolean;
  /** Append the call stack to logged diagnostics. */
  readonly stackTraces: boolean;
  readonly stackDepth: number;
}

export interface DiagnosticTraceCollectorDeps {
  readonly clock: TimeClockPort;
  readonly threads: ThreadIdentityPort;
  readonly logger: Logger;
  readonly options: DiagnosticTraceOptions;
}

export type DiagnosticListener = (diagnostic: Diagnostic) => void;

/**
 * Append-only log of the diagnostics reported during one run.
 *
 * `record` captures time, thread and call stack synchronously on the reporting
 * call, so the trace describes the reporter rather than whoever drains the log.
 */
export class DiagnosticTraceCollector {
  private readonly entries: TraceDiagnostic[] = [];
  private _state: CollectorState = 'open';

  constructor(private readonly deps: DiagnosticTraceCollectorDeps) {}

  get state(): CollectorState {
    return this._state;
  }

  get size(): number {
    return this.entries.length;
  }

  record(diagnostic: Diagnostic): TraceDiagnostic {
    if (this._state === 'closed') {
      throw new WorkspaceFault(Err.postCloseUsage('diagnostic trace collector', 'record a diagnostic'));
    }

    const { clock, threads, options } = this.deps;
    const timestampMs = clock.nowMs();
    const timestampNanos = clock.nowNanos();
    const thread = threads.current();
    const callStack = Object.freeze(captureCallStack(this.record, options.stackDepth));

    const trace: TraceDiagnostic = Object.freeze({
      kind: diagnostic.kind,
      source: diagnostic.source,
      startPosition: diagnostic.startPosition,
      endPosition: diagnostic.endPosition,
      position: diagnostic.position,
      lineNumber: diagnostic.lineNumber,
      columnNumber: diagnostic.columnNumber,
      code: diagnostic.code,
      message: diagnostic.message,
      timestamp: new Date(timestampMs),
      timestampNanos,
      threadId: thread.threadId,
      threadName: thread.threadName,
      callStack,
    });

    this.entries.push(trace);
    if (options.logging) this.log(trace);
    return trace;
  }

  /** `record` bound as a plain callback, for compilers that take a listener. */
  listener(): DiagnosticListener {
    return (diagnostic) => {
      this.record(diagnostic);
    };
  }

  /** Snapshot of everything recorded so far, in append order. */
  drain(): readonly TraceDiagnostic[] {
    return Object.freeze([...this.entries]);
  }

  close(): void {
    this._state = 'closed';
  }

  private log(trace: TraceDiagnostic): void {
    const fields = {
      kind: trace.kind,
      code: trace.code,
      source: trace.source?.name ?? null,
      line: trace.lineNumber,
      column: trace.columnNumber,
      thread: trace.threadName,
    };
    const message = this.deps.options.stackTraces
      ? `${trace.message}\n${formatCallStack(trace.callStack)}`
      : trace.message;

    switch (trace.kind) {
      case 'error':
        this.deps.logger.error(fields, message);
        break;
      case 'warning':
      case 'mandatory_warning':
        this.deps.logger.warn(fields, message);
        break;
      default:
        this.deps.logger.info(fields, message);
    }
  }
}
