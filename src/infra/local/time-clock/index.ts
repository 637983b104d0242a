import { performance } from 'perf_hooks';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';

const NANOS_PER_MS = 1_000_000n;

/**
 * Node clock adapter.
 *
 * Wall-clock origin from `performance.timeOrigin`, sub-millisecond part from the
 * high-resolution timer. Whole milliseconds and the fraction are converted
 * separately since epoch nanoseconds exceed the safe integer range.
 */
export class NodeTimeClock implements TimeClockPort {
  nowMs(): number {
    return Date.now();
  }

  nowNanos(): bigint {
    const ms = performance.timeOrigin + performance.now();
    const wholeMs = Math.floor(ms);
    const fractionNanos = Math.min(999_999, Math.round((ms - wholeMs) * 1e6));
    return BigInt(wholeMs) * NANOS_PER_MS + BigInt(fractionNanos);
  }
}
