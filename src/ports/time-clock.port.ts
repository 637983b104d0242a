/**
 * Time port.
 *
 * Diagnostic capture reads the clock through this port so tests can pin timestamps.
 *
 * Guarantees:
 * - Synchronous (capture happens on the reporting call)
 * - Injectable for testing
 */
export interface TimeClockPort {
  /**
   * Current time in milliseconds since Unix epoch.
   */
  nowMs(): number;

  /**
   * Current time in nanoseconds since Unix epoch (sub-millisecond precision where
   * the platform provides it).
   */
  nowNanos(): bigint;
}
