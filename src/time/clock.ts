/**
 * Clock abstraction so step boundaries and ticks can be driven in tests.
 *
 * @module time/clock
 */

export interface Clock {
  /** Epoch milliseconds */
  wallTime(): number;
  /** Monotonic milliseconds, only meaningful as a difference */
  monotonicTime(): number;
}

export const SYSTEM_CLOCK: Clock = {
  wallTime: () => Date.now(),
  monotonicTime: () => performance.now(),
};
