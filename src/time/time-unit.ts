/**
 * Time unit conversion.
 *
 * @module time/time-unit
 */

export type TimeUnit =
  | 'nanoseconds'
  | 'microseconds'
  | 'milliseconds'
  | 'seconds'
  | 'minutes'
  | 'hours'
  | 'days';

const NANOS_PER_UNIT: Record<TimeUnit, number> = {
  nanoseconds: 1,
  microseconds: 1e3,
  milliseconds: 1e6,
  seconds: 1e9,
  minutes: 60e9,
  hours: 3600e9,
  days: 86400e9,
};

/**
 * Unit the registry reports every time-based value in
 */
export const BASE_TIME_UNIT: TimeUnit = 'milliseconds';

/**
 * Convert a duration between units. Non-finite input passes through.
 */
export function convertTime(value: number, from: TimeUnit, to: TimeUnit): number {
  if (from === to) {
    return value;
  }
  return (value * NANOS_PER_UNIT[from]) / NANOS_PER_UNIT[to];
}
