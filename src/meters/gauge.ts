/**
 * Function-backed gauges.
 *
 * @module meters/gauge
 */

import type { Gauge, MeterId, Measurement, TimeGauge } from '../types/meter.js';
import { BASE_TIME_UNIT, convertTime, type TimeUnit } from '../time/time-unit.js';

/**
 * Gauge that samples a function on every read
 */
export class DefaultGauge implements Gauge {
  readonly kind = 'gauge' as const;

  constructor(
    readonly id: MeterId,
    private readonly fn: () => number
  ) {}

  value(): number {
    return this.fn();
  }

  measure(): Measurement[] {
    return [{ statistic: 'value', value: this.value() }];
  }
}

/**
 * Gauge whose function reports a duration in `timeUnit`
 */
export class DefaultTimeGauge implements TimeGauge {
  readonly kind = 'timeGauge' as const;

  constructor(
    readonly id: MeterId,
    readonly timeUnit: TimeUnit,
    private readonly fn: () => number
  ) {}

  value(unit: TimeUnit): number {
    return convertTime(this.fn(), this.timeUnit, unit);
  }

  measure(): Measurement[] {
    return [{ statistic: 'value', value: this.value(BASE_TIME_UNIT) }];
  }
}
