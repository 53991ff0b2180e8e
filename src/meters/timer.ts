/**
 * Step timer. Durations are accumulated per step in milliseconds; reads
 * return the last completed step.
 *
 * @module meters/timer
 */

import type {
  DistributionConfig,
  HistogramSnapshot,
  MeterId,
  Measurement,
  Timer,
} from '../types/meter.js';
import type { Clock } from '../time/clock.js';
import { BASE_TIME_UNIT, convertTime, type TimeUnit } from '../time/time-unit.js';
import { StepHistogram } from './step-histogram.js';
import type { StepMeter } from './step-value.js';

export class StepTimer implements Timer, StepMeter {
  readonly kind = 'timer' as const;
  readonly baseTimeUnit: TimeUnit = BASE_TIME_UNIT;
  private readonly histogram: StepHistogram;

  constructor(
    readonly id: MeterId,
    private readonly clock: Clock,
    stepMs: number,
    readonly distribution: DistributionConfig
  ) {
    this.histogram = new StepHistogram(clock, stepMs, distribution);
  }

  /**
   * Negative and non-finite durations are ignored
   */
  record(amount: number, unit: TimeUnit): void {
    if (!Number.isFinite(amount) || amount < 0) {
      return;
    }
    this.histogram.record(convertTime(amount, unit, this.baseTimeUnit));
  }

  recordCallable<T>(fn: () => T): T {
    const start = this.clock.monotonicTime();
    try {
      return fn();
    } finally {
      this.record(this.clock.monotonicTime() - start, 'milliseconds');
    }
  }

  count(): number {
    return this.takeSnapshot().count;
  }

  totalTime(unit: TimeUnit): number {
    return convertTime(this.takeSnapshot().total, this.baseTimeUnit, unit);
  }

  max(unit: TimeUnit): number {
    const { max } = this.takeSnapshot();
    return Number.isNaN(max) ? 0 : convertTime(max, this.baseTimeUnit, unit);
  }

  takeSnapshot(): HistogramSnapshot {
    return this.histogram.takeSnapshot();
  }

  closingRollover(): void {
    this.histogram.closingRollover();
  }

  measure(): Measurement[] {
    const snapshot = this.takeSnapshot();
    return [
      { statistic: 'count', value: snapshot.count },
      { statistic: 'totalTime', value: snapshot.total },
      { statistic: 'max', value: Number.isNaN(snapshot.max) ? 0 : snapshot.max },
    ];
  }
}
