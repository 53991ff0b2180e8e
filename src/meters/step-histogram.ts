/**
 * Per-step histogram accumulator shared by step timers and distribution
 * summaries.
 *
 * @module meters/step-histogram
 */

import type { Clock } from '../time/clock.js';
import type {
  CountAtBucket,
  DistributionConfig,
  HistogramSnapshot,
  ValueAtPercentile,
} from '../types/meter.js';
import { StepValue } from './step-value.js';
import { percentile } from '../util/percentile.js';

/**
 * Maximum samples kept per step for percentile estimation
 */
export const DEFAULT_MAX_SAMPLES = 10_000;

export const NO_HISTOGRAM: DistributionConfig = Object.freeze({
  percentiles: Object.freeze([]),
  serviceLevelObjectives: Object.freeze([]),
});

class StepAccumulator {
  count = 0;
  total = 0;
  min = Number.NaN;
  max = Number.NaN;
  /** Ring buffer of the most recent samples, used for percentiles only */
  private readonly samples: number[] = [];
  private nextSample = 0;
  /** Cumulative count per service level objective, same order as the bounds */
  private readonly bucketCounts: number[];
  private snapshot: HistogramSnapshot | undefined;

  constructor(
    private readonly distribution: DistributionConfig,
    private readonly maxSamples: number
  ) {
    this.bucketCounts = distribution.serviceLevelObjectives.map(() => 0);
  }

  record(value: number): void {
    this.count++;
    this.total += value;
    this.min = Number.isNaN(this.min) ? value : Math.min(this.min, value);
    this.max = Number.isNaN(this.max) ? value : Math.max(this.max, value);

    const bounds = this.distribution.serviceLevelObjectives;
    for (let i = 0; i < bounds.length; i++) {
      const bound = bounds[i];
      if (bound !== undefined && value <= bound) {
        this.bucketCounts[i] = (this.bucketCounts[i] ?? 0) + 1;
      }
    }

    if (this.distribution.percentiles.length > 0) {
      if (this.samples.length < this.maxSamples) {
        this.samples.push(value);
      } else {
        this.samples[this.nextSample] = value;
        this.nextSample = (this.nextSample + 1) % this.maxSamples;
      }
    }
  }

  /**
   * Computed once per completed step, then reused by every reader
   */
  toSnapshot(): HistogramSnapshot {
    if (this.snapshot) {
      return this.snapshot;
    }

    const sorted = [...this.samples].sort((a, b) => a - b);
    const percentileValues: ValueAtPercentile[] = this.distribution.percentiles.map((p) => ({
      percentile: p,
      value: sorted.length > 0 ? percentile(sorted, p * 100) : Number.NaN,
    }));
    const histogramCounts: CountAtBucket[] = this.distribution.serviceLevelObjectives.map((bucket, i) => ({
      bucket,
      count: this.bucketCounts[i] ?? 0,
    }));

    this.snapshot = Object.freeze({
      count: this.count,
      total: this.total,
      min: this.min,
      max: this.max,
      percentileValues: Object.freeze(percentileValues),
      histogramCounts: Object.freeze(histogramCounts),
    });
    return this.snapshot;
  }
}

export class StepHistogram {
  private current: StepAccumulator;
  private readonly step: StepValue<StepAccumulator>;

  constructor(
    clock: Clock,
    stepMs: number,
    private readonly distribution: DistributionConfig,
    private readonly maxSamples: number = DEFAULT_MAX_SAMPLES
  ) {
    this.current = this.newAccumulator();
    this.step = new StepValue(clock, stepMs, {
      drain: () => {
        const completed = this.current;
        this.current = this.newAccumulator();
        return completed;
      },
      empty: () => this.newAccumulator(),
    });
  }

  record(value: number): void {
    this.step.roll();
    this.current.record(value);
  }

  takeSnapshot(): HistogramSnapshot {
    return this.step.poll().toSnapshot();
  }

  closingRollover(): void {
    this.step.closingRollover();
  }

  private newAccumulator(): StepAccumulator {
    return new StepAccumulator(this.distribution, this.maxSamples);
  }
}
