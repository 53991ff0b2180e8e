/**
 * Step distribution summary.
 *
 * @module meters/distribution-summary
 */

import type {
  DistributionConfig,
  DistributionSummary,
  HistogramSnapshot,
  MeterId,
  Measurement,
} from '../types/meter.js';
import type { Clock } from '../time/clock.js';
import { StepHistogram } from './step-histogram.js';
import type { StepMeter } from './step-value.js';

export class StepDistributionSummary implements DistributionSummary, StepMeter {
  readonly kind = 'distributionSummary' as const;
  private readonly histogram: StepHistogram;

  constructor(
    readonly id: MeterId,
    clock: Clock,
    stepMs: number,
    readonly distribution: DistributionConfig
  ) {
    this.histogram = new StepHistogram(clock, stepMs, distribution);
  }

  /**
   * Negative and non-finite amounts are ignored
   */
  record(amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) {
      return;
    }
    this.histogram.record(amount);
  }

  count(): number {
    return this.takeSnapshot().count;
  }

  totalAmount(): number {
    return this.takeSnapshot().total;
  }

  max(): number {
    const { max } = this.takeSnapshot();
    return Number.isNaN(max) ? 0 : max;
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
      { statistic: 'total', value: snapshot.total },
      { statistic: 'max', value: Number.isNaN(snapshot.max) ? 0 : snapshot.max },
    ];
  }
}
