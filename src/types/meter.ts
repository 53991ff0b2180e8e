/**
 * Meter types.
 *
 * Meters form a tagged union on `kind`. Anything the registry holds that is
 * not one of the dedicated shapes is an `other` meter and is read through
 * its generic measurements.
 */

import type { Tags } from './common.js';
import type { TimeUnit } from '../time/time-unit.js';

export type MeterKind =
  | 'gauge'
  | 'timeGauge'
  | 'counter'
  | 'functionCounter'
  | 'timer'
  | 'functionTimer'
  | 'distributionSummary'
  | 'longTaskTimer'
  | 'other';

/**
 * Identity of a meter
 */
export interface MeterId {
  readonly name: string;
  readonly tags: Readonly<Tags>;
  readonly description?: string;
  readonly baseUnit?: string;
}

export type Statistic =
  | 'value'
  | 'count'
  | 'total'
  | 'totalTime'
  | 'max'
  | 'activeTasks'
  | 'duration'
  | 'unknown';

/**
 * Generic reading exposed by every meter
 */
export interface Measurement {
  readonly statistic: Statistic;
  readonly value: number;
}

interface MeterBase<K extends MeterKind> {
  readonly kind: K;
  readonly id: MeterId;
  measure(): Measurement[];
}

export interface Gauge extends MeterBase<'gauge'> {
  value(): number;
}

export interface TimeGauge extends MeterBase<'timeGauge'> {
  readonly timeUnit: TimeUnit;
  value(unit: TimeUnit): number;
}

export interface Counter extends MeterBase<'counter'> {
  increment(amount?: number): void;
  count(): number;
}

export interface FunctionCounter extends MeterBase<'functionCounter'> {
  count(): number;
}

export interface ValueAtPercentile {
  /** Fraction in (0, 1] */
  readonly percentile: number;
  readonly value: number;
}

export interface CountAtBucket {
  /** Inclusive upper bound */
  readonly bucket: number;
  /** Observations less than or equal to the bound */
  readonly count: number;
}

/**
 * Consistent view of one completed step of a timer or distribution summary.
 * Timer snapshots are expressed in the timer's base time unit.
 */
export interface HistogramSnapshot {
  readonly count: number;
  readonly total: number;
  /** NaN when nothing was recorded */
  readonly min: number;
  readonly max: number;
  readonly percentileValues: readonly ValueAtPercentile[];
  readonly histogramCounts: readonly CountAtBucket[];
}

/**
 * Client-side histogram settings for timers and distribution summaries
 */
export interface DistributionConfig {
  /** Fractions in (0, 1] to publish as percentile gauges */
  readonly percentiles: readonly number[];
  /** Bucket upper bounds to publish as cumulative counts */
  readonly serviceLevelObjectives: readonly number[];
}

export interface Timer extends MeterBase<'timer'> {
  readonly baseTimeUnit: TimeUnit;
  readonly distribution: DistributionConfig;
  record(amount: number, unit: TimeUnit): void;
  recordCallable<T>(fn: () => T): T;
  count(): number;
  totalTime(unit: TimeUnit): number;
  max(unit: TimeUnit): number;
  takeSnapshot(): HistogramSnapshot;
}

/**
 * One consistent reading of a function timer, in its base time unit
 */
export interface FunctionTimerSnapshot {
  readonly count: number;
  readonly totalTime: number;
}

export interface FunctionTimer extends MeterBase<'functionTimer'> {
  readonly baseTimeUnit: TimeUnit;
  count(): number;
  totalTime(unit: TimeUnit): number;
  takeSnapshot(): FunctionTimerSnapshot;
}

export interface DistributionSummary extends MeterBase<'distributionSummary'> {
  readonly distribution: DistributionConfig;
  record(amount: number): void;
  count(): number;
  totalAmount(): number;
  max(): number;
  takeSnapshot(): HistogramSnapshot;
}

/**
 * Handle for one running long task
 */
export interface LongTaskSample {
  /** Stops the task and returns its duration in milliseconds */
  stop(): number;
  duration(unit: TimeUnit): number;
}

/**
 * Active tasks read at a single instant; durations in the base time unit
 */
export interface LongTaskTimerSnapshot {
  readonly activeTasks: number;
  readonly duration: number;
  readonly max: number;
}

export interface LongTaskTimer extends MeterBase<'longTaskTimer'> {
  readonly baseTimeUnit: TimeUnit;
  takeSnapshot(): LongTaskTimerSnapshot;
  start(): LongTaskSample;
  activeTasks(): number;
  duration(unit: TimeUnit): number;
  max(unit: TimeUnit): number;
}

export type OtherMeter = MeterBase<'other'>;

export type Meter =
  | Gauge
  | TimeGauge
  | Counter
  | FunctionCounter
  | Timer
  | FunctionTimer
  | DistributionSummary
  | LongTaskTimer
  | OtherMeter;

/**
 * Narrows a meter to one kind
 */
export function isMeterKind<K extends MeterKind>(
  meter: Meter,
  kind: K
): meter is Extract<Meter, { kind: K }> {
  return meter.kind === kind;
}
