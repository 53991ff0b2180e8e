/**
 * Metric record and batch types.
 *
 * Records are the immutable unit emitted for one meter in one publish cycle.
 * Every record produced in a cycle carries the cycle's tick time as its
 * timestamp.
 */

import type { Attributes } from './common.js';

/**
 * Record kind discriminant
 */
export type MetricRecordKind = 'gauge' | 'count' | 'summary';

/**
 * Instantaneous value
 */
export interface GaugeRecord {
  readonly kind: 'gauge';
  readonly name: string;
  readonly value: number;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly attributes: Readonly<Attributes>;
}

/**
 * Monotonic cumulative total
 */
export interface CountRecord {
  readonly kind: 'count';
  readonly name: string;
  /** Cumulative total since the meter was created */
  readonly value: number;
  readonly timestamp: number;
  /** Length of the tick window this record was read in */
  readonly intervalMs: number;
  readonly attributes: Readonly<Attributes>;
}

/**
 * Aggregate over one step window
 */
export interface SummaryRecord {
  readonly kind: 'summary';
  readonly name: string;
  readonly count: number;
  readonly sum: number;
  /** Absent when the meter cannot report it */
  readonly min?: number;
  /** Absent when the meter cannot report it */
  readonly max?: number;
  readonly timestamp: number;
  readonly intervalMs: number;
  readonly attributes: Readonly<Attributes>;
}

export type MetricRecord = GaugeRecord | CountRecord | SummaryRecord;

/**
 * Records of one partition plus the attributes shared by all of them
 */
export interface MetricBatch {
  readonly records: readonly MetricRecord[];
  readonly commonAttributes: Readonly<Attributes>;
}

/**
 * Read-only view of the current tick window
 */
export interface TickWindow {
  /** Previous tick (epoch ms) */
  readonly start: number;
  /** Current tick (epoch ms); the timestamp of every record in the cycle */
  readonly end: number;
  readonly elapsedMs: number;
}
