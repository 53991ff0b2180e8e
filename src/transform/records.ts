/**
 * Record factories. Each returns undefined when the value it would carry is
 * not finite; optional summary fields are dropped individually.
 *
 * @module transform/records
 */

import type { Attributes } from '../types/common.js';
import type { CountRecord, GaugeRecord, SummaryRecord, TickWindow } from '../types/record.js';

export function gaugeRecord(
  name: string,
  value: number,
  window: TickWindow,
  attributes: Readonly<Attributes>
): GaugeRecord | undefined {
  if (!Number.isFinite(value)) {
    return undefined;
  }
  const record: GaugeRecord = { kind: 'gauge', name, value, timestamp: window.end, attributes };
  return Object.freeze(record);
}

export function countRecord(
  name: string,
  value: number,
  window: TickWindow,
  attributes: Readonly<Attributes>
): CountRecord | undefined {
  if (!Number.isFinite(value)) {
    return undefined;
  }
  const record: CountRecord = {
    kind: 'count',
    name,
    value,
    timestamp: window.end,
    intervalMs: window.elapsedMs,
    attributes,
  };
  return Object.freeze(record);
}

export interface SummaryValues {
  count: number;
  sum: number;
  min?: number;
  max?: number;
}

export function summaryRecord(
  name: string,
  values: SummaryValues,
  window: TickWindow,
  attributes: Readonly<Attributes>
): SummaryRecord | undefined {
  if (!Number.isFinite(values.count) || !Number.isFinite(values.sum)) {
    return undefined;
  }

  const record: {
    kind: 'summary';
    name: string;
    count: number;
    sum: number;
    min?: number;
    max?: number;
    timestamp: number;
    intervalMs: number;
    attributes: Readonly<Attributes>;
  } = {
    kind: 'summary',
    name,
    count: values.count,
    sum: values.sum,
    timestamp: window.end,
    intervalMs: window.elapsedMs,
    attributes,
  };
  if (values.min !== undefined && Number.isFinite(values.min)) {
    record.min = values.min;
  }
  if (values.max !== undefined && Number.isFinite(values.max)) {
    record.max = values.max;
  }
  return Object.freeze(record);
}

/**
 * Drop the records a factory declined to build
 */
export function compact<T>(records: ReadonlyArray<T | undefined>): T[] {
  return records.filter((record): record is T => record !== undefined);
}
