/**
 * Serialization of metric batches to the metric ingest JSON schema:
 * `[{ common: { attributes }, metrics: [...] }]`.
 *
 * Count records carry a cumulative total, while the endpoint's `count` type
 * expects a delta. They are therefore sent as `gauge` metrics.
 *
 * @module client/payload
 */

import type { Attributes } from '../types/common.js';
import type { MetricBatch, MetricRecord } from '../types/record.js';

export interface GaugeMetricJson {
  name: string;
  type: 'gauge';
  value: number;
  timestamp: number;
  attributes: Attributes;
}

export interface SummaryMetricJson {
  name: string;
  type: 'summary';
  value: { count: number; sum: number; min?: number; max?: number };
  timestamp: number;
  'interval.ms': number;
  attributes: Attributes;
}

export type MetricJson = GaugeMetricJson | SummaryMetricJson;

export interface MetricPayloadEntry {
  common: { attributes: Attributes };
  metrics: MetricJson[];
}

export function toMetricJson(record: MetricRecord): MetricJson {
  switch (record.kind) {
    case 'gauge':
    case 'count':
      return {
        name: record.name,
        type: 'gauge',
        value: record.value,
        timestamp: record.timestamp,
        attributes: { ...record.attributes },
      };
    case 'summary': {
      const value: SummaryMetricJson['value'] = { count: record.count, sum: record.sum };
      if (record.min !== undefined) {
        value.min = record.min;
      }
      if (record.max !== undefined) {
        value.max = record.max;
      }
      return {
        name: record.name,
        type: 'summary',
        value,
        timestamp: record.timestamp,
        'interval.ms': record.intervalMs,
        attributes: { ...record.attributes },
      };
    }
  }
}

export function toPayload(batch: MetricBatch): MetricPayloadEntry[] {
  return [
    {
      common: { attributes: { ...batch.commonAttributes } },
      metrics: batch.records.map(toMetricJson),
    },
  ];
}
