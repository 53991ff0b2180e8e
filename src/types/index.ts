/**
 * Type definitions for the metric batch registry.
 */

export type { AttributeValue, Attributes, Tags } from './common.js';
export type {
  MetricRecordKind,
  GaugeRecord,
  CountRecord,
  SummaryRecord,
  MetricRecord,
  MetricBatch,
  TickWindow,
} from './record.js';
export type {
  MeterKind,
  MeterId,
  Statistic,
  Measurement,
  Gauge,
  TimeGauge,
  Counter,
  FunctionCounter,
  ValueAtPercentile,
  CountAtBucket,
  HistogramSnapshot,
  DistributionConfig,
  Timer,
  FunctionTimer,
  FunctionTimerSnapshot,
  DistributionSummary,
  LongTaskSample,
  LongTaskTimer,
  LongTaskTimerSnapshot,
  OtherMeter,
  Meter,
} from './meter.js';
export { isMeterKind } from './meter.js';
