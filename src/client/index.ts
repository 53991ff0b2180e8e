export type { TelemetryClient } from './telemetry-client.js';
export {
  toPayload,
  toMetricJson,
  type MetricJson,
  type GaugeMetricJson,
  type SummaryMetricJson,
  type MetricPayloadEntry,
} from './payload.js';
export {
  HttpTelemetryClient,
  DEFAULT_METRIC_URI,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  type HttpTelemetryClientOptions,
} from './http-telemetry-client.js';
