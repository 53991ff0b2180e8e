import type { MetricBatch } from '../types/record.js';

/**
 * Destination for metric batches.
 *
 * `sendBatch` must not block the publish cycle: it accepts the batch and
 * returns. `shutdown` resolves once every accepted batch has been delivered
 * or has failed.
 */
export interface TelemetryClient {
  sendBatch(batch: MetricBatch): void;
  shutdown(): Promise<void>;
}
