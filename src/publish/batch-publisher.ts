/**
 * Publish cycle: read the meters, split them into groups of at most
 * `batchSize` meters, transform each group into one batch and hand the
 * batches to the telemetry client in order. The tick window is advanced
 * exactly once per cycle, after the last batch.
 *
 * @module publish/batch-publisher
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { Attributes } from '../types/common.js';
import type { Meter } from '../types/meter.js';
import type { MetricBatch, MetricRecord, TickWindow } from '../types/record.js';
import type { MeterSource } from '../registry/meter-registry.js';
import type { IntervalTracker } from '../time/interval-tracker.js';
import type { TelemetryClient } from '../client/telemetry-client.js';
import type { MeterDispatcher } from '../transform/dispatcher.js';
import type { Logger } from '../logging/logger.js';
import { partition } from '../util/partition.js';

export interface BatchPublisherOptions {
  source: MeterSource;
  tracker: IntervalTracker;
  client: TelemetryClient;
  dispatcher: MeterDispatcher;
  /** Maximum meters per batch */
  batchSize: number;
  commonAttributes: Readonly<Attributes>;
  logger: Logger;
}

export class BatchPublisher {
  private readonly options: BatchPublisherOptions;

  constructor(options: BatchPublisherOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${options.batchSize}`);
    }
    this.options = options;
  }

  async publish(): Promise<void> {
    const { source, tracker, client, batchSize, logger } = this.options;

    try {
      const meters = source.getMeters();
      const window = tracker.window();
      const groups = partition(meters, batchSize);

      logger.debug('Publishing meters', {
        meters: meters.length,
        batches: groups.length,
        intervalMs: window.elapsedMs,
      });

      for (const [index, group] of groups.entries()) {
        if (index > 0) {
          await yieldToEventLoop();
        }
        client.sendBatch(this.buildBatch(group, window));
      }
    } finally {
      tracker.advance();
    }
  }

  private buildBatch(meters: readonly Meter[], window: TickWindow): MetricBatch {
    const records: MetricRecord[] = [];
    for (const meter of meters) {
      records.push(...this.options.dispatcher.dispatch(meter, window));
    }
    return Object.freeze({
      records: Object.freeze(records),
      commonAttributes: this.options.commonAttributes,
    });
  }
}
