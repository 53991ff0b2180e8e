/**
 * Routes each meter to the transformer for its kind.
 *
 * @module transform/dispatcher
 */

import type { Meter } from '../types/meter.js';
import type { MetricRecord, TickWindow } from '../types/record.js';
import type { Logger } from '../logging/logger.js';
import { formatError } from '../errors/index.js';
import { gaugeTransformer, timeGaugeTransformer } from './gauge.js';
import { counterTransformer } from './counter.js';
import { functionTimerTransformer, timerTransformer } from './timer.js';
import { distributionSummaryTransformer } from './distribution-summary.js';
import { longTaskTimerTransformer } from './long-task-timer.js';
import { bareMeterTransformer } from './bare.js';

export class MeterDispatcher {
  constructor(private readonly logger: Logger) {}

  /**
   * Records for one meter. A meter that fails to read is logged and
   * contributes nothing; the rest of the cycle is unaffected.
   */
  dispatch(meter: Meter, window: TickWindow): MetricRecord[] {
    try {
      return this.route(meter, window);
    } catch (error) {
      this.logger.warn('Failed to transform meter, skipping it for this cycle', {
        meter: meter.id.name,
        kind: meter.kind,
        error: formatError(error),
      });
      return [];
    }
  }

  private route(meter: Meter, window: TickWindow): MetricRecord[] {
    switch (meter.kind) {
      case 'gauge':
        return gaugeTransformer.transform(meter, window);
      case 'timeGauge':
        return timeGaugeTransformer.transform(meter, window);
      case 'counter':
      case 'functionCounter':
        return counterTransformer.transform(meter, window);
      case 'timer':
        return timerTransformer.transform(meter, window);
      case 'functionTimer':
        return functionTimerTransformer.transform(meter, window);
      case 'distributionSummary':
        return distributionSummaryTransformer.transform(meter, window);
      case 'longTaskTimer':
        return longTaskTimerTransformer.transform(meter, window);
      default:
        return bareMeterTransformer.transform(meter, window);
    }
  }
}
