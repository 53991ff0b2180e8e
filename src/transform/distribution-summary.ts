import type { DistributionSummary } from '../types/meter.js';
import { buildAttributes } from './attributes.js';
import { compact, summaryRecord } from './records.js';
import type { MeterTransformer } from './transformer.js';

/**
 * Percentiles and buckets are published by the histogram gauges, not here
 */
export const distributionSummaryTransformer: MeterTransformer<DistributionSummary> = {
  transform(meter, window) {
    const snapshot = meter.takeSnapshot();
    return compact([
      summaryRecord(
        meter.id.name,
        { count: snapshot.count, sum: snapshot.total, min: snapshot.min, max: snapshot.max },
        window,
        buildAttributes(meter)
      ),
    ]);
  },
};
