import type { Meter } from '../types/meter.js';
import { buildAttributes } from './attributes.js';
import { compact, gaugeRecord } from './records.js';
import type { MeterTransformer } from './transformer.js';

/**
 * Fallback for meters without a dedicated transformer: one gauge per
 * measurement, told apart by the `statistic` attribute.
 */
export const bareMeterTransformer: MeterTransformer = {
  transform(meter: Meter, window) {
    return compact(
      meter
        .measure()
        .map((m) =>
          gaugeRecord(meter.id.name, m.value, window, buildAttributes(meter, { statistic: m.statistic }))
        )
    );
  },
};
