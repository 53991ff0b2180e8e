import type { Gauge, TimeGauge } from '../types/meter.js';
import { BASE_TIME_UNIT } from '../time/time-unit.js';
import { buildAttributes } from './attributes.js';
import { compact, gaugeRecord } from './records.js';
import type { MeterTransformer } from './transformer.js';

export const gaugeTransformer: MeterTransformer<Gauge> = {
  transform(meter, window) {
    return compact([gaugeRecord(meter.id.name, meter.value(), window, buildAttributes(meter))]);
  },
};

/**
 * Reports the value in the base time unit and tags it with that unit
 */
export const timeGaugeTransformer: MeterTransformer<TimeGauge> = {
  transform(meter, window) {
    const attributes = buildAttributes(meter, { baseUnit: BASE_TIME_UNIT });
    return compact([gaugeRecord(meter.id.name, meter.value(BASE_TIME_UNIT), window, attributes)]);
  },
};
