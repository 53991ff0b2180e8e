/**
 * Timer transformers. Each timer yields a summary for the last completed
 * step and a `<name>.mean` gauge; both are in the base time unit.
 *
 * @module transform/timer
 */

import type { FunctionTimer, Timer } from '../types/meter.js';
import type { MetricRecord } from '../types/record.js';
import { BASE_TIME_UNIT, convertTime } from '../time/time-unit.js';
import { buildAttributes } from './attributes.js';
import { compact, gaugeRecord, summaryRecord } from './records.js';
import type { MeterTransformer } from './transformer.js';

export const timerTransformer: MeterTransformer<Timer> = {
  transform(meter, window) {
    const snapshot = meter.takeSnapshot();
    const toBase = (value: number): number => convertTime(value, meter.baseTimeUnit, BASE_TIME_UNIT);
    const attributes = buildAttributes(meter);
    const sum = toBase(snapshot.total);

    return compact<MetricRecord>([
      summaryRecord(
        meter.id.name,
        { count: snapshot.count, sum, min: toBase(snapshot.min), max: toBase(snapshot.max) },
        window,
        attributes
      ),
      gaugeRecord(`${meter.id.name}.mean`, sum / snapshot.count, window, attributes),
    ]);
  },
};

/**
 * Function timers cannot report min or max
 */
export const functionTimerTransformer: MeterTransformer<FunctionTimer> = {
  transform(meter, window) {
    const snapshot = meter.takeSnapshot();
    const count = snapshot.count;
    const sum = convertTime(snapshot.totalTime, meter.baseTimeUnit, BASE_TIME_UNIT);
    const attributes = buildAttributes(meter);

    return compact<MetricRecord>([
      summaryRecord(meter.id.name, { count, sum }, window, attributes),
      gaugeRecord(`${meter.id.name}.mean`, sum / count, window, attributes),
    ]);
  },
};
