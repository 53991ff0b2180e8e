import type { LongTaskTimer } from '../types/meter.js';
import { BASE_TIME_UNIT, convertTime } from '../time/time-unit.js';
import { buildAttributes } from './attributes.js';
import { compact, gaugeRecord } from './records.js';
import type { MeterTransformer } from './transformer.js';

export const longTaskTimerTransformer: MeterTransformer<LongTaskTimer> = {
  transform(meter, window) {
    const snapshot = meter.takeSnapshot();
    const attributes = buildAttributes(meter);
    return compact([
      gaugeRecord(`${meter.id.name}.activeTasks`, snapshot.activeTasks, window, attributes),
      gaugeRecord(
        `${meter.id.name}.duration`,
        convertTime(snapshot.duration, meter.baseTimeUnit, BASE_TIME_UNIT),
        window,
        attributes
      ),
    ]);
  },
};
