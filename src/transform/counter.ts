import type { Counter, FunctionCounter } from '../types/meter.js';
import { buildAttributes } from './attributes.js';
import { compact, countRecord } from './records.js';
import type { MeterTransformer } from './transformer.js';

export const counterTransformer: MeterTransformer<Counter | FunctionCounter> = {
  transform(meter, window) {
    return compact([countRecord(meter.id.name, meter.count(), window, buildAttributes(meter))]);
  },
};
