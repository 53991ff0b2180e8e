import type { Meter } from '../types/meter.js';
import type { MetricRecord, TickWindow } from '../types/record.js';

/**
 * Converts one meter into the records it contributes to a cycle. The window
 * is read-only; only the cycle driver advances it.
 */
export interface MeterTransformer<M extends Meter = Meter> {
  transform(meter: M, window: TickWindow): MetricRecord[];
}
