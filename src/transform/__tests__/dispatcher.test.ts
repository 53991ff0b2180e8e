import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MeterDispatcher } from '../dispatcher.js';
import { MeterRegistry } from '../../registry/meter-registry.js';
import { createMeterId } from '../../meters/meter-id.js';
import type { Logger } from '../../logging/logger.js';
import type { OtherMeter } from '../../types/meter.js';
import type { TickWindow } from '../../types/record.js';
import { MockClock } from '../../testing/mock-clock.js';

describe('MeterDispatcher', () => {
  const window: TickWindow = Object.freeze({ start: 0, end: 1000, elapsedMs: 1000 });
  let logger: Logger;
  let dispatcher: MeterDispatcher;
  let registry: MeterRegistry;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    dispatcher = new MeterDispatcher(logger);
    registry = new MeterRegistry({ clock: new MockClock(0), stepMs: 1000 });
  });

  it('should route each kind to its transformer', () => {
    registry.counter('requests').increment(2);
    registry.gauge('queue.size', () => 3);
    registry.timer('latency');
    registry.longTaskTimer('export');

    const names = registry.getMeters().flatMap((m) => dispatcher.dispatch(m, window).map((r) => `${r.kind}:${r.name}`));

    expect(names).toEqual([
      'count:requests',
      'gauge:queue.size',
      'summary:latency',
      'gauge:export.activeTasks',
      'gauge:export.duration',
    ]);
  });

  it('should send meters of an unknown shape to the generic fallback', () => {
    const meter: OtherMeter = {
      kind: 'other',
      id: createMeterId('cache.hits'),
      measure: () => [{ statistic: 'count', value: 12 }],
    };

    expect(dispatcher.dispatch(meter, window)).toEqual([
      {
        kind: 'gauge',
        name: 'cache.hits',
        value: 12,
        timestamp: 1000,
        attributes: { 'source.type': 'other', statistic: 'count' },
      },
    ]);
  });

  it('should log and skip a meter that fails to read', () => {
    const gauge = registry.gauge('broken', () => {
      throw new Error('source closed');
    });

    expect(dispatcher.dispatch(gauge, window)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Failed to transform meter, skipping it for this cycle', {
      meter: 'broken',
      kind: 'gauge',
      error: 'Error: source closed',
    });
  });
});
