import { describe, it, expect, beforeEach } from 'vitest';
import { MeterRegistry } from '../../registry/meter-registry.js';
import { createMeterId } from '../../meters/meter-id.js';
import { buildAttributes } from '../attributes.js';
import { gaugeTransformer, timeGaugeTransformer } from '../gauge.js';
import { counterTransformer } from '../counter.js';
import { functionTimerTransformer, timerTransformer } from '../timer.js';
import { distributionSummaryTransformer } from '../distribution-summary.js';
import { longTaskTimerTransformer } from '../long-task-timer.js';
import { bareMeterTransformer } from '../bare.js';
import { summaryRecord } from '../records.js';
import type { OtherMeter } from '../../types/meter.js';
import type { TickWindow } from '../../types/record.js';
import { MockClock } from '../../testing/mock-clock.js';

describe('transformers', () => {
  const window: TickWindow = Object.freeze({ start: 1000, end: 2000, elapsedMs: 1000 });
  let clock: MockClock;
  let registry: MeterRegistry;

  beforeEach(() => {
    clock = new MockClock(0);
    registry = new MeterRegistry({ clock, stepMs: 1000 });
  });

  describe('buildAttributes', () => {
    it('should put source type, description and base unit before tags', () => {
      const counter = registry.counter('requests', {
        tags: { route: '/orders' },
        description: 'Handled requests',
        baseUnit: 'requests',
      });

      expect(Object.entries(buildAttributes(counter))).toEqual([
        ['source.type', 'counter'],
        ['description', 'Handled requests'],
        ['baseUnit', 'requests'],
        ['route', '/orders'],
      ]);
    });

    it('should keep the meter kind as source type over a tag of that name', () => {
      const counter = registry.counter('requests', { tags: { 'source.type': 'custom' } });

      expect(buildAttributes(counter)).toEqual({ 'source.type': 'counter' });
      expect(buildAttributes(counter, { 'source.type': 'override' })).toEqual({ 'source.type': 'counter' });
    });
  });

  describe('gauge', () => {
    it('should emit the current value', () => {
      const gauge = registry.gauge('queue.size', () => 3, {
        tags: { queue: 'jobs' },
        description: 'Queued jobs',
      });

      expect(gaugeTransformer.transform(gauge, window)).toEqual([
        {
          kind: 'gauge',
          name: 'queue.size',
          value: 3,
          timestamp: 2000,
          attributes: { 'source.type': 'gauge', description: 'Queued jobs', queue: 'jobs' },
        },
      ]);
    });

    it('should omit a non-finite value', () => {
      const gauge = registry.gauge('ratio', () => Number.NaN);

      expect(gaugeTransformer.transform(gauge, window)).toEqual([]);
    });

    it('should convert a time gauge to milliseconds', () => {
      const gauge = registry.timeGauge('uptime', () => 2, 'seconds', { baseUnit: 'seconds' });

      expect(timeGaugeTransformer.transform(gauge, window)).toEqual([
        {
          kind: 'gauge',
          name: 'uptime',
          value: 2000,
          timestamp: 2000,
          attributes: { 'source.type': 'timeGauge', baseUnit: 'milliseconds' },
        },
      ]);
    });
  });

  describe('counter', () => {
    it('should emit the cumulative total with the window interval', () => {
      const counter = registry.counter('requests');
      counter.increment(5);

      expect(counterTransformer.transform(counter, window)).toEqual([
        {
          kind: 'count',
          name: 'requests',
          value: 5,
          timestamp: 2000,
          intervalMs: 1000,
          attributes: { 'source.type': 'counter' },
        },
      ]);
    });

    it('should read function counters', () => {
      const counter = registry.functionCounter('bytes.sent', () => 42);
      const [record] = counterTransformer.transform(counter, window);

      expect(record).toMatchObject({ kind: 'count', value: 42, attributes: { 'source.type': 'functionCounter' } });
    });
  });

  describe('timer', () => {
    it('should emit a summary and a mean gauge', () => {
      const timer = registry.timer('latency');
      timer.record(10, 'milliseconds');
      timer.record(30, 'milliseconds');
      clock.add(1000);

      expect(timerTransformer.transform(timer, window)).toEqual([
        {
          kind: 'summary',
          name: 'latency',
          count: 2,
          sum: 40,
          min: 10,
          max: 30,
          timestamp: 2000,
          intervalMs: 1000,
          attributes: { 'source.type': 'timer' },
        },
        {
          kind: 'gauge',
          name: 'latency.mean',
          value: 20,
          timestamp: 2000,
          attributes: { 'source.type': 'timer' },
        },
      ]);
    });

    it('should omit min, max and mean for an idle step', () => {
      const timer = registry.timer('latency');
      const records = timerTransformer.transform(timer, window);

      expect(records).toEqual([
        {
          kind: 'summary',
          name: 'latency',
          count: 0,
          sum: 0,
          timestamp: 2000,
          intervalMs: 1000,
          attributes: { 'source.type': 'timer' },
        },
      ]);
      expect(records[0]).not.toHaveProperty('min');
    });

    it('should report function timer deltas without min or max', () => {
      const timer = registry.functionTimer('gc.pause', () => 4, () => 2, 'seconds');
      clock.add(1000);

      expect(functionTimerTransformer.transform(timer, window)).toEqual([
        {
          kind: 'summary',
          name: 'gc.pause',
          count: 4,
          sum: 2000,
          timestamp: 2000,
          intervalMs: 1000,
          attributes: { 'source.type': 'functionTimer' },
        },
        {
          kind: 'gauge',
          name: 'gc.pause.mean',
          value: 500,
          timestamp: 2000,
          attributes: { 'source.type': 'functionTimer' },
        },
      ]);
    });
  });

  describe('distribution summary', () => {
    it('should emit one summary from a snapshot', () => {
      const summary = registry.summary('payload.size', { baseUnit: 'bytes' });
      summary.record(100);
      summary.record(300);
      clock.add(1000);

      expect(distributionSummaryTransformer.transform(summary, window)).toEqual([
        {
          kind: 'summary',
          name: 'payload.size',
          count: 2,
          sum: 400,
          min: 100,
          max: 300,
          timestamp: 2000,
          intervalMs: 1000,
          attributes: { 'source.type': 'distributionSummary', baseUnit: 'bytes' },
        },
      ]);
    });
  });

  describe('long task timer', () => {
    it('should emit active tasks and total duration', () => {
      const timer = registry.longTaskTimer('export');
      timer.start();
      clock.add(250);

      expect(longTaskTimerTransformer.transform(timer, window)).toEqual([
        {
          kind: 'gauge',
          name: 'export.activeTasks',
          value: 1,
          timestamp: 2000,
          attributes: { 'source.type': 'longTaskTimer' },
        },
        {
          kind: 'gauge',
          name: 'export.duration',
          value: 250,
          timestamp: 2000,
          attributes: { 'source.type': 'longTaskTimer' },
        },
      ]);
    });
  });

  describe('bare meter', () => {
    it('should emit one gauge per finite measurement', () => {
      const meter: OtherMeter = {
        kind: 'other',
        id: createMeterId('pool', { tags: { name: 'db' } }),
        measure: () => [
          { statistic: 'value', value: 4 },
          { statistic: 'count', value: Number.POSITIVE_INFINITY },
          { statistic: 'unknown', value: 9 },
        ],
      };

      expect(bareMeterTransformer.transform(meter, window)).toEqual([
        {
          kind: 'gauge',
          name: 'pool',
          value: 4,
          timestamp: 2000,
          attributes: { 'source.type': 'other', name: 'db', statistic: 'value' },
        },
        {
          kind: 'gauge',
          name: 'pool',
          value: 9,
          timestamp: 2000,
          attributes: { 'source.type': 'other', name: 'db', statistic: 'unknown' },
        },
      ]);
    });
  });

  describe('summaryRecord', () => {
    it('should drop the record when count is not finite', () => {
      expect(summaryRecord('x', { count: Number.NaN, sum: 1 }, window, {})).toBeUndefined();
    });

    it('should freeze records', () => {
      const record = summaryRecord('x', { count: 1, sum: 1, min: 1, max: Number.NaN }, window, {});

      expect(Object.isFrozen(record)).toBe(true);
      expect(record).not.toHaveProperty('max');
    });
  });
});
