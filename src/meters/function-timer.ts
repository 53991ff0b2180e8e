/**
 * Step function timer. Wraps two functions reporting a cumulative count and
 * a cumulative total time, and reports their increase over the last
 * completed step.
 *
 * @module meters/function-timer
 */

import type { FunctionTimer, FunctionTimerSnapshot, MeterId, Measurement } from '../types/meter.js';
import type { Clock } from '../time/clock.js';
import { BASE_TIME_UNIT, convertTime, type TimeUnit } from '../time/time-unit.js';
import { StepValue, type StepMeter } from './step-value.js';

interface TimerDelta {
  readonly count: number;
  /** Milliseconds */
  readonly total: number;
}

const EMPTY_DELTA: TimerDelta = Object.freeze({ count: 0, total: 0 });

export class StepFunctionTimer implements FunctionTimer, StepMeter {
  readonly kind = 'functionTimer' as const;
  readonly baseTimeUnit: TimeUnit = BASE_TIME_UNIT;
  private lastCount = 0;
  private lastTotal = 0;
  private readonly step: StepValue<TimerDelta>;

  constructor(
    readonly id: MeterId,
    clock: Clock,
    stepMs: number,
    private readonly countFn: () => number,
    private readonly totalTimeFn: () => number,
    private readonly totalTimeUnit: TimeUnit
  ) {
    this.step = new StepValue(clock, stepMs, {
      drain: () => this.drain(),
      empty: () => EMPTY_DELTA,
    });
  }

  count(): number {
    return this.step.poll().count;
  }

  totalTime(unit: TimeUnit): number {
    return convertTime(this.step.poll().total, this.baseTimeUnit, unit);
  }

  takeSnapshot(): FunctionTimerSnapshot {
    const delta = this.step.poll();
    return { count: delta.count, totalTime: delta.total };
  }

  closingRollover(): void {
    this.step.closingRollover();
  }

  measure(): Measurement[] {
    const snapshot = this.takeSnapshot();
    return [
      { statistic: 'count', value: snapshot.count },
      { statistic: 'totalTime', value: snapshot.totalTime },
    ];
  }

  /**
   * A cumulative source that went backwards (process restart, reset) starts
   * a new baseline instead of reporting a negative delta.
   */
  private drain(): TimerDelta {
    const count = this.countFn();
    const total = convertTime(this.totalTimeFn(), this.totalTimeUnit, this.baseTimeUnit);
    const delta = Object.freeze({
      count: Math.max(0, count - this.lastCount),
      total: Math.max(0, total - this.lastTotal),
    });
    this.lastCount = count;
    this.lastTotal = total;
    return delta;
  }
}
