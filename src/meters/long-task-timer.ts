/**
 * Long task timer. Tracks tasks while they run; readings reflect the tasks
 * active right now and are never reset by a publish cycle.
 *
 * @module meters/long-task-timer
 */

import type {
  LongTaskSample,
  LongTaskTimer,
  LongTaskTimerSnapshot,
  MeterId,
  Measurement,
} from '../types/meter.js';
import type { Clock } from '../time/clock.js';
import { BASE_TIME_UNIT, convertTime, type TimeUnit } from '../time/time-unit.js';

export class DefaultLongTaskTimer implements LongTaskTimer {
  readonly kind = 'longTaskTimer' as const;
  readonly baseTimeUnit: TimeUnit = BASE_TIME_UNIT;
  private readonly active = new Set<ActiveSample>();

  constructor(
    readonly id: MeterId,
    private readonly clock: Clock
  ) {}

  start(): LongTaskSample {
    const sample = new ActiveSample(this.clock, (s) => this.active.delete(s));
    this.active.add(sample);
    return sample;
  }

  activeTasks(): number {
    return this.active.size;
  }

  /**
   * Sum of the durations of all active tasks
   */
  duration(unit: TimeUnit): number {
    let total = 0;
    for (const sample of this.active) {
      total += sample.duration('milliseconds');
    }
    return convertTime(total, 'milliseconds', unit);
  }

  /**
   * Duration of the longest active task
   */
  max(unit: TimeUnit): number {
    let longest = 0;
    for (const sample of this.active) {
      longest = Math.max(longest, sample.duration('milliseconds'));
    }
    return convertTime(longest, 'milliseconds', unit);
  }

  /**
   * Every active task measured against one clock reading
   */
  takeSnapshot(): LongTaskTimerSnapshot {
    const now = this.clock.monotonicTime();
    let total = 0;
    let longest = 0;
    for (const sample of this.active) {
      const elapsed = sample.elapsedAt(now);
      total += elapsed;
      longest = Math.max(longest, elapsed);
    }
    return {
      activeTasks: this.active.size,
      duration: convertTime(total, 'milliseconds', this.baseTimeUnit),
      max: convertTime(longest, 'milliseconds', this.baseTimeUnit),
    };
  }

  measure(): Measurement[] {
    const snapshot = this.takeSnapshot();
    return [
      { statistic: 'activeTasks', value: snapshot.activeTasks },
      { statistic: 'duration', value: snapshot.duration },
    ];
  }
}

class ActiveSample implements LongTaskSample {
  private readonly startTime: number;
  private stoppedAt: number | undefined;

  constructor(
    private readonly clock: Clock,
    private readonly onStop: (sample: ActiveSample) => void
  ) {
    this.startTime = clock.monotonicTime();
  }

  stop(): number {
    if (this.stoppedAt === undefined) {
      this.stoppedAt = this.clock.monotonicTime();
      this.onStop(this);
    }
    return this.stoppedAt - this.startTime;
  }

  duration(unit: TimeUnit): number {
    return convertTime(this.elapsedAt(this.clock.monotonicTime()), 'milliseconds', unit);
  }

  /**
   * Milliseconds from start to `now`, or to the stop time once stopped
   */
  elapsedAt(now: number): number {
    return (this.stoppedAt ?? now) - this.startTime;
  }
}
