/**
 * Step-aligned value holder.
 *
 * Accumulates into a current value and, when the clock crosses a step
 * boundary, moves it to `previous`. Readers only ever see the last completed
 * step. When more than one boundary passed without a roll, the step before
 * the current one saw no activity and `previous` is the empty value.
 *
 * @module meters/step-value
 */

import type { Clock } from '../time/clock.js';

export interface StepValueSource<V> {
  /** Returns the accumulated value and resets the accumulator */
  drain(): V;
  /** Value reported for a step with no activity */
  empty(): V;
}

export class StepValue<V> {
  private readonly clock: Clock;
  private readonly stepMs: number;
  private readonly source: StepValueSource<V>;
  private lastStep: number;
  private previous: V;

  constructor(clock: Clock, stepMs: number, source: StepValueSource<V>) {
    this.clock = clock;
    this.stepMs = stepMs;
    this.source = source;
    this.lastStep = Math.floor(clock.wallTime() / stepMs);
    this.previous = source.empty();
  }

  /**
   * Roll over if a step boundary has passed. Call before accumulating so a
   * new observation never lands in a step that already ended.
   */
  roll(): void {
    const step = Math.floor(this.clock.wallTime() / this.stepMs);
    if (this.lastStep >= step) {
      return;
    }
    const drained = this.source.drain();
    this.previous = this.lastStep < step - 1 ? this.source.empty() : drained;
    this.lastStep = step;
  }

  /**
   * Value of the last completed step
   */
  poll(): V {
    this.roll();
    return this.previous;
  }

  /**
   * Publish the partial step in progress as if it had completed. Used once,
   * right before the final publish on close. A completed step still held
   * here is replaced, so publish it first.
   */
  closingRollover(): void {
    this.roll();
    this.previous = this.source.drain();
  }
}

/**
 * Meter whose readings come from the last completed step
 */
export interface StepMeter {
  closingRollover(): void;
}
