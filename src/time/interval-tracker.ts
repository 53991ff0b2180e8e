/**
 * Interval tracker - owns the tick boundary of the publish cycle.
 *
 * The current tick is captured from the clock the first time it is read
 * after an advance and then held, so every transformer in a cycle sees the
 * same window and every record gets the same timestamp. Only the cycle
 * driver calls `advance()`.
 *
 * @module time/interval-tracker
 */

import type { Clock } from './clock.js';
import type { TickWindow } from '../types/record.js';

export class IntervalTracker {
  private readonly clock: Clock;
  private previousTick: number;
  private pendingTick: number | undefined;

  constructor(clock: Clock) {
    this.clock = clock;
    this.previousTick = clock.wallTime();
  }

  /**
   * Tick that closed the previous cycle
   */
  getPreviousTick(): number {
    return this.previousTick;
  }

  /**
   * Tick of the cycle in progress
   */
  currentTick(): number {
    if (this.pendingTick === undefined) {
      this.pendingTick = this.clock.wallTime();
    }
    return this.pendingTick;
  }

  elapsedSinceLastTick(): number {
    return Math.max(0, this.currentTick() - this.previousTick);
  }

  window(): TickWindow {
    const end = this.currentTick();
    return Object.freeze({
      start: this.previousTick,
      end,
      elapsedMs: this.elapsedSinceLastTick(),
    });
  }

  /**
   * Close the current window. The next window starts where this one ended.
   */
  advance(): void {
    this.previousTick = this.currentTick();
    this.pendingTick = undefined;
  }
}
