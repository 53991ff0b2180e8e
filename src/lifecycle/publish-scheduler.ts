/**
 * Publish cadence.
 *
 * Runs the publish task once per step, just after each wall-clock step
 * boundary, so every cycle reads a freshly completed step. Cycles are
 * chained: the next one is scheduled only after the previous one settles,
 * and manual runs queue behind the cycle in flight.
 *
 * @module lifecycle/publish-scheduler
 */

import type { Clock } from '../time/clock.js';
import type { Logger } from '../logging/logger.js';
import { formatError } from '../errors/index.js';

export interface PublishSchedulerOptions {
  clock: Clock;
  stepMs: number;
  task: () => Promise<void>;
  logger: Logger;
}

export class PublishScheduler {
  private readonly options: PublishSchedulerOptions;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private running = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: PublishSchedulerOptions) {
    this.options = options;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.scheduleNext();
  }

  /**
   * Cancel the next cycle and wait for the one in flight, if any
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.tail;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one cycle now, after any cycle already in flight. Never rejects;
   * failures are logged.
   */
  runCycle(): Promise<void> {
    const cycle = this.tail.then(() => this.runSafely());
    this.tail = cycle;
    return cycle;
  }

  /**
   * Milliseconds until just past the next step boundary
   */
  delayUntilNextStep(): number {
    const { clock, stepMs } = this.options;
    return stepMs - (clock.wallTime() % stepMs) + 1;
  }

  private scheduleNext(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.runCycle().then(() => {
        if (this.running) {
          this.scheduleNext();
        }
      });
    }, this.delayUntilNextStep());

    // Don't keep the process alive just for publishing
    this.timer.unref();
  }

  private async runSafely(): Promise<void> {
    try {
      await this.options.task();
    } catch (error) {
      this.options.logger.warn('Publish cycle failed', { error: formatError(error) });
    }
  }
}
