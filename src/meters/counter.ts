/**
 * Cumulative counters. Counters report the total since creation; they are
 * never reset by a publish cycle.
 *
 * @module meters/counter
 */

import type { Counter, FunctionCounter, MeterId, Measurement } from '../types/meter.js';
import { ValidationError } from '../errors/index.js';

export class CumulativeCounter implements Counter {
  readonly kind = 'counter' as const;
  private value = 0;

  constructor(readonly id: MeterId) {}

  /**
   * Increment counter by specified amount.
   * @param amount - Amount to increment (must be >= 0)
   * @throws ValidationError if amount is negative or not finite
   */
  increment(amount = 1): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationError(`Counter cannot be incremented by ${amount}`, {
        meterName: this.id.name,
      });
    }
    this.value += amount;
  }

  count(): number {
    return this.value;
  }

  measure(): Measurement[] {
    return [{ statistic: 'count', value: this.value }];
  }
}

/**
 * Counter read from a function that returns a monotonically increasing total
 */
export class CumulativeFunctionCounter implements FunctionCounter {
  readonly kind = 'functionCounter' as const;

  constructor(
    readonly id: MeterId,
    private readonly fn: () => number
  ) {}

  count(): number {
    return this.fn();
  }

  measure(): Measurement[] {
    return [{ statistic: 'count', value: this.count() }];
  }
}
