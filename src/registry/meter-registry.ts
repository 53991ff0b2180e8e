/**
 * Meter registry.
 *
 * Creates meters or returns the existing one for the same name and tags.
 * A name and tag set belongs to one meter kind for the life of the registry.
 * Step meters (timers, distribution summaries, function timers) share the
 * registry's clock and step so their rollovers line up with the publish
 * cadence.
 *
 * @module registry/meter-registry
 */

import type {
  Counter,
  DistributionConfig,
  DistributionSummary,
  FunctionCounter,
  FunctionTimer,
  Gauge,
  LongTaskTimer,
  Meter,
  MeterKind,
  TimeGauge,
  Timer,
} from '../types/meter.js';
import { isMeterKind } from '../types/meter.js';
import { SYSTEM_CLOCK, type Clock } from '../time/clock.js';
import { BASE_TIME_UNIT, type TimeUnit } from '../time/time-unit.js';
import { RegistrationError, ValidationError } from '../errors/index.js';
import { createMeterId, meterKey, type MeterOptions } from '../meters/meter-id.js';
import type { StepMeter } from '../meters/step-value.js';
import { DefaultGauge, DefaultTimeGauge } from '../meters/gauge.js';
import { CumulativeCounter, CumulativeFunctionCounter } from '../meters/counter.js';
import { StepTimer } from '../meters/timer.js';
import { StepFunctionTimer } from '../meters/function-timer.js';
import { StepDistributionSummary } from '../meters/distribution-summary.js';
import { DefaultLongTaskTimer } from '../meters/long-task-timer.js';

/**
 * Default step: one minute
 */
export const DEFAULT_STEP_MS = 60_000;

export interface MeterRegistryOptions {
  clock?: Clock;
  stepMs?: number;
}

/**
 * Options for meters that can publish a client-side histogram
 */
export interface HistogramOptions extends MeterOptions {
  /** Fractions in (0, 1], e.g. 0.95 */
  percentiles?: number[];
  /** Bucket upper bounds; milliseconds for timers */
  serviceLevelObjectives?: number[];
}

export type MeterListener = (meter: Meter) => void;

/**
 * Anything that can hand the publish pipeline its current meters
 */
export interface MeterSource {
  getMeters(): readonly Meter[];
}

export class MeterRegistry implements MeterSource {
  readonly clock: Clock;
  readonly stepMs: number;
  readonly baseTimeUnit: TimeUnit = BASE_TIME_UNIT;
  private readonly meters: Map<string, Meter> = new Map();
  private readonly stepMeters: Map<Meter, StepMeter> = new Map();
  private readonly addedListeners: Set<MeterListener> = new Set();
  private readonly removedListeners: Set<MeterListener> = new Set();

  constructor(options: MeterRegistryOptions = {}) {
    const stepMs = options.stepMs ?? DEFAULT_STEP_MS;
    if (!Number.isInteger(stepMs) || stepMs < 1) {
      throw new ValidationError(`Step must be a positive integer number of milliseconds, got ${stepMs}`);
    }
    this.clock = options.clock ?? SYSTEM_CLOCK;
    this.stepMs = stepMs;
  }

  counter(name: string, options?: MeterOptions): Counter {
    const id = createMeterId(name, options);
    return this.getOrCreate('counter', meterKey(id), () => new CumulativeCounter(id));
  }

  /**
   * Gauge sampling `fn` on every publish
   */
  gauge(name: string, fn: () => number, options?: MeterOptions): Gauge {
    const id = createMeterId(name, options);
    return this.getOrCreate('gauge', meterKey(id), () => new DefaultGauge(id, fn));
  }

  /**
   * Gauge whose function reports a duration in `unit`
   */
  timeGauge(name: string, fn: () => number, unit: TimeUnit, options?: MeterOptions): TimeGauge {
    const id = createMeterId(name, options);
    return this.getOrCreate('timeGauge', meterKey(id), () => new DefaultTimeGauge(id, unit, fn));
  }

  /**
   * Counter backed by a function returning a monotonically increasing total
   */
  functionCounter(name: string, fn: () => number, options?: MeterOptions): FunctionCounter {
    const id = createMeterId(name, options);
    return this.getOrCreate('functionCounter', meterKey(id), () => new CumulativeFunctionCounter(id, fn));
  }

  timer(name: string, options: HistogramOptions = {}): Timer {
    const id = createMeterId(name, options);
    return this.getOrCreate('timer', meterKey(id), () => {
      const timer = new StepTimer(id, this.clock, this.stepMs, distributionConfig(name, options));
      return this.trackStep(timer);
    });
  }

  /**
   * Timer backed by cumulative count and total-time functions
   */
  functionTimer(
    name: string,
    countFn: () => number,
    totalTimeFn: () => number,
    totalTimeUnit: TimeUnit,
    options?: MeterOptions
  ): FunctionTimer {
    const id = createMeterId(name, options);
    return this.getOrCreate('functionTimer', meterKey(id), () => {
      const timer = new StepFunctionTimer(id, this.clock, this.stepMs, countFn, totalTimeFn, totalTimeUnit);
      return this.trackStep(timer);
    });
  }

  summary(name: string, options: HistogramOptions = {}): DistributionSummary {
    const id = createMeterId(name, options);
    return this.getOrCreate('distributionSummary', meterKey(id), () => {
      const summary = new StepDistributionSummary(id, this.clock, this.stepMs, distributionConfig(name, options));
      return this.trackStep(summary);
    });
  }

  longTaskTimer(name: string, options?: MeterOptions): LongTaskTimer {
    const id = createMeterId(name, options);
    return this.getOrCreate('longTaskTimer', meterKey(id), () => new DefaultLongTaskTimer(id, this.clock));
  }

  /**
   * Register a meter built outside the registry. Returns the meter already
   * registered under the same id when its kind matches.
   */
  register(meter: Meter): Meter {
    const key = meterKey(meter.id);
    const existing = this.meters.get(key);
    if (existing) {
      if (existing.kind !== meter.kind) {
        throw conflict(key, existing.kind, meter.kind);
      }
      return existing;
    }
    this.add(key, meter);
    return meter;
  }

  /**
   * Remove a meter. Returns false when it was not registered.
   */
  remove(meter: Meter): boolean {
    const key = meterKey(meter.id);
    if (this.meters.get(key) !== meter) {
      return false;
    }
    this.meters.delete(key);
    this.stepMeters.delete(meter);
    for (const listener of this.removedListeners) {
      listener(meter);
    }
    return true;
  }

  /**
   * Current meters in registration order. The returned array is a copy.
   */
  getMeters(): Meter[] {
    return Array.from(this.meters.values());
  }

  clear(): void {
    for (const meter of this.getMeters()) {
      this.remove(meter);
    }
  }

  /**
   * Listen for new meters. Returns a function that removes the listener.
   */
  onMeterAdded(listener: MeterListener): () => void {
    this.addedListeners.add(listener);
    return () => {
      this.addedListeners.delete(listener);
    };
  }

  onMeterRemoved(listener: MeterListener): () => void {
    this.removedListeners.add(listener);
    return () => {
      this.removedListeners.delete(listener);
    };
  }

  /**
   * Move every step meter's partial step into its published value
   */
  closingRollover(): void {
    for (const meter of this.stepMeters.values()) {
      meter.closingRollover();
    }
  }

  private getOrCreate<K extends MeterKind>(
    kind: K,
    key: string,
    create: () => Extract<Meter, { kind: K }>
  ): Extract<Meter, { kind: K }> {
    const existing = this.meters.get(key);
    if (existing) {
      if (!isMeterKind(existing, kind)) {
        throw conflict(key, existing.kind, kind);
      }
      return existing;
    }
    const meter = create();
    this.add(key, meter);
    return meter;
  }

  private trackStep<M extends Meter & StepMeter>(meter: M): M {
    this.stepMeters.set(meter, meter);
    return meter;
  }

  private add(key: string, meter: Meter): void {
    this.meters.set(key, meter);
    for (const listener of this.addedListeners) {
      listener(meter);
    }
  }
}

function conflict(key: string, existing: MeterKind, requested: MeterKind): RegistrationError {
  return new RegistrationError(
    `Meter ${key} is already registered as ${existing}, cannot register it as ${requested}`,
    { meterName: key }
  );
}

function distributionConfig(name: string, options: HistogramOptions): DistributionConfig {
  const percentiles = [...new Set(options.percentiles ?? [])].sort((a, b) => a - b);
  const slos = [...new Set(options.serviceLevelObjectives ?? [])].sort((a, b) => a - b);

  for (const p of percentiles) {
    if (!(p > 0 && p <= 1)) {
      throw new ValidationError(`Percentile must be in (0, 1], got ${p}`, { meterName: name });
    }
  }
  for (const bound of slos) {
    if (!Number.isFinite(bound) || bound <= 0) {
      throw new ValidationError(`Service level objective must be a positive number, got ${bound}`, {
        meterName: name,
      });
    }
  }

  return Object.freeze({
    percentiles: Object.freeze(percentiles),
    serviceLevelObjectives: Object.freeze(slos),
  });
}
