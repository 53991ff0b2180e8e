/**
 * Publishes client-side histograms as gauges.
 *
 * For every timer or distribution summary configured with percentiles or
 * service-level buckets, registers `<name>.percentiles` gauges tagged
 * `percentile` and `<name>.histogram` gauges tagged `le`. The gauges read
 * the parent's last completed step. Bindings live in a side table keyed by
 * the parent so the gauges can be found and removed with it.
 *
 * @module histogram/histogram-gauge-customizer
 */

import type { DistributionSummary, Gauge, HistogramSnapshot, Meter, Timer } from '../types/meter.js';
import type { Tags } from '../types/common.js';
import type { MeterRegistry } from '../registry/meter-registry.js';
import { BASE_TIME_UNIT, convertTime } from '../time/time-unit.js';

type HistogramMeter = Timer | DistributionSummary;

export class HistogramGaugeCustomizer {
  private readonly bindings: Map<HistogramMeter, readonly Gauge[]> = new Map();

  /**
   * Register gauges for every current and future histogram meter of
   * `registry`, and drop them when their parent is removed. Returns a
   * function that stops listening.
   */
  bind(registry: MeterRegistry): () => void {
    const stopAdded = registry.onMeterAdded((meter) => {
      if (isHistogramMeter(meter)) {
        this.registerHistogramGauges(meter, registry);
      }
    });
    const stopRemoved = registry.onMeterRemoved((meter) => {
      if (isHistogramMeter(meter)) {
        this.removeHistogramGauges(meter, registry);
      }
    });

    for (const meter of registry.getMeters()) {
      if (isHistogramMeter(meter)) {
        this.registerHistogramGauges(meter, registry);
      }
    }

    return () => {
      stopAdded();
      stopRemoved();
    };
  }

  /**
   * Register the gauges for one meter. Calling it again for the same meter
   * returns the gauges already registered.
   */
  registerHistogramGauges(meter: HistogramMeter, registry: MeterRegistry): readonly Gauge[] {
    const existing = this.bindings.get(meter);
    if (existing) {
      return existing;
    }

    const { percentiles, serviceLevelObjectives } = meter.distribution;
    if (percentiles.length === 0 && serviceLevelObjectives.length === 0) {
      return [];
    }

    const toBase = (value: number): number =>
      meter.kind === 'timer' ? convertTime(value, meter.baseTimeUnit, BASE_TIME_UNIT) : value;
    const snapshot = (): HistogramSnapshot => meter.takeSnapshot();
    const { name, tags, description } = meter.id;
    const gauges: Gauge[] = [];

    for (const p of percentiles) {
      gauges.push(
        registry.gauge(
          `${name}.percentiles`,
          () => toBase(snapshot().percentileValues.find((v) => v.percentile === p)?.value ?? Number.NaN),
          withOptional(
            { ...tags, percentile: formatPercentile(p) },
            description,
            meter.kind === 'timer' ? BASE_TIME_UNIT : meter.id.baseUnit
          )
        )
      );
    }

    for (const bound of serviceLevelObjectives) {
      gauges.push(
        registry.gauge(
          `${name}.histogram`,
          () => snapshot().histogramCounts.find((c) => c.bucket === bound)?.count ?? Number.NaN,
          withOptional({ ...tags, le: String(bound) }, description, undefined)
        )
      );
    }

    const frozen = Object.freeze(gauges);
    this.bindings.set(meter, frozen);
    return frozen;
  }

  /**
   * Gauges registered for `meter`, empty when there are none
   */
  gaugesFor(meter: HistogramMeter): readonly Gauge[] {
    return this.bindings.get(meter) ?? [];
  }

  removeHistogramGauges(meter: HistogramMeter, registry: MeterRegistry): void {
    const gauges = this.bindings.get(meter);
    if (!gauges) {
      return;
    }
    this.bindings.delete(meter);
    for (const gauge of gauges) {
      registry.remove(gauge);
    }
  }
}

function isHistogramMeter(meter: Meter): meter is HistogramMeter {
  return meter.kind === 'timer' || meter.kind === 'distributionSummary';
}

/**
 * 0.95 -> "95", 0.999 -> "99.9"
 */
export function formatPercentile(p: number): string {
  return String(Number((p * 100).toFixed(3)));
}

function withOptional(
  tags: Tags,
  description: string | undefined,
  baseUnit: string | undefined
): { tags: Tags; description?: string; baseUnit?: string } {
  const options: { tags: Tags; description?: string; baseUnit?: string } = { tags };
  if (description !== undefined) {
    options.description = description;
  }
  if (baseUnit !== undefined) {
    options.baseUnit = baseUnit;
  }
  return options;
}
