/**
 * Telemetry registry: wires a meter registry to a telemetry client and
 * publishes it on a step cadence.
 *
 * Shutdown order is fixed. `close()` stops the cadence and waits for the
 * cycle in flight, rolls the step meters over so the partial step is
 * published, runs one last publish, and only then shuts the client down.
 *
 * @example
 * ```typescript
 * const registry = new TelemetryRegistryBuilder(registryConfigFromEnv())
 *   .commonAttributes({ 'host.name': 'worker-1' })
 *   .build();
 * registry.start();
 *
 * const requests = registry.meters.counter('requests', { tags: { route: '/orders' } });
 * requests.increment();
 *
 * await registry.close();
 * ```
 *
 * @module telemetry-registry
 */

import type { Attributes } from './types/common.js';
import type { RegistryConfig } from './config/index.js';
import { SYSTEM_CLOCK, type Clock } from './time/clock.js';
import { IntervalTracker } from './time/interval-tracker.js';
import { MeterRegistry } from './registry/meter-registry.js';
import { HistogramGaugeCustomizer } from './histogram/histogram-gauge-customizer.js';
import { MeterDispatcher } from './transform/dispatcher.js';
import { BatchPublisher } from './publish/batch-publisher.js';
import { PublishScheduler } from './lifecycle/publish-scheduler.js';
import type { TelemetryClient } from './client/telemetry-client.js';
import { HttpTelemetryClient } from './client/http-telemetry-client.js';
import { silentLogger, type Logger } from './logging/logger.js';
import { COLLECTOR_NAME, VERSION } from './version.js';

export const INSTRUMENTATION_PROVIDER = COLLECTOR_NAME;

export interface TelemetryRegistryOptions {
  /** Defaults to an {@link HttpTelemetryClient} built from the config */
  client?: TelemetryClient;
  clock?: Clock;
  logger?: Logger;
  /** Attached to every batch; the collector's own attributes win on conflict */
  commonAttributes?: Attributes;
  /** Existing meter registry to publish; must use the config's step */
  meterRegistry?: MeterRegistry;
}

export class TelemetryRegistry {
  readonly config: RegistryConfig;
  readonly meters: MeterRegistry;
  readonly commonAttributes: Readonly<Attributes>;
  private readonly client: TelemetryClient;
  private readonly logger: Logger;
  private readonly publisher: BatchPublisher;
  private readonly scheduler: PublishScheduler;
  private readonly clock: Clock;
  private readonly tracker: IntervalTracker;
  private readonly customizer = new HistogramGaugeCustomizer();
  private readonly unbindCustomizer: () => void;
  private started = false;
  private closing: Promise<void> | undefined;

  constructor(config: RegistryConfig, options: TelemetryRegistryOptions = {}) {
    const clock = options.clock ?? options.meterRegistry?.clock ?? SYSTEM_CLOCK;
    this.clock = clock;
    this.tracker = new IntervalTracker(clock);
    this.config = config;
    this.logger = options.logger ?? silentLogger;
    this.meters = options.meterRegistry ?? new MeterRegistry({ clock, stepMs: config.stepMs });
    this.commonAttributes = buildCommonAttributes(config, options.commonAttributes);
    this.client =
      options.client ??
      new HttpTelemetryClient({
        apiKey: config.apiKey,
        useLicenseKey: config.useLicenseKey,
        uri: config.uri,
        timeoutMs: config.timeoutMs,
        enableAuditMode: config.enableAuditMode,
        logger: this.logger,
      });

    this.unbindCustomizer = this.customizer.bind(this.meters);
    this.publisher = new BatchPublisher({
      source: this.meters,
      tracker: this.tracker,
      client: this.client,
      dispatcher: new MeterDispatcher(this.logger),
      batchSize: config.batchSize,
      commonAttributes: this.commonAttributes,
      logger: this.logger,
    });
    this.scheduler = new PublishScheduler({
      clock,
      stepMs: this.meters.stepMs,
      task: () => this.publisher.publish(),
      logger: this.logger,
    });
  }

  /**
   * Start publishing on the step cadence. Does nothing when disabled,
   * already started or closed.
   */
  start(): void {
    if (!this.config.enabled || this.started || this.closing) {
      return;
    }
    this.started = true;
    this.logger.info(`Metric batch registry version ${VERSION} is starting`, {
      uri: this.config.uri,
      stepMs: this.meters.stepMs,
    });
    this.scheduler.start();
  }

  /**
   * Publish now, queued behind any cycle in flight
   */
  publish(): Promise<void> {
    return this.scheduler.runCycle();
  }

  isRunning(): boolean {
    return this.scheduler.isRunning();
  }

  /**
   * Flush and shut down. Safe to call more than once; every call resolves
   * when the first close completes.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await this.scheduler.stop();
    if (this.config.enabled && this.completedStepUnpublished()) {
      await this.scheduler.runCycle();
    }
    this.meters.closingRollover();
    if (this.config.enabled) {
      await this.scheduler.runCycle();
    }
    this.unbindCustomizer();
    await this.client.shutdown();
    this.logger.debug('Metric batch registry closed');
  }

  /**
   * True when a step boundary has passed since the last publish, so the
   * meters hold a completed step no cycle has reported yet
   */
  private completedStepUnpublished(): boolean {
    const stepMs = this.meters.stepMs;
    return Math.floor(this.tracker.getPreviousTick() / stepMs) < Math.floor(this.clock.wallTime() / stepMs);
  }
}

/**
 * Fluent builder for {@link TelemetryRegistry}
 */
export class TelemetryRegistryBuilder {
  private readonly options: TelemetryRegistryOptions = {};

  constructor(private readonly config: RegistryConfig) {}

  client(client: TelemetryClient): this {
    this.options.client = client;
    return this;
  }

  commonAttributes(attributes: Attributes): this {
    this.options.commonAttributes = attributes;
    return this;
  }

  clock(clock: Clock): this {
    this.options.clock = clock;
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  meterRegistry(registry: MeterRegistry): this {
    this.options.meterRegistry = registry;
    return this;
  }

  build(): TelemetryRegistry {
    return new TelemetryRegistry(this.config, this.options);
  }
}

function buildCommonAttributes(config: RegistryConfig, user: Attributes = {}): Readonly<Attributes> {
  const attributes: Attributes = {
    ...user,
    'instrumentation.provider': INSTRUMENTATION_PROVIDER,
    'collector.name': COLLECTOR_NAME,
    'collector.version': VERSION,
  };
  if (config.serviceName !== undefined) {
    attributes['service.name'] = config.serviceName;
  }
  return Object.freeze(attributes);
}
