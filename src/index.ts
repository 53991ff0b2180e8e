/**
 * metric-batch-registry
 *
 * Step-aligned meter registry that turns live meters into metric batches
 * and ships them to a metric ingest endpoint.
 */

export * from './types/index.js';
export * from './time/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './meters/index.js';
export * from './registry/index.js';
export * from './transform/index.js';
export * from './histogram/index.js';
export * from './publish/index.js';
export * from './client/index.js';
export * from './lifecycle/index.js';
export {
  createRegistryConfig,
  registryConfigFromEnv,
  RegistryConfigBuilder,
  DEFAULT_BATCH_SIZE,
  ENV_VARS,
  type RegistryConfig,
  type RegistryConfigOptions,
} from './config/index.js';
export {
  TelemetryRegistry,
  TelemetryRegistryBuilder,
  INSTRUMENTATION_PROVIDER,
  type TelemetryRegistryOptions,
} from './telemetry-registry.js';
export { VERSION, COLLECTOR_NAME } from './version.js';
