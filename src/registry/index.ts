export {
  MeterRegistry,
  DEFAULT_STEP_MS,
  type MeterRegistryOptions,
  type HistogramOptions,
  type MeterListener,
  type MeterSource,
} from './meter-registry.js';
