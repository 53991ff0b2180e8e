export { type MeterOptions, createMeterId, meterKey } from './meter-id.js';
export { StepValue, type StepValueSource, type StepMeter } from './step-value.js';
export { StepHistogram, DEFAULT_MAX_SAMPLES, NO_HISTOGRAM } from './step-histogram.js';
export { DefaultGauge, DefaultTimeGauge } from './gauge.js';
export { CumulativeCounter, CumulativeFunctionCounter } from './counter.js';
export { StepTimer } from './timer.js';
export { StepFunctionTimer } from './function-timer.js';
export { StepDistributionSummary } from './distribution-summary.js';
export { DefaultLongTaskTimer } from './long-task-timer.js';
