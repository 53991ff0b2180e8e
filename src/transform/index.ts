export { buildAttributes } from './attributes.js';
export { gaugeRecord, countRecord, summaryRecord, compact, type SummaryValues } from './records.js';
export type { MeterTransformer } from './transformer.js';
export { gaugeTransformer, timeGaugeTransformer } from './gauge.js';
export { counterTransformer } from './counter.js';
export { timerTransformer, functionTimerTransformer } from './timer.js';
export { distributionSummaryTransformer } from './distribution-summary.js';
export { longTaskTimerTransformer } from './long-task-timer.js';
export { bareMeterTransformer } from './bare.js';
export { MeterDispatcher } from './dispatcher.js';
