export { HistogramGaugeCustomizer, formatPercentile } from './histogram-gauge-customizer.js';
