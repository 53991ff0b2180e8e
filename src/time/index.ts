export { type TimeUnit, BASE_TIME_UNIT, convertTime } from './time-unit.js';
export { type Clock, SYSTEM_CLOCK } from './clock.js';
export { IntervalTracker } from './interval-tracker.js';
