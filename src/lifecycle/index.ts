export { PublishScheduler, type PublishSchedulerOptions } from './publish-scheduler.js';
