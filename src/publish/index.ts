export { BatchPublisher, type BatchPublisherOptions } from './batch-publisher.js';
