/**
 * Package version, reported in common attributes and the User-Agent
 */
export const VERSION = '0.1.0';

export const COLLECTOR_NAME = 'metric-batch-registry';
