/**
 * Test doubles for code that publishes through a telemetry registry.
 */

export { MockClock } from './mock-clock.js';
export { MockTelemetryClient, type ClientEvent } from './mock-telemetry-client.js';
