import { describe, it, expect } from 'vitest';
import {
  DEFAULT_BATCH_SIZE,
  RegistryConfigBuilder,
  createRegistryConfig,
  registryConfigFromEnv,
} from '../index.js';
import { DEFAULT_METRIC_URI } from '../../client/http-telemetry-client.js';
import { ConfigurationError } from '../../errors/index.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('createRegistryConfig', () => {
  it('should fill defaults', () => {
    const config = createRegistryConfig({ apiKey: 'test-secret' });

    expect(config).toEqual({
      apiKey: 'test-secret',
      useLicenseKey: false,
      uri: DEFAULT_METRIC_URI,
      batchSize: DEFAULT_BATCH_SIZE,
      stepMs: 60_000,
      enableAuditMode: false,
      enabled: true,
      timeoutMs: 10_000,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(config).not.toHaveProperty('serviceName');
  });

  it('should reject a URI that is not http(s)', () => {
    const error = captureError(() => createRegistryConfig({ apiKey: 'test-secret', uri: 'ftp://metrics.example.test' }));

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.issues).toEqual(['uri: Invalid URI for the metric API: ftp://metrics.example.test']);
    expect(error.message).toBe(
      'Invalid configuration: uri: Invalid URI for the metric API: ftp://metrics.example.test'
    );
  });

  it('should reject a malformed URI', () => {
    expect(() => createRegistryConfig({ apiKey: 'test-secret', uri: 'not a uri' })).toThrow(
      'Invalid URI for the metric API: not a uri'
    );
  });

  it('should list every invalid option', () => {
    const error = captureError(() => createRegistryConfig({ apiKey: '', batchSize: 0 }));

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.issues).toEqual(['apiKey: API key is required', 'batchSize: Number must be greater than 0']);
  });

  it('should reject a fractional step', () => {
    expect(() => createRegistryConfig({ apiKey: 'test-secret', stepMs: 1.5 })).toThrow(ConfigurationError);
  });
});

describe('registryConfigFromEnv', () => {
  it('should read every variable', () => {
    const config = registryConfigFromEnv({
      METRICS_API_KEY: 'test-secret',
      METRICS_USE_LICENSE_KEY: 'true',
      METRICS_URI: 'https://metrics.example.test/metric/v1',
      METRICS_BATCH_SIZE: '500',
      METRICS_STEP_MS: '10000',
      METRICS_SERVICE_NAME: 'checkout',
      METRICS_AUDIT_MODE: '1',
      METRICS_ENABLED: 'false',
      METRICS_TIMEOUT_MS: '2500',
    });

    expect(config).toEqual({
      apiKey: 'test-secret',
      useLicenseKey: true,
      uri: 'https://metrics.example.test/metric/v1',
      batchSize: 500,
      stepMs: 10_000,
      serviceName: 'checkout',
      enableAuditMode: true,
      enabled: false,
      timeoutMs: 2500,
    });
  });

  it('should require the API key', () => {
    expect(() => registryConfigFromEnv({})).toThrow('METRICS_API_KEY environment variable is required');
  });

  it('should reject a malformed boolean', () => {
    expect(() => registryConfigFromEnv({ METRICS_API_KEY: 'test-secret', METRICS_AUDIT_MODE: 'yes' })).toThrow(
      'METRICS_AUDIT_MODE must be true or false, got "yes"'
    );
  });

  it('should reject a malformed number', () => {
    expect(() => registryConfigFromEnv({ METRICS_API_KEY: 'test-secret', METRICS_BATCH_SIZE: 'lots' })).toThrow(
      'METRICS_BATCH_SIZE must be a number, got "lots"'
    );
  });
});

describe('RegistryConfigBuilder', () => {
  it('should build a validated config', () => {
    const config = new RegistryConfigBuilder('test-secret')
      .useLicenseKey()
      .batchSize(100)
      .stepMs(5000)
      .serviceName('checkout')
      .enableAuditMode()
      .timeoutMs(1000)
      .build();

    expect(config).toMatchObject({
      useLicenseKey: true,
      batchSize: 100,
      stepMs: 5000,
      serviceName: 'checkout',
      enableAuditMode: true,
      timeoutMs: 1000,
    });
  });

  it('should surface validation errors on build', () => {
    expect(() => new RegistryConfigBuilder('test-secret').uri('metrics').build()).toThrow(ConfigurationError);
  });
});
