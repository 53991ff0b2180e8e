/**
 * Registry configuration.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_METRIC_URI, DEFAULT_TIMEOUT_MS } from '../client/http-telemetry-client.js';
import { DEFAULT_STEP_MS } from '../registry/meter-registry.js';

/**
 * Default maximum number of meters per batch
 */
export const DEFAULT_BATCH_SIZE = 10_000;

export interface RegistryConfig {
  /** Key sent with every request */
  readonly apiKey: string;
  /** Send the key as a license key instead of an API key */
  readonly useLicenseKey: boolean;
  /** Metric ingest endpoint */
  readonly uri: string;
  /** Maximum meters per batch */
  readonly batchSize: number;
  /** Publish step in milliseconds */
  readonly stepMs: number;
  /** Reported as the `service.name` common attribute when set */
  readonly serviceName?: string;
  /** Log payloads at debug level */
  readonly enableAuditMode: boolean;
  /** When false, nothing is published */
  readonly enabled: boolean;
  /** HTTP headers and body timeout in milliseconds */
  readonly timeoutMs: number;
}

export type RegistryConfigOptions = Partial<RegistryConfig> & { apiKey: string };

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  useLicenseKey: z.boolean(),
  uri: z.string().superRefine((value, ctx) => {
    if (!isHttpUrl(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid URI for the metric API: ${value}` });
    }
  }),
  batchSize: z.number().int().positive(),
  stepMs: z.number().int().positive(),
  serviceName: z.string().min(1).optional(),
  enableAuditMode: z.boolean(),
  enabled: z.boolean(),
  timeoutMs: z.number().int().positive(),
});

/**
 * Fill defaults, validate and freeze
 *
 * @throws ConfigurationError listing every invalid option
 */
export function createRegistryConfig(options: RegistryConfigOptions): RegistryConfig {
  const candidate = {
    apiKey: options.apiKey,
    useLicenseKey: options.useLicenseKey ?? false,
    uri: options.uri ?? DEFAULT_METRIC_URI,
    batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    stepMs: options.stepMs ?? DEFAULT_STEP_MS,
    serviceName: options.serviceName,
    enableAuditMode: options.enableAuditMode ?? false,
    enabled: options.enabled ?? true,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }

  const config: { -readonly [K in keyof RegistryConfig]: RegistryConfig[K] } = {
    apiKey: result.data.apiKey,
    useLicenseKey: result.data.useLicenseKey,
    uri: result.data.uri,
    batchSize: result.data.batchSize,
    stepMs: result.data.stepMs,
    enableAuditMode: result.data.enableAuditMode,
    enabled: result.data.enabled,
    timeoutMs: result.data.timeoutMs,
  };
  if (result.data.serviceName !== undefined) {
    config.serviceName = result.data.serviceName;
  }
  return Object.freeze(config);
}

/**
 * Environment variables read by {@link registryConfigFromEnv}
 */
export const ENV_VARS = {
  apiKey: 'METRICS_API_KEY',
  useLicenseKey: 'METRICS_USE_LICENSE_KEY',
  uri: 'METRICS_URI',
  batchSize: 'METRICS_BATCH_SIZE',
  stepMs: 'METRICS_STEP_MS',
  serviceName: 'METRICS_SERVICE_NAME',
  enableAuditMode: 'METRICS_AUDIT_MODE',
  enabled: 'METRICS_ENABLED',
  timeoutMs: 'METRICS_TIMEOUT_MS',
} as const;

/**
 * Build configuration from environment variables. Unset variables take
 * their defaults.
 *
 * @throws ConfigurationError when the API key is missing or a value is invalid
 */
export function registryConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const apiKey = env[ENV_VARS.apiKey];
  if (!apiKey) {
    throw new ConfigurationError(`${ENV_VARS.apiKey} environment variable is required`, {
      issues: [`apiKey: ${ENV_VARS.apiKey} is not set`],
    });
  }

  const builder = new RegistryConfigBuilder(apiKey);
  const uri = env[ENV_VARS.uri];
  if (uri) builder.uri(uri);
  const serviceName = env[ENV_VARS.serviceName];
  if (serviceName) builder.serviceName(serviceName);

  const useLicenseKey = parseBoolean(env, ENV_VARS.useLicenseKey);
  if (useLicenseKey !== undefined) builder.useLicenseKey(useLicenseKey);
  const auditMode = parseBoolean(env, ENV_VARS.enableAuditMode);
  if (auditMode !== undefined) builder.enableAuditMode(auditMode);
  const enabled = parseBoolean(env, ENV_VARS.enabled);
  if (enabled !== undefined) builder.enabled(enabled);

  const batchSize = parseNumber(env, ENV_VARS.batchSize);
  if (batchSize !== undefined) builder.batchSize(batchSize);
  const stepMs = parseNumber(env, ENV_VARS.stepMs);
  if (stepMs !== undefined) builder.stepMs(stepMs);
  const timeoutMs = parseNumber(env, ENV_VARS.timeoutMs);
  if (timeoutMs !== undefined) builder.timeoutMs(timeoutMs);

  return builder.build();
}

/**
 * Fluent builder for {@link RegistryConfig}
 */
export class RegistryConfigBuilder {
  private options: { -readonly [K in keyof RegistryConfigOptions]: RegistryConfigOptions[K] };

  constructor(apiKey: string) {
    this.options = { apiKey };
  }

  useLicenseKey(value = true): this {
    this.options.useLicenseKey = value;
    return this;
  }

  uri(uri: string): this {
    this.options.uri = uri;
    return this;
  }

  batchSize(size: number): this {
    this.options.batchSize = size;
    return this;
  }

  stepMs(ms: number): this {
    this.options.stepMs = ms;
    return this;
  }

  serviceName(name: string): this {
    this.options.serviceName = name;
    return this;
  }

  enableAuditMode(value = true): this {
    this.options.enableAuditMode = value;
    return this;
  }

  enabled(value: boolean): this {
    this.options.enabled = value;
    return this;
  }

  timeoutMs(ms: number): this {
    this.options.timeoutMs = ms;
    return this;
  }

  build(): RegistryConfig {
    return createRegistryConfig(this.options);
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function parseBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ConfigurationError(`${name} must be true or false, got "${raw}"`, {
    issues: [`${name}: expected a boolean`],
  });
}

function parseNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`, {
      issues: [`${name}: expected a number`],
    });
  }
  return value;
}
