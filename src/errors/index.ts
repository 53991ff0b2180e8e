/**
 * Error types for the metric batch registry.
 *
 * Configuration errors are fatal at construction time. Delivery errors are
 * raised inside the telemetry client and never reach the publish cycle.
 */

/**
 * Error category for classification
 */
export type ErrorCategory =
  | 'configuration'
  | 'validation'
  | 'registration'
  | 'delivery';

/**
 * Base error class for all metrics errors
 */
export abstract class MetricsError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options?: { statusCode?: number | undefined; cause?: Error | undefined }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration error - invalid or missing configuration
 */
export class ConfigurationError extends MetricsError {
  readonly category = 'configuration' as const;
  readonly isRetryable = false;
  readonly issues: readonly string[];

  constructor(message: string, options?: { issues?: string[] | undefined; cause?: Error | undefined }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.issues = options?.issues ?? [];
  }
}

/**
 * Validation error - invalid value recorded into a meter
 */
export class ValidationError extends MetricsError {
  readonly category = 'validation' as const;
  readonly isRetryable = false;
  readonly meterName?: string;

  constructor(message: string, options?: { meterName?: string | undefined }) {
    super(message);
    if (options?.meterName !== undefined) {
      this.meterName = options.meterName;
    }
  }
}

/**
 * Registration error - a meter id is already taken by a different kind
 */
export class RegistrationError extends MetricsError {
  readonly category = 'registration' as const;
  readonly isRetryable = false;
  readonly meterName?: string;

  constructor(message: string, options?: { meterName?: string | undefined }) {
    super(message);
    if (options?.meterName !== undefined) {
      this.meterName = options.meterName;
    }
  }
}

/**
 * Delivery error - the ingest endpoint rejected a batch or could not be reached
 */
export class DeliveryError extends MetricsError {
  readonly category = 'delivery' as const;
  readonly isRetryable: boolean;

  constructor(
    message: string,
    options?: { statusCode?: number | undefined; cause?: Error | undefined }
  ) {
    super(message, options);
    const status = options?.statusCode;
    this.isRetryable = status === undefined || status === 429 || status >= 500;
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof MetricsError) {
    return error.isRetryable;
  }
  return false;
}

/**
 * Check if an error is a metrics error
 */
export function isMetricsError(error: unknown): error is MetricsError {
  return error instanceof MetricsError;
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof MetricsError) {
    const parts = [
      `[${error.category.toUpperCase()}]`,
      error.name,
      ':',
      error.message,
    ];

    if (error.statusCode) {
      parts.push(`(HTTP ${error.statusCode})`);
    }

    return parts.join(' ');
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
