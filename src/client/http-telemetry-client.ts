/**
 * HTTP telemetry client.
 *
 * Posts each batch as gzipped JSON to the metric ingest endpoint. Sends are
 * fire-and-forget; the client remembers requests in flight so `shutdown`
 * can wait for them. Failed batches are logged and dropped.
 *
 * @module client/http-telemetry-client
 */

import { gzipSync } from 'node:zlib';
import { request, type Dispatcher } from 'undici';
import type { MetricBatch } from '../types/record.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { DeliveryError, formatError } from '../errors/index.js';
import { COLLECTOR_NAME, VERSION } from '../version.js';
import type { TelemetryClient } from './telemetry-client.js';
import { toPayload } from './payload.js';

/**
 * Default metric ingest endpoint
 */
export const DEFAULT_METRIC_URI = 'https://metric-api.newrelic.com/metric/v1';

/**
 * Default request timeout in milliseconds
 */
export const DEFAULT_TIMEOUT_MS = 10_000;

export const DEFAULT_USER_AGENT = `${COLLECTOR_NAME}/${VERSION}`;

export interface HttpTelemetryClientOptions {
  apiKey: string;
  /** Send the key as a license key instead of an API key */
  useLicenseKey?: boolean;
  uri?: string;
  timeoutMs?: number;
  /** Log every payload at debug level */
  enableAuditMode?: boolean;
  userAgent?: string;
  /** undici dispatcher, e.g. a MockAgent in tests */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export class HttpTelemetryClient implements TelemetryClient {
  private readonly uri: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly auditMode: boolean;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly logger: Logger;
  private readonly pending: Set<Promise<void>> = new Set();
  private closed = false;

  constructor(options: HttpTelemetryClientOptions) {
    this.uri = options.uri ?? DEFAULT_METRIC_URI;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.auditMode = options.enableAuditMode ?? false;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? silentLogger;
    this.headers = {
      'Content-Type': 'application/json',
      'Content-Encoding': 'gzip',
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      [options.useLicenseKey ? 'X-License-Key' : 'Api-Key']: options.apiKey,
    };
  }

  /**
   * Queue a batch for delivery. Never throws and never blocks.
   */
  sendBatch(batch: MetricBatch): void {
    if (this.closed) {
      this.logger.warn('Telemetry client is shut down, dropping batch', {
        records: batch.records.length,
      });
      return;
    }
    if (batch.records.length === 0) {
      return;
    }

    const delivery: Promise<void> = this.deliver(batch)
      .catch((error: unknown) => {
        this.logger.warn('Failed to send metric batch', {
          records: batch.records.length,
          error: formatError(error),
        });
      })
      .finally(() => {
        this.pending.delete(delivery);
      });
    this.pending.add(delivery);
  }

  /**
   * Stop accepting batches and wait for the ones in flight
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await Promise.all(this.pending);
  }

  /**
   * Requests that have not completed yet
   */
  pendingCount(): number {
    return this.pending.size;
  }

  private async deliver(batch: MetricBatch): Promise<void> {
    const json = JSON.stringify(toPayload(batch));
    if (this.auditMode) {
      this.logger.debug('Sending metric batch', { uri: this.uri, payload: json });
    }

    let statusCode: number;
    let responseText: string;
    try {
      const response = await request(this.uri, {
        method: 'POST',
        headers: this.headers,
        body: gzipSync(json),
        bodyTimeout: this.timeoutMs,
        headersTimeout: this.timeoutMs,
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      // Consume the response body to free resources
      responseText = await response.body.text();
    } catch (error) {
      throw new DeliveryError(`Request to ${this.uri} failed`, {
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new DeliveryError(`Metric endpoint responded ${statusCode}: ${responseText.slice(0, 200)}`, {
        statusCode,
      });
    }

    if (this.auditMode) {
      this.logger.debug('Metric batch accepted', { statusCode, response: responseText });
    }
  }
}
