import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { gunzipSync } from 'node:zlib';
import { MockAgent } from 'undici';
import { HttpTelemetryClient, type HttpTelemetryClientOptions } from '../http-telemetry-client.js';
import type { Logger } from '../../logging/logger.js';
import type { MetricBatch } from '../../types/record.js';

const ORIGIN = 'https://metrics.example.test';
const URI = `${ORIGIN}/metric/v1`;

const batch: MetricBatch = Object.freeze<MetricBatch>({
  commonAttributes: { 'collector.name': 'metric-batch-registry' },
  records: [
    {
      kind: 'gauge',
      name: 'queue.size',
      value: 3,
      timestamp: 1000,
      attributes: { 'source.type': 'gauge' },
    },
  ],
});

interface CapturedRequest {
  headers: Record<string, string>;
  body: unknown;
}

function headerRecord(headers: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (headers instanceof Headers) {
    headers.forEach((value, key) => {
      result[key.toLowerCase()] = value;
    });
  } else if (typeof headers === 'object' && headers !== null) {
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        result[key.toLowerCase()] = value;
      }
    }
  }
  return result;
}

function decodeBody(body: unknown): unknown {
  if (!(body instanceof Uint8Array)) {
    throw new Error('expected a binary request body');
  }
  const parsed: unknown = JSON.parse(gunzipSync(body).toString('utf8'));
  return parsed;
}

describe('HttpTelemetryClient', () => {
  let agent: MockAgent;
  let logger: Logger;
  let captured: CapturedRequest[];

  const createClient = (options: Partial<HttpTelemetryClientOptions> = {}): HttpTelemetryClient =>
    new HttpTelemetryClient({
      apiKey: 'test-secret',
      uri: URI,
      dispatcher: agent,
      logger,
      ...options,
    });

  const intercept = (statusCode: number, data = ''): void => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/metric/v1', method: 'POST' })
      .reply((request) => {
        captured.push({ headers: headerRecord(request.headers), body: request.body });
        return { statusCode, data };
      });
  };

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    captured = [];
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should post the gzipped batch with the API key header', async () => {
    intercept(202, '{"requestId":"abc"}');
    const client = createClient();

    client.sendBatch(batch);
    await client.shutdown();

    expect(captured).toHaveLength(1);
    expect(captured[0]?.headers).toMatchObject({
      'content-type': 'application/json',
      'content-encoding': 'gzip',
      'user-agent': 'metric-batch-registry/0.1.0',
      'api-key': 'test-secret',
    });
    expect(decodeBody(captured[0]?.body)).toEqual([
      {
        common: { attributes: { 'collector.name': 'metric-batch-registry' } },
        metrics: [
          {
            name: 'queue.size',
            type: 'gauge',
            value: 3,
            timestamp: 1000,
            attributes: { 'source.type': 'gauge' },
          },
        ],
      },
    ]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should send a license key header when configured', async () => {
    intercept(202);
    const client = createClient({ useLicenseKey: true });

    client.sendBatch(batch);
    await client.shutdown();

    expect(captured[0]?.headers['x-license-key']).toBe('test-secret');
    expect(captured[0]?.headers['api-key']).toBeUndefined();
  });

  it('should log and drop a rejected batch', async () => {
    intercept(500, 'boom');
    const client = createClient();

    client.sendBatch(batch);
    await client.shutdown();

    expect(logger.warn).toHaveBeenCalledWith('Failed to send metric batch', {
      records: 1,
      error: '[DELIVERY] DeliveryError : Metric endpoint responded 500: boom (HTTP 500)',
    });
  });

  it('should not block the caller', async () => {
    intercept(202);
    const client = createClient();

    client.sendBatch(batch);
    expect(client.pendingCount()).toBe(1);

    await client.shutdown();
    expect(client.pendingCount()).toBe(0);
  });

  it('should drop batches sent after shutdown', async () => {
    const client = createClient();
    await client.shutdown();

    client.sendBatch(batch);

    expect(client.pendingCount()).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Telemetry client is shut down, dropping batch', { records: 1 });
  });

  it('should skip empty batches', async () => {
    const client = createClient();

    client.sendBatch({ records: [], commonAttributes: {} });
    await client.shutdown();

    expect(captured).toEqual([]);
  });

  it('should log payloads in audit mode', async () => {
    intercept(202);
    const client = createClient({ enableAuditMode: true });

    client.sendBatch(batch);
    await client.shutdown();

    expect(logger.debug).toHaveBeenCalledWith(
      'Sending metric batch',
      expect.objectContaining({ uri: URI })
    );
  });
});
