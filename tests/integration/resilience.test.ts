/**
 * Resilience behavior of the full interceptor stack
 *
 * Tests:
 * 1. Retries against a failing server
 * 2. Circuit breaking and recovery
 * 3. Rate limiting bounded by the call deadline
 * 4. Response caching with TTL
 * 5. Fallback on an unreachable host
 * 6. Metric registration across clients
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Readable } from 'stream';
import { Registry } from 'prom-client';
import { createResilientClient } from '../../src/sdk';
import { CircuitBreaker } from '../../src/core/http/CircuitBreaker';
import { ResponseBody } from '../../src/core/http/ResponseBody';
import { constantBackoff } from '../../src/core/http/RetryHandler';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { CallError, CircuitBreakerOpenError, NetworkError, RateLimitWaitError } from '../../src/utils/errors';
import { sleep } from '../../src/utils/signals';
import { FakeTransport, createMockLogger, respond, streamed } from '../helpers/fakes';

const BASE_URL = 'https://api.example.test';

function quietMetrics(): MetricsCollector {
  return new MetricsCollector({ registry: new Registry() });
}

async function callError(promise: Promise<unknown>): Promise<CallError> {
  const error = await promise.catch((caught: unknown) => caught);
  if (!(error instanceof CallError)) {
    throw new Error(`expected CallError, got ${String(error)}`);
  }
  return error;
}

describe('Resilience: retries', () => {
  it('should make exactly maxRetries + 1 attempts and release every discarded body', async () => {
    const streams: Readable[] = [];
    const fake = new FakeTransport(() => {
      const { response, stream } = streamed(503, 'unavailable');
      streams.push(stream);
      return response;
    });
    const client = createResilientClient(
      { baseUrl: BASE_URL, defaults: { maxRetries: 3 } },
      { transport: fake, logger: createMockLogger(), metrics: quietMetrics(), defaults: { backoff: constantBackoff(1) } }
    );

    const error = await callError(client.get('/unstable'));

    expect(fake.calls).toBe(4);
    expect(error.status).toBe(503);
    expect(error.attempts).toBe(4);
    expect(error.bodyText).toBe('unavailable');
    expect(streams.slice(0, 3).every((stream) => stream.destroyed)).toBe(true);
  });

  it('should send a fresh request id on every attempt', async () => {
    const fake = new FakeTransport((_request, _ctx, call) => respond(call < 2 ? 502 : 200));
    const client = createResilientClient(
      { baseUrl: BASE_URL },
      { transport: fake, logger: createMockLogger(), metrics: quietMetrics(), defaults: { backoff: constantBackoff(1) } }
    );

    await client.get('/x');

    const [first, second] = fake.requests.map((request) => request.headers['x-request-id']);
    expect(first).toBeDefined();
    expect(second).toBeDefined();
    expect(first).not.toBe(second);
  });
});

describe('Resilience: circuit breaking', () => {
  it('should open after the threshold, fail fast, then recover through half-open', async () => {
    let status = 503;
    const fake = new FakeTransport(() => respond(status));
    const breaker = new CircuitBreaker({ name: 'upstream', failureThreshold: 3, resetTimeout: 30 });
    const client = createResilientClient(
      { baseUrl: BASE_URL, defaults: { maxRetries: 0 } },
      { transport: fake, logger: createMockLogger(), metrics: quietMetrics(), defaults: { breaker } }
    );

    for (let i = 0; i < 3; i++) {
      expect((await callError(client.get('/orders'))).status).toBe(503);
    }
    expect(breaker.currentState).toBe('open');

    const rejected = await callError(client.get('/orders'));
    expect(rejected.status).toBe(0);
    expect(rejected.cause).toBeInstanceOf(CircuitBreakerOpenError);
    expect(fake.calls).toBe(3);

    await sleep(40);
    status = 200;

    const response = await client.get('/orders');
    expect(response.status).toBe(200);
    expect(fake.calls).toBe(4);
    expect(breaker.currentState).toBe('closed');
  });

  it('should use the breaker chosen per route', async () => {
    const routeBreaker = new CircuitBreaker({ failureThreshold: 1 });
    const fake = new FakeTransport(() => respond(500));
    const client = createResilientClient(
      { baseUrl: BASE_URL, defaults: { maxRetries: 0 } },
      {
        transport: fake,
        logger: createMockLogger(),
        metrics: quietMetrics(),
        breakerFor: (_method, path) => (path.startsWith('/billing') ? routeBreaker : undefined),
      }
    );

    await callError(client.get('/catalog'));
    expect(routeBreaker.currentState).toBe('closed');

    await callError(client.get('/billing/invoices'));
    expect(routeBreaker.currentState).toBe('open');
  });
});

describe('Resilience: rate limiting', () => {
  it('should admit the burst and fail a waiter whose deadline passes first', async () => {
    const fake = new FakeTransport(() => respond(200));
    const client = createResilientClient(
      { baseUrl: BASE_URL, rateLimit: { qps: 1, burst: 2 } },
      { transport: fake, logger: createMockLogger(), metrics: quietMetrics() }
    );
    const start = Date.now();

    await client.get('/a');
    await client.get('/b');
    expect(Date.now() - start).toBeLessThan(500);

    const error = await callError(client.get('/c', { deadline: Date.now() + 100 }));

    expect(error.status).toBe(0);
    expect(error.cause).toBeInstanceOf(RateLimitWaitError);
    expect(fake.calls).toBe(2);
    expect(Date.now() - start).toBeLessThan(1000);
  });
});

describe('Resilience: caching', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should serve from cache within the TTL and refetch after it', async () => {
    let now = 1_700_000_000_000;
    vi.spyOn(Date, 'now').mockImplementation(() => now);

    const fake = new FakeTransport((_request, _ctx, call) => respond(200, `{"version":${call}}`));
    const client = createResilientClient(
      { baseUrl: BASE_URL, cache: { defaultTtl: 3000 } },
      {
        transport: fake,
        logger: createMockLogger(),
        metrics: quietMetrics(),
        endpointConfig: (method) => (method === 'GET' ? { enableCache: true } : undefined),
      }
    );

    const first = await client.get('/catalog');
    const second = await client.get('/catalog');

    expect(fake.calls).toBe(1);
    expect(second.cached).toBe(true);
    expect(second.status).toBe(first.status);
    expect(await second.body.text()).toBe(await first.body.text());

    now += 3001;
    const third = await client.get('/catalog');

    expect(fake.calls).toBe(2);
    expect(third.cached).toBeUndefined();
    expect(await third.body.text()).toBe('{"version":2}');
  });

  it('should refetch when the caller asks to skip the cache', async () => {
    const fake = new FakeTransport(() => respond(200, 'fresh'));
    const client = createResilientClient(
      { baseUrl: BASE_URL, cache: {} },
      {
        transport: fake,
        logger: createMockLogger(),
        metrics: quietMetrics(),
        defaults: { enableCache: true },
      }
    );

    await client.get('/catalog');
    await client.get('/catalog', { headers: { 'X-Skip-Cache': 'true' } });

    expect(fake.calls).toBe(2);
    expect(fake.requests[1].headers).not.toHaveProperty('x-skip-cache');
  });
});

describe('Resilience: fallback', () => {
  const unreachable = () =>
    new FakeTransport(() => {
      throw new NetworkError('connect ECONNREFUSED 127.0.0.1:1');
    });

  it('should answer with the fallback when the host is unreachable', async () => {
    const client = createResilientClient(
      { baseUrl: BASE_URL, defaults: { maxRetries: 0 } },
      {
        transport: unreachable(),
        logger: createMockLogger(),
        metrics: quietMetrics(),
        defaults: {
          fallback: () => ({ status: 200, statusText: 'OK', headers: {}, body: new ResponseBody('[]') }),
        },
      }
    );

    const response = await client.get('/recommendations');

    expect(response.status).toBe(200);
    expect(await response.body.text()).toBe('[]');
  });

  it('should surface a failing fallback as a CallError', async () => {
    const client = createResilientClient(
      { baseUrl: BASE_URL, defaults: { maxRetries: 0 } },
      {
        transport: unreachable(),
        logger: createMockLogger(),
        metrics: quietMetrics(),
        defaults: {
          fallback: () => {
            throw new Error('no fallback data');
          },
        },
      }
    );

    const error = await callError(client.get('/recommendations'));

    expect(error.status).toBe(0);
    expect(error.cause).toMatchObject({ message: 'no fallback data' });
  });
});

describe('Resilience: metrics', () => {
  it('should let several clients share one registry and namespace', async () => {
    const metrics = quietMetrics();
    const build = () =>
      createResilientClient(
        { baseUrl: BASE_URL, metrics: { namespace: 'orders', subsystem: 'upstream' } },
        { transport: new FakeTransport(() => respond(200)), logger: createMockLogger(), metrics }
      );

    const first = build();
    const second = build();
    await first.get('/a');
    await second.get('/a');

    const total = await metrics
      .counter('orders_upstream_requests_total', '', ['method', 'host', 'path', 'status'])
      .get();
    expect(total.values).toEqual([
      { value: 2, labels: { method: 'GET', host: 'api.example.test', path: '/a', status: '200' } },
    ]);
  });
});
