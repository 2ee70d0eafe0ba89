// tests/unit/ErrorClassifier.test.ts

import { describe, it, expect } from 'vitest';
import { ErrorClassifier } from '../../src/core/http/ErrorClassifier';
import { ResponseBody } from '../../src/core/http/ResponseBody';
import type { HttpResponse } from '../../src/core/http/types';
import { ApiClientError, NetworkError, RateLimitError } from '../../src/utils/errors';
import { createMockLogger, makeRequest, respond } from '../helpers/fakes';

function buffered(status: number, body: string, headers: Record<string, string> = {}): HttpResponse {
  return { status, statusText: '', headers, body: new ResponseBody(body) };
}

describe('ErrorClassifier', () => {
  const classifier = new ErrorClassifier(createMockLogger());
  const request = makeRequest('https://api.example.test/items');

  it('should accept statuses below 400', () => {
    const response = buffered(304, '');
    const result = classifier.classify(request, { response, attempts: 1 });

    expect(result).toEqual({ ok: true, response });
  });

  it('should turn a 4xx into a CallError with the body', () => {
    const response = buffered(404, '{"error":"missing"}');
    const result = classifier.classify(request, { response, attempts: 1 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.status).toBe(404);
    expect(result.error.attempts).toBe(1);
    expect(result.error.bodyText).toBe('{"error":"missing"}');
    expect(result.error.response).toBe(response);
    expect(result.error.cause).toBeInstanceOf(ApiClientError);
  });

  it('should use RateLimitError for 429', () => {
    const result = classifier.classify(request, {
      response: buffered(429, '', { 'retry-after': '5' }),
      attempts: 3,
    });

    if (result.ok) throw new Error('expected failure');
    expect(result.error.cause).toBeInstanceOf(RateLimitError);
    expect(result.error.cause).toMatchObject({ retryAfter: 5 });
  });

  it('should report status 0 for transport errors', () => {
    const cause = new NetworkError('getaddrinfo ENOTFOUND');
    const result = classifier.classify(request, { error: cause, attempts: 3 });

    if (result.ok) throw new Error('expected failure');
    expect(result.error.status).toBe(0);
    expect(result.error.cause).toBe(cause);
    expect(result.error.message).toBe(
      '[HTTP] GET https://api.example.test/items: status=0, attempts=3, err=getaddrinfo ENOTFOUND'
    );
  });

  it('should fail a successful status that carries an error', () => {
    const cause = new Error('stream reset');
    const result = classifier.classify(request, { response: buffered(200, ''), error: cause, attempts: 1 });

    if (result.ok) throw new Error('expected failure');
    expect(result.error.status).toBe(200);
    expect(result.error.cause).toBe(cause);
  });

  it('should not read a body that was never materialized', () => {
    const result = classifier.classify(request, { response: respond(500, 'unread'), attempts: 1 });

    if (result.ok) throw new Error('expected failure');
    expect(result.error.body).toBeUndefined();
  });

  it('should fail an outcome with neither response nor error', () => {
    const result = classifier.classify(request, { attempts: 1 });

    if (result.ok) throw new Error('expected failure');
    expect(result.error.cause).toMatchObject({ message: 'No response received' });
  });
});
