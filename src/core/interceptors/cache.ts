// src/core/interceptors/cache.ts

import { z } from 'zod';
import type { CacheBackend, HttpMethod, HttpRequest, HttpResponse, Interceptor } from '../http/types';
import type { Logger } from '../../observability/Logger';
import { transport } from '../http/chain';
import { ResponseBody } from '../http/ResponseBody';
import { takeHeader } from '../../utils/headers';
import { REQUEST_ID_HEADER } from './requestId';

export interface CacheInterceptorConfig {
  cache: CacheBackend;
  defaultTtl?: number; // ms, when the policy sets no cacheTtl
  methods?: HttpMethod[];
  statusCodes?: number[];
  keyFn?: (request: HttpRequest) => string;
  skipCacheHeader?: string; // "true" skips the cache for that call; never forwarded
  logger?: Logger;
}

export const DEFAULT_CACHE_TTL_MS = 60000;
export const SKIP_CACHE_HEADER = 'x-skip-cache';

const CacheEntrySchema = z.object({
  status: z.string(),
  statusCode: z.number().int(),
  headers: z.record(z.string()),
  body: z.string(), // base64
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export function defaultCacheKey(request: HttpRequest): string {
  return `${request.method}:${request.url}`;
}

/**
 * Serves cacheable calls from the backend and stores cacheable responses.
 * Engages only when the policy enables caching and the method is allowed.
 */
export function cacheInterceptor(config: CacheInterceptorConfig): Interceptor {
  const methods = config.methods ?? ['GET'];
  const statusCodes = config.statusCodes ?? [200];
  const keyFn = config.keyFn ?? defaultCacheKey;
  const skipHeader = config.skipCacheHeader ?? SKIP_CACHE_HEADER;
  const defaultTtl = config.defaultTtl ?? DEFAULT_CACHE_TTL_MS;
  const logger = config.logger;

  const lookup = async (key: string): Promise<HttpResponse | undefined> => {
    let raw: string | undefined;
    try {
      raw = await config.cache.get(key);
    } catch (error) {
      logger?.warn('Cache lookup failed', { key, error: error instanceof Error ? error.message : error });
      return undefined;
    }
    if (raw === undefined) return undefined;

    const entry = parseEntry(raw);
    if (!entry) {
      logger?.warn('Discarding unreadable cache entry', { key });
      return undefined;
    }
    return {
      status: entry.statusCode,
      statusText: entry.status,
      headers: { ...entry.headers },
      body: new ResponseBody(Buffer.from(entry.body, 'base64')),
      cached: true,
    };
  };

  const store = async (key: string, response: HttpResponse, body: Buffer, ttl: number): Promise<void> => {
    const headers = { ...response.headers };
    delete headers[REQUEST_ID_HEADER];
    const entry: CacheEntry = {
      status: response.statusText,
      statusCode: response.status,
      headers,
      body: body.toString('base64'),
    };
    try {
      await config.cache.set(key, JSON.stringify(entry), ttl);
    } catch (error) {
      logger?.warn('Cache store failed', { key, error: error instanceof Error ? error.message : error });
    }
  };

  return (next) =>
    transport(async (request, ctx) => {
      const skip = takeHeader(request.headers, skipHeader) === 'true';
      if (!ctx.policy.enableCache || skip || !methods.includes(request.method)) {
        return next.send(request, ctx);
      }

      const key = keyFn(request);
      const hit = await lookup(key);
      if (hit) {
        logger?.debug('Cache hit', { key });
        return hit;
      }

      const response = await next.send(request, ctx);
      if (!statusCodes.includes(response.status)) {
        return response;
      }

      // Buffers in place, so the caller still gets a readable body
      const body = await response.body.buffer();
      await store(key, response, body, ctx.policy.cacheTtl ?? defaultTtl);
      return response;
    });
}

function parseEntry(raw: string): CacheEntry | undefined {
  try {
    const parsed = CacheEntrySchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}
