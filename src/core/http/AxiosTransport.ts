// src/core/http/AxiosTransport.ts

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { Readable } from 'stream';
import type { BaseTransport, CallContext, HttpHeaders, HttpRequest, HttpResponse } from './types';
import { ResponseBody } from './ResponseBody';
import { NetworkError, NetworkTimeoutError } from '../../utils/errors';
import { abortError } from '../../utils/signals';

export interface AxiosTransportOptions {
  keepAlive?: boolean;
  maxSockets?: number;
  maxRedirects?: number;
}

/**
 * The wire: one axios instance over a keep-alive connection pool. Every
 * status comes back as a response with a streaming body; only failures to
 * get a response at all are thrown.
 */
export class AxiosTransport implements BaseTransport {
  private axiosInstance: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;

  constructor(options: AxiosTransportOptions = {}) {
    const keepAlive = options.keepAlive ?? true;
    this.httpAgent = new http.Agent({ keepAlive, maxSockets: options.maxSockets });
    this.httpsAgent = new https.Agent({ keepAlive, maxSockets: options.maxSockets });

    this.axiosInstance = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      maxRedirects: options.maxRedirects ?? 5,
      responseType: 'stream',
      validateStatus: () => true,
    });
  }

  async send(request: HttpRequest, ctx: CallContext): Promise<HttpResponse> {
    let response: AxiosResponse<Readable>;
    try {
      response = await this.axiosInstance.request<Readable>({
        url: request.url,
        method: request.method,
        headers: request.headers,
        data: request.body,
        signal: ctx.signal,
      });
    } catch (error) {
      throw this.transformError(error, ctx);
    }

    return {
      status: response.status,
      statusText: response.statusText,
      headers: toHeaderRecord(response.headers),
      body: new ResponseBody(response.data),
    };
  }

  /** Releases pooled connections. */
  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private transformError(error: unknown, ctx: CallContext): Error {
    if (ctx.signal.aborted) {
      return abortError(ctx.signal);
    }
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new NetworkTimeoutError('Request timeout', { code: error.code });
      }
      return new NetworkError(error.message || 'Network error', { code: error.code }, error);
    }
    return new NetworkError('Network error', undefined, error);
  }
}

function toHeaderRecord(headers: AxiosResponse['headers']): HttpHeaders {
  const record: HttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      record[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      record[key.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      record[key.toLowerCase()] = String(value);
    }
  }
  return record;
}
