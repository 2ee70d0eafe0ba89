// src/utils/headers.ts

import type { HttpHeaders } from '../core/http/types';

/** Copies a header map with lowercase names; later duplicates win. */
export function normalizeHeaders(headers?: Record<string, string>): HttpHeaders {
  const normalized: HttpHeaders = {};
  if (!headers) return normalized;
  for (const [name, value] of Object.entries(headers)) {
    normalized[name.toLowerCase()] = value;
  }
  return normalized;
}

/** Removes a header and returns its value. */
export function takeHeader(headers: HttpHeaders, name: string): string | undefined {
  const key = name.toLowerCase();
  const value = headers[key];
  delete headers[key];
  return value;
}
