// src/core/interceptors/identity.ts

import type { Interceptor } from '../http/types';
import { transport } from '../http/chain';

export const FORWARDED_FOR_HEADER = 'x-forwarded-for';

/**
 * Appends the caller's address (from the call context) to X-Forwarded-For,
 * unless the chain already lists it.
 */
export function identityInterceptor(header: string = FORWARDED_FOR_HEADER): Interceptor {
  const name = header.toLowerCase();
  return (next) =>
    transport((request, ctx) => {
      if (ctx.remoteAddress) {
        const address = stripPort(ctx.remoteAddress);
        const chain = request.headers[name];
        if (!chain) {
          request.headers[name] = address;
        } else if (!chain.split(',').some((hop) => hop.trim() === address)) {
          request.headers[name] = `${chain}, ${address}`;
        }
      }
      return next.send(request, ctx);
    });
}

export function stripPort(address: string): string {
  if (address.startsWith('[')) {
    const end = address.indexOf(']');
    return end === -1 ? address : address.slice(1, end);
  }
  const parts = address.split(':');
  // More than one colon is a bare IPv6 address
  return parts.length === 2 ? parts[0] : address;
}
