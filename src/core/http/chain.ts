// src/core/http/chain.ts

import type { Interceptor, Transport } from './types';

/** Adapts a plain send function to the Transport interface. */
export function transport(send: Transport['send']): Transport {
  return { send };
}

/**
 * Wraps `base` so that interceptors run in registration order: the first
 * one registered is outermost, the last one sits next to the wire.
 */
export function composeInterceptors(interceptors: readonly Interceptor[], base: Transport): Transport {
  return interceptors.reduceRight<Transport>((next, intercept) => intercept(next), base);
}
