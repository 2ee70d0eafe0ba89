// src/utils/signals.ts

import { NetworkTimeoutError, RequestCancelledError } from './errors';

export interface CallScope {
  signal: AbortSignal;
  deadline: number;
  dispose(): void;
}

/**
 * Derives a call's signal and absolute deadline from the policy timeout and
 * whatever the caller supplied. The earlier deadline wins; the signal aborts
 * with NetworkTimeoutError at the deadline, or RequestCancelledError when the
 * caller's own signal fires first.
 */
export function createCallScope(
  timeoutMs: number,
  caller: { signal?: AbortSignal; deadline?: number } = {}
): CallScope {
  const startedAt = Date.now();
  const deadline = Math.min(startedAt + timeoutMs, caller.deadline ?? Number.POSITIVE_INFINITY);
  const controller = new AbortController();
  const budget = Math.max(0, deadline - startedAt);

  const timer = setTimeout(() => {
    controller.abort(new NetworkTimeoutError(`Request timed out after ${budget}ms`, { timeout: budget }));
  }, budget);

  const onCallerAbort = () => {
    controller.abort(
      new RequestCancelledError('Request cancelled by caller', undefined, caller.signal?.reason)
    );
  };
  if (caller.signal?.aborted) {
    onCallerAbort();
  } else {
    caller.signal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  return {
    signal: controller.signal,
    deadline,
    dispose: () => {
      clearTimeout(timer);
      caller.signal?.removeEventListener('abort', onCallerAbort);
    },
  };
}

/** The error a call should surface for an aborted signal. */
export function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new RequestCancelledError();
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    const abortSignal = signal;
    if (abortSignal.aborted) {
      reject(abortError(abortSignal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError(abortSignal));
    };
    const timer = setTimeout(() => {
      abortSignal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    abortSignal.addEventListener('abort', onAbort, { once: true });
  });
}
