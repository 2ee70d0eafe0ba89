// src/core/http/HooksDispatcher.ts

import type { ClientHooks, RequestInfo } from './types';
import type { Logger } from '../../observability/Logger';
import type { CallError } from '../../utils/errors';

/**
 * Runs the caller's call-level hooks. A hook that throws or rejects is logged
 * and otherwise ignored; it never changes the call's outcome.
 */
export class HooksDispatcher {
  constructor(
    private hooks: ClientHooks,
    private logger: Logger
  ) {}

  async preRequest(info: RequestInfo): Promise<void> {
    await this.invoke('preRequest', info, () => this.hooks.preRequest?.(info));
  }

  async postRequest(info: RequestInfo, status: number): Promise<void> {
    await this.invoke('postRequest', info, () => this.hooks.postRequest?.(info, status));
  }

  async onError(info: RequestInfo, error: CallError): Promise<void> {
    await this.invoke('onError', info, () => this.hooks.onError?.(info, error));
  }

  private async invoke(
    hook: keyof ClientHooks,
    info: RequestInfo,
    run: () => void | Promise<void>
  ): Promise<void> {
    try {
      await run();
    } catch (error) {
      this.logger.error('Request hook failed', {
        hook,
        method: info.method,
        path: info.path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
