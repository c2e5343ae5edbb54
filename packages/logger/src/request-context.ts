/**
 * @fileoverview Request context propagation with AsyncLocalStorage.
 *
 * A scheduler cycle or a read-path refresh runs inside one context so every
 * log line it produces shares a request_id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** UUID v4 unless the caller supplied one */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Runs `fn` inside a new request context.
 *
 * @param requestId - Defaults to a fresh UUID
 * @param additionalContext - Extra fields visible through getRequestContext()
 *
 * @example
 * ```typescript
 * await withRequestContext(() => scheduler.runCycle(), undefined, { operation: 'refresh-cycle' });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId || generateRequestId(),
  };

  return requestContextStorage.run(context, fn);
}
