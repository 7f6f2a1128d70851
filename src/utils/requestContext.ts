/**
 * Request Context
 *
 * Uses Node.js `AsyncLocalStorage` to propagate request-scoped context
 * across the call chain without passing it through every function signature.
 *
 * HTTP requests carry a `requestId`; orchestrator runs carry a `runId` and
 * the job name. The logger reads whichever is present.
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContext {
  /** Unique identifier for the HTTP request. */
  requestId?: string;
  /** Unique identifier for a single orchestrator job run. */
  runId?: string;
  job?: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current context, or `undefined` outside a request or job run
 * (e.g., during startup).
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContext.getStore();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return requestContext.run(context, fn);
}
