/**
 * Request context using AsyncLocalStorage
 *
 * The web server runs each request inside runWithRequestContext(); core
 * services read the client address and user agent from here when they
 * write audit entries. Outside a request (CLI, worker) there is no context.
 *
 * Uses run(), never enterWith(), so contexts cannot leak across requests.
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContext {
  requestId: string;
  ipAddress?: string;
  userAgent?: string;
  /** Filled in once authentication resolved the caller */
  userId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

export function runWithRequestContext<T>(context: RequestContext, callback: () => T): T {
  return asyncLocalStorage.run(context, callback);
}

/**
 * Record the authenticated user on the current context, if any
 */
export function setContextUser(userId: string): void {
  const store = asyncLocalStorage.getStore();
  if (store !== undefined) {
    store.userId = userId;
  }
}
