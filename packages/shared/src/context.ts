/**
 * AsyncLocalStorage Context Management
 *
 * Propagates a correlation ID (and the source being processed) through one
 * extraction call, whether it started from the CLI, the API or a plugin.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  sourceId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

/**
 * Run a function within a new AsyncLocalStorage context
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function within a new AsyncLocalStorage context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run inside the caller's context if there is one, otherwise open a fresh one
 * for the given source.
 */
export async function ensureContextAsync<T>(sourceId: string, fn: () => Promise<T>): Promise<T> {
  const existing = getContext();
  if (existing) {
    return fn();
  }
  return runWithContextAsync({ correlationId: ulid(), sourceId }, fn);
}

export { asyncLocalStorage };
