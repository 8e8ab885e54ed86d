/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID and upload metadata through one attestation
 * request so every log line can be tied back to it.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';
import type { Language } from './types';

export interface RequestContext {
  correlationId: string;
  fileName?: string;
  language?: Language;
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
