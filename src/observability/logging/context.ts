// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING CONTEXT — AsyncLocalStorage Correlation
// Provisioning Resilience Engine — Observability
// ═══════════════════════════════════════════════════════════════════════════════
//
// Carries correlation fields (deployment transaction id and name) across
// awaits so every log line emitted while a deployment runs is tagged with it.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LoggingContext {
  readonly transactionId?: string;
  readonly transactionName?: string;
  readonly correlationId?: string;
}

const storage = new AsyncLocalStorage<LoggingContext>();

/**
 * Run a function with additional logging context.
 * Nested calls inherit and extend the outer context.
 */
export function runWithLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  const parent = storage.getStore() ?? {};
  return storage.run({ ...parent, ...context }, fn);
}

/**
 * Get the active logging context (empty outside any run).
 */
export function getLoggingContext(): LoggingContext {
  return storage.getStore() ?? {};
}

export function getTransactionId(): string | undefined {
  return storage.getStore()?.transactionId;
}

export function getCorrelationId(): string | undefined {
  return storage.getStore()?.correlationId;
}
