// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE ERRORS — Shared Error Codes and Base Class
// Provisioning Resilience Engine — Core Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Stable error codes carried by every engine error.
 */
export const ErrorCode = {
  CIRCUIT_OPEN: 'CIRCUIT_OPEN',
  RETRY_CANCELLED: 'RETRY_CANCELLED',
  ROLLBACK_FAILED: 'ROLLBACK_FAILED',
  SECRET_NOT_FOUND: 'SECRET_NOT_FOUND',
  SECRET_STORE_ERROR: 'SECRET_STORE_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Base class for errors raised by the engine itself.
 *
 * Errors thrown by wrapped operations are never converted into EngineError;
 * they propagate with their original identity.
 */
export abstract class EngineError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Check whether a value is an engine error with the given code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return error instanceof EngineError && error.code === code;
}
