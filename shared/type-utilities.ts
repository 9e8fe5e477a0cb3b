/**
 * Type-safe accessors for error values of unknown shape
 */

import type { AppError } from './result-types';

// ===== ERROR HANDLING UTILITIES =====

/**
 * Type guard to check if an error has AppError properties
 */
export function isAppError(error: unknown): error is AppError {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const candidate: { code?: unknown; message?: unknown; statusCode?: unknown } = error;
  return (
    typeof candidate.code === 'string' &&
    typeof candidate.message === 'string' &&
    typeof candidate.statusCode === 'number'
  );
}

export function getErrorCode(error: unknown, fallback = 'UNKNOWN_ERROR'): string {
  if (isAppError(error)) {
    return error.code;
  }
  return fallback;
}

export function getErrorMessage(error: unknown, fallback = 'An unknown error occurred'): string {
  if (isAppError(error)) {
    return error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return fallback;
}

/**
 * Returns the error's own timestamp, or the current time when it has none
 */
export function getErrorTimestamp(error: unknown): string {
  if (isAppError(error) && error.timestamp) {
    return error.timestamp;
  }
  return new Date().toISOString();
}

export function getErrorDetails(error: unknown): Record<string, unknown> | undefined {
  if (isAppError(error)) {
    return error.details;
  }
  return undefined;
}
