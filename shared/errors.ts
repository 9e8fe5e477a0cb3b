/**
 * Concrete error classes with proper status codes
 *
 * @fileoverview Every error the recommender raises on purpose is one of these
 * classes. Each carries a stable `code`, an HTTP `statusCode` and a creation
 * timestamp, so routes can turn it into a response without inspecting it.
 *
 * @example
 * ```typescript
 * const error = AppValidationError.invalidWeights('both weights are zero');
 * console.log(error.code);        // 'VALIDATION_ERROR'
 * console.log(error.statusCode);  // 400
 *
 * const appError = toAppError(unknownError, 'job_creation');
 * ```
 */

import type {
  AppError,
  ValidationError,
  NotFoundError,
  ConflictError
} from './result-types';

// ===== BASE ERROR CLASS =====

/**
 * Base error class that all application errors extend
 */
export class BaseAppError extends Error implements AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  /** ISO timestamp when error was created */
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.message = message;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where error was thrown (Node.js only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Converts the error to a JSON-serializable object
   */
  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp
    };
  }
}

// ===== VALIDATION ERRORS (400) =====

/**
 * Validation error for invalid input data
 *
 * @example
 * ```typescript
 * const error = AppValidationError.invalidFormat('id', 'positive integer');
 * const error = new AppValidationError('limit must be positive', 'limit', ['min']);
 * ```
 */
export class AppValidationError extends BaseAppError implements ValidationError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly field?: string;
  readonly validationRules?: string[];

  constructor(
    message: string,
    field?: string,
    validationRules?: string[],
    details?: Record<string, unknown>
  ) {
    super('VALIDATION_ERROR', message, 400, details);
    this.field = field;
    this.validationRules = validationRules;
  }

  static invalidFormat(field: string, expectedFormat: string): AppValidationError {
    return new AppValidationError(
      `Field '${field}' has invalid format. Expected: ${expectedFormat}`,
      field,
      ['format']
    );
  }

  static invalidWeights(reason: string, weights: { cosine: number; llr: number }): AppValidationError {
    return new AppValidationError(
      `Invalid scoring weights: ${reason}`,
      'weights',
      ['weights'],
      { weights }
    );
  }

  static unknownSkills(skillIds: number[]): AppValidationError {
    return new AppValidationError(
      'One or more skills not found',
      'skillIds',
      ['exists'],
      { skillIds }
    );
  }
}

// Not found errors (404)
export class AppNotFoundError extends BaseAppError implements NotFoundError {
  readonly code = 'NOT_FOUND' as const;
  readonly resource: string;
  readonly id?: string | number;

  constructor(resource: string, id?: string | number, details?: Record<string, unknown>) {
    const message = id !== undefined
      ? `${resource} with ID '${id}' not found`
      : `${resource} not found`;
    super('NOT_FOUND', message, 404, details);
    this.resource = resource;
    this.id = id;
  }

  static job(id: number): AppNotFoundError {
    return new AppNotFoundError('Job', id);
  }

  static user(id: number): AppNotFoundError {
    return new AppNotFoundError('User', id);
  }

  static route(path: string): AppNotFoundError {
    return new AppNotFoundError(`Route '${path}'`);
  }
}

// Conflict errors (409)
export class AppConflictError extends BaseAppError implements ConflictError {
  readonly code = 'CONFLICT' as const;
  readonly resource: string;

  constructor(resource: string, message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, 409, details);
    this.resource = resource;
  }

  static duplicateSkill(name: string): AppConflictError {
    return new AppConflictError('Skill', `Skill '${name}' already exists`, { name });
  }
}

// ===== ERROR CONVERSION UTILITIES =====

/**
 * Converts unknown errors to typed AppError instances
 *
 * @param context - Where the error occurred, kept in the message of errors
 * that could not be classified
 */
export function toAppError(error: unknown, context = 'Unknown operation'): AppError {
  if (error instanceof BaseAppError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.message.includes('not found')) {
      return new AppNotFoundError('Resource');
    }

    if (error.message.includes('validation') || error.message.includes('invalid')) {
      return new AppValidationError(error.message);
    }

    return new BaseAppError(
      'INTERNAL_SERVER_ERROR',
      `Operation '${context}' failed: ${error.message}`,
      500
    );
  }

  // Fallback for non-Error objects (strings, objects, etc.)
  return new BaseAppError(
    'UNKNOWN_ERROR',
    `Unknown error in ${context}: ${String(error)}`,
    500,
    { originalError: error }
  );
}
