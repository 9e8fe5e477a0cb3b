/**
 * Result pattern for service-level error handling
 *
 * Services never throw across their public boundary: they return either a
 * `Success` carrying data or a `Failure` carrying a typed application error.
 *
 * @example
 * ```typescript
 * const result = await recommendationService.recommendCombined({ userId: 3 });
 *
 * if (isSuccess(result)) {
 *   console.log(result.data.combined_recommendations.top_recommendation);
 * } else {
 *   console.error(result.error.code); // 'VALIDATION_ERROR' | 'NOT_FOUND' ...
 * }
 * ```
 */

// ===== CORE RESULT TYPES =====

/**
 * Result type representing either success with data or failure with error
 *
 * @template T - The type of data returned on success
 * @template E - The type of error returned on failure (defaults to AppError)
 */
export type Result<T, E = AppError> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly success: true;
  readonly data: T;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
}

// ===== RESULT CONSTRUCTORS =====

export const success = <T>(data: T): Success<T> => ({ success: true, data });

export const failure = <E>(error: E): Failure<E> => ({ success: false, error });

// Base application error interface
export interface AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  readonly timestamp?: string;
}

// Specific error types for different domains
export interface ValidationError extends AppError {
  readonly code: 'VALIDATION_ERROR';
  readonly field?: string;
  readonly validationRules?: string[];
}

export interface NotFoundError extends AppError {
  readonly code: 'NOT_FOUND';
  readonly resource: string;
  readonly id?: string | number;
}

export interface ConflictError extends AppError {
  readonly code: 'CONFLICT';
  readonly resource: string;
}

// Result types for specific operations
export type RecommendationResult<T> = Result<T, ValidationError | NotFoundError>;
export type CatalogResult<T> = Result<T, ValidationError | NotFoundError | ConflictError>;

// ===== TYPE GUARDS =====

/**
 * Type guard to check if a Result is a Success
 *
 * @example
 * ```typescript
 * if (isSuccess(result)) {
 *   console.log(result.data); // TypeScript knows this is T
 * }
 * ```
 */
export const isSuccess = <T, E>(result: Result<T, E>): result is Success<T> => {
  return result.success === true;
};

export const isFailure = <T, E>(result: Result<T, E>): result is Failure<E> => {
  return result.success === false;
};

// ===== RESULT TRANSFORMATION UTILITIES =====

/**
 * Transforms the data in a successful Result while preserving failures
 *
 * @example
 * ```typescript
 * const jobResult = success({ id: 1, title: 'Data Engineer' });
 * const titleResult = mapResult(jobResult, job => job.title);
 * ```
 */
export const mapResult = <T, U, E>(
  result: Result<T, E>,
  transform: (data: T) => U
): Result<U, E> => {
  return isSuccess(result)
    ? success(transform(result.data))
    : result;
};
