/**
 * ROUTE ERROR HANDLER: Standardized Result Pattern Integration
 * Provides centralized utilities for converting Result patterns to HTTP responses
 *
 * @fileoverview Every route answers with the same envelope: `{ success, data,
 * timestamp }` on success and `{ success, error, message, timestamp }` on
 * failure. Status codes come from the error itself, falling back to a code
 * table for errors that only carry a code.
 *
 * @example
 * ```typescript
 * import { handleRouteResult, sendSuccessResponse } from '../lib/route-error-handler';
 *
 * router.post('/combined', async (req, res) => {
 *   const result = await recommendationService.recommendCombined(body);
 *   handleRouteResult(result, res, (data) => sendSuccessResponse(res, data));
 * });
 * ```
 */

import { Response } from 'express';
import { Result, isFailure } from '@shared/result-types';
import type { ApiError, ApiResponse } from '@shared/api-contracts';
import {
  getErrorCode,
  getErrorDetails,
  getErrorMessage,
  getErrorTimestamp,
  isAppError
} from '@shared/type-utilities';
import { logger } from '../config/logger';

// ===== TYPES =====

/**
 * Callback function for handling successful results
 */
export type SuccessCallback<T> = (_data: T) => void;

export interface RouteErrorOptions {
  defaultErrorStatus?: number;
  logErrors?: boolean;
  includeErrorDetails?: boolean;
}

// ===== HTTP STATUS CODE MAPPING =====

const ERROR_STATUS_CODE_MAP: Record<string, number> = {
  // Client errors (4xx)
  'VALIDATION_ERROR': 400,
  'BAD_REQUEST': 400,
  'NOT_FOUND': 404,
  'METHOD_NOT_ALLOWED': 405,
  'CONFLICT': 409,
  'PAYLOAD_TOO_LARGE': 413,

  // Server errors (5xx)
  'INTERNAL_SERVER_ERROR': 500,
  'ROUTE_ERROR': 500,
  'SERVICE_UNAVAILABLE': 503,
};

/**
 * HTTP status for an error: its own status code when it is an application
 * error, otherwise the code table, otherwise the default
 */
export function getStatusCode(error: unknown, defaultStatus = 500): number {
  if (isAppError(error)) {
    return error.statusCode;
  }
  return ERROR_STATUS_CODE_MAP[getErrorCode(error)] ?? defaultStatus;
}

/**
 * Build the failure envelope for any error value
 */
export function createErrorResponse(
  error: unknown,
  options: { fallbackCode?: string; fallbackMessage?: string; includeErrorDetails?: boolean } = {}
): ApiError {
  const errorResponse: ApiError = {
    success: false,
    error: getErrorCode(error, options.fallbackCode),
    message: getErrorMessage(error, options.fallbackMessage),
    timestamp: getErrorTimestamp(error)
  };

  const details = getErrorDetails(error);
  if (options.includeErrorDetails && details) {
    errorResponse.details = details;
  }

  return errorResponse;
}

// ===== CORE HANDLER FUNCTIONS =====

/**
 * Handles a Result type and responds with appropriate HTTP status and JSON
 *
 * @param result - The Result object from a service call
 * @param res - Express Response object
 * @param successCallback - Function to call on success with the data
 */
export function handleRouteResult<T, E>(
  result: Result<T, E>,
  res: Response,
  successCallback: SuccessCallback<T>,
  options: RouteErrorOptions = {}
): void {
  const {
    defaultErrorStatus = 500,
    logErrors = true,
    includeErrorDetails = true
  } = options;

  if (isFailure(result)) {
    const statusCode = getStatusCode(result.error, defaultErrorStatus);

    if (logErrors && statusCode >= 500) {
      logger.error({
        error: result.error,
        statusCode,
        errorCode: getErrorCode(result.error)
      }, 'Route error occurred');
    }

    res.status(statusCode).json(createErrorResponse(result.error, { includeErrorDetails }));
    return;
  }

  successCallback(result.data);
}

/**
 * Handles thrown errors (not Result types) - used by route catch blocks
 */
export function handleRouteError(
  error: unknown,
  res: Response,
  options: RouteErrorOptions = {}
): void {
  const {
    defaultErrorStatus = 500,
    logErrors = true,
    includeErrorDetails = true
  } = options;

  const statusCode = getStatusCode(error, defaultErrorStatus);

  if (logErrors) {
    const logPayload = {
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
      statusCode
    };
    if (statusCode >= 500) {
      logger.error(logPayload, 'Unexpected route error');
    } else {
      logger.warn(logPayload, 'Route request rejected');
    }
  }

  res.status(statusCode).json(createErrorResponse(error, {
    fallbackCode: 'ROUTE_ERROR',
    fallbackMessage: 'An unexpected error occurred',
    includeErrorDetails: includeErrorDetails && statusCode < 500
  }));
}

// ===== CONVENIENCE FUNCTIONS =====

/**
 * Creates a success response with standard format
 */
export function createSuccessResponse<T>(data: T): ApiResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString()
  };
}

/**
 * Sends a standardized success response
 */
export function sendSuccessResponse<T>(res: Response, data: T, statusCode = 200): void {
  res.status(statusCode).json(createSuccessResponse(data));
}

/**
 * Result handling without custom success logic
 */
export function handleSimpleResult<T, E>(
  result: Result<T, E>,
  res: Response,
  successStatusCode = 200
): void {
  handleRouteResult(result, res, (data) => {
    sendSuccessResponse(res, data, successStatusCode);
  });
}
