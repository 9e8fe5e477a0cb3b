/**
 * Global Error Handler Middleware
 *
 * Last stop for errors that escape a route: malformed JSON bodies, oversized
 * payloads, unknown routes and anything unexpected. Application errors keep
 * their own status and code; everything else becomes a 500 whose message is
 * hidden outside development.
 */

import { Request, Response, NextFunction } from 'express';
import { AppNotFoundError, BaseAppError } from '@shared/errors';
import type { ApiError } from '@shared/api-contracts';
import { logger } from '../config/logger';
import { config } from '../config/unified-config';

// Sensitive fields that should be redacted from logged request data
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'secret',
  'key',
  'auth',
  'credential',
  'session',
];

/**
 * Shape of the errors raised by express.json() (body-parser)
 */
interface BodyParserError extends Error {
  type: string;
  status?: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return error instanceof Error && 'type' in error && typeof error.type === 'string';
}

/**
 * Redact sensitive information from logged data
 */
export function redactSensitiveData(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSensitiveData);
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const keyLower = key.toLowerCase();
    if (SENSITIVE_FIELDS.some(field => keyLower.includes(field))) {
      redacted[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null) {
      redacted[key] = redactSensitiveData(value);
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

/**
 * Map any thrown value to a status code and response body
 */
export function categorizeError(error: unknown): { statusCode: number; body: ApiError } {
  const timestamp = new Date().toISOString();

  if (error instanceof BaseAppError) {
    return {
      statusCode: error.statusCode,
      body: {
        success: false,
        error: error.code,
        message: error.message,
        timestamp: error.timestamp,
        ...(error.details && error.statusCode < 500 ? { details: error.details } : {}),
      },
    };
  }

  if (isBodyParserError(error)) {
    if (error.type === 'entity.parse.failed') {
      return {
        statusCode: 400,
        body: { success: false, error: 'BAD_REQUEST', message: 'Malformed JSON in request body', timestamp },
      };
    }
    if (error.type === 'entity.too.large') {
      return {
        statusCode: 413,
        body: { success: false, error: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large', timestamp },
      };
    }
  }

  return {
    statusCode: 500,
    body: {
      success: false,
      error: 'INTERNAL_SERVER_ERROR',
      message: config.env === 'development' && error instanceof Error
        ? error.message
        : 'An unexpected error occurred. Please try again later.',
      timestamp,
    },
  };
}

/**
 * 404 for any request no route answered
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppNotFoundError.route(`${req.method} ${req.baseUrl}${req.path}`));
}

/**
 * Main global error handler middleware
 */
export function globalErrorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Skip if response already sent
  if (res.headersSent) {
    return next(err);
  }

  const { statusCode, body } = categorizeError(err);

  const requestContext = {
    id: req.id,
    method: req.method,
    url: req.originalUrl,
    params: req.params,
    query: redactSensitiveData(req.query),
  };

  const logLevel = statusCode >= 500 ? 'error' : 'warn';
  logger[logLevel]({
    error: {
      message: err instanceof Error ? err.message : String(err),
      code: body.error,
      statusCode,
      stack: config.env !== 'production' && err instanceof Error ? err.stack : undefined,
    },
    request: requestContext,
  }, `${body.error}: ${body.message}`);

  res.status(statusCode).json(body);
}

/**
 * Handler for unhandled promise rejections
 */
export function handleUnhandledRejection(reason: unknown): void {
  logger.error({
    error: {
      message: 'Unhandled Promise Rejection',
      reason: String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    }
  }, 'Unhandled Promise Rejection detected');

  if (config.env === 'production') {
    logger.error('Shutting down due to unhandled promise rejection');
    process.exit(1);
  }
}

/**
 * Handler for uncaught exceptions
 */
export function handleUncaughtException(error: Error): void {
  logger.fatal({
    error: {
      message: error.message,
      stack: error.stack,
    }
  }, 'Uncaught Exception detected');

  process.exit(1);
}

/**
 * Initialize process-level error handlers
 */
export function initializeGlobalErrorHandling(): void {
  process.on('unhandledRejection', handleUnhandledRejection);
  process.on('uncaughtException', handleUncaughtException);

  logger.info('Global error handlers initialized');
}
