import type { Express, Request, Response, NextFunction } from 'express';
import pinoHttp from 'pino-http';
import { logger, httpLoggerConfig } from '../config/logger';

const SLOW_REQUEST_THRESHOLD_MS = 1000;

// Create HTTP request logger middleware
export const httpLogger = pinoHttp(httpLoggerConfig);

/**
 * Request timing middleware
 * Records the response time on res.locals and flags slow requests
 */
export function requestTiming(req: Request, res: Response, next: NextFunction) {
  const startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    res.locals.responseTime = duration;

    if (duration > SLOW_REQUEST_THRESHOLD_MS) {
      logger.warn({
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        responseTime: duration,
      }, 'Slow request detected');
    }
  });

  next();
}

/**
 * Attach request logging and timing to the app
 */
export function initializeMonitoring(app: Express): void {
  app.use(httpLogger);
  app.use(requestTiming);
  logger.debug('Request monitoring initialized');
}
