/**
 * Rate limiting for the public API
 *
 * One in-memory limiter per application instance, keyed by client IP.
 */

import rateLimit from "express-rate-limit";
import type { Request, Response } from "express";
import type { ApiError } from "@shared/api-contracts";
import type { RateLimitSettings } from "../config/unified-config";
import { logger } from "../config/logger";

export function createApiRateLimiter(settings: RateLimitSettings) {
  return rateLimit({
    windowMs: settings.windowMs,
    limit: settings.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      logger.warn({ ip: req.ip, path: req.originalUrl }, "Rate limit exceeded");
      const body: ApiError = {
        success: false,
        error: "RATE_LIMIT_EXCEEDED",
        message: "Too many requests, please try again later",
        timestamp: new Date().toISOString(),
        details: { retryAfterSeconds: Math.ceil(settings.windowMs / 1000) },
      };
      res.status(429).json(body);
    },
  });
}
