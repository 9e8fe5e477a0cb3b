import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import { registerV1Routes } from "./routes";
import { config } from "./config/unified-config";
import { initializeMonitoring } from "./monitoring/middleware";
import { globalErrorHandler, notFoundHandler } from "./middleware/global-error-handler";
import { setStorage, type IStorage } from "./storage";
import { createApiRateLimiter } from "./middleware/rate-limiter";
import type { RateLimitSettings } from "./config/unified-config";

export interface CreateAppOptions {
  /** Storage to serve from; when omitted the process-wide storage must already be initialized */
  storage?: IStorage;
  /** Overrides the configured request limit for /api */
  rateLimit?: RateLimitSettings;
}

/**
 * Build the Express application without binding a port
 */
export function createApp(options: CreateAppOptions = {}): Express {
  if (options.storage) {
    setStorage(options.storage);
  }

  const app = express();

  app.disable("x-powered-by");

  app.use(helmet({
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    referrerPolicy: { policy: "strict-origin-when-cross-origin" },
  }));

  app.use(cors({
    origin: config.security.corsOrigins.length > 0 ? config.security.corsOrigins : true,
    methods: ["GET", "POST", "PUT", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-Id"],
    exposedHeaders: ["X-Request-Id"],
  }));

  app.use(express.json({ limit: "1mb" }));

  initializeMonitoring(app);

  app.use("/api", createApiRateLimiter(options.rateLimit ?? config.security.rateLimit));

  registerV1Routes(app);

  app.use("/api", notFoundHandler);
  app.use(globalErrorHandler);

  return app;
}
