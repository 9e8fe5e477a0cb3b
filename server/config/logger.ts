import pino, { type LoggerOptions } from "pino";
import type { Options as HttpLoggerOptions } from "pino-http";
import { v4 as uuidv4 } from "uuid";
import { Environment } from "../types/environment";

/**
 * Logger Configuration
 *
 * In development, logs go through pino-pretty for human-readable output.
 * In production, JSON lines suitable for log aggregation are written.
 * Tests only surface errors.
 */

const logLevels: Record<Environment, string> = {
  [Environment.Development]: "debug",
  [Environment.Test]: "error",
  [Environment.Production]: "info",
};

function resolveEnvironment(value: string | undefined): Environment {
  switch (value) {
    case Environment.Development:
    case Environment.Test:
    case Environment.Production:
      return value;
    default:
      return Environment.Development;
  }
}

const environment = resolveEnvironment(process.env.NODE_ENV);

const baseConfig: LoggerOptions = {
  level: process.env.LOG_LEVEL || logLevels[environment],
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      'res.headers["set-cookie"]',
      "*.password",
      "*.secret",
    ],
    censor: "[REDACTED]",
  },
};

const developmentConfig: LoggerOptions = {
  ...baseConfig,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  },
};

const productionConfig: LoggerOptions = {
  ...baseConfig,
  base: {
    env: environment,
    version: process.env.npm_package_version,
    nodeVersion: process.version,
  },
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

export const logger = pino(
  environment === Environment.Development ? developmentConfig : productionConfig
);

export const httpLoggerConfig: HttpLoggerOptions = {
  logger,

  // Reuse the caller's request id when present so logs correlate across services
  genReqId: (req, res) => {
    const header = req.headers["x-request-id"];
    const id = typeof header === "string" && header.length > 0 ? header : uuidv4();
    res.setHeader("X-Request-Id", id);
    return id;
  },

  serializers: {
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
    err: pino.stdSerializers.err,
  },

  customLogLevel: (_req, res, err) => {
    if (res.statusCode >= 500 || err) {
      return "error";
    } else if (res.statusCode >= 400) {
      return "warn";
    }
    return "info";
  },

  autoLogging: {
    ignore: (req) => environment === Environment.Production && req.url === "/api/v1/health",
  },
};
