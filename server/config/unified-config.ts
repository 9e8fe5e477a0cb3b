/**
 * Unified Configuration System
 *
 * Single source of truth for application configuration. Environment variables
 * are validated by the zod schemas in @shared/env-validation and turned into
 * a typed AppConfig; an invalid environment stops the process at start-up.
 */

import { validateEnvironment } from "@shared/env-validation";
import { Environment } from "../types/environment";
import { logger } from "./logger";
import {
  DEFAULT_RECOMMENDER_SETTINGS,
  type RecommenderSettings,
} from "../lib/unified-scoring-config";

export { Environment };

export interface RateLimitSettings {
  windowMs: number;
  max: number;
}

export interface AppConfig {
  env: Environment;
  port: number;
  host: string;

  security: {
    corsOrigins: string[];
    rateLimit: RateLimitSettings;
  };

  storage: {
    seedDataPath: string | null;
  };

  recommender: RecommenderSettings;
}

function toEnvironment(value: "development" | "test" | "production"): Environment {
  switch (value) {
    case "production":
      return Environment.Production;
    case "test":
      return Environment.Test;
    default:
      return Environment.Development;
  }
}

/**
 * Build the configuration object from an environment map
 *
 * @throws {Error} listing every invalid variable
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const validation = validateEnvironment(env);
  if (!validation.success) {
    throw new Error(`Invalid environment configuration: ${validation.errors.join("; ")}`);
  }
  const vars = validation.data;

  return {
    env: toEnvironment(vars.NODE_ENV),
    port: vars.PORT,
    host: vars.HOST,
    security: {
      corsOrigins: vars.CORS_ORIGIN
        ? vars.CORS_ORIGIN.split(",").map((origin) => origin.trim()).filter(Boolean)
        : [],
      rateLimit: {
        windowMs: vars.RATE_LIMIT_WINDOW_MS,
        max: vars.RATE_LIMIT_MAX,
      },
    },
    storage: {
      seedDataPath: vars.SEED_DATA_PATH ?? null,
    },
    recommender: {
      ...DEFAULT_RECOMMENDER_SETTINGS,
      weights: {
        cosine: vars.RECOMMENDER_WEIGHT_COSINE,
        llr: vars.RECOMMENDER_WEIGHT_LLR,
      },
      neighbourhoodSize: vars.RECOMMENDER_NEIGHBOURHOOD_SIZE,
      maxRecommendedSkills: vars.RECOMMENDER_MAX_RECOMMENDED_SKILLS,
      peerLimit: vars.RECOMMENDER_PEER_LIMIT,
    },
  };
}

export const config = buildConfig();

logger.debug({
  env: config.env,
  port: config.port,
  recommender: config.recommender,
}, "Configuration loaded");
