/**
 * Environment Variable Validation and Type Safety
 *
 * Validates the environment once at start-up and exposes typed values.
 */

import { z } from 'zod';

// Environment variable schemas
export const ServerConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  CORS_ORIGIN: z.string().optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(120),
});

export const StorageConfigSchema = z.object({
  SEED_DATA_PATH: z.string().min(1).optional(),
});

export const RecommenderConfigSchema = z.object({
  RECOMMENDER_WEIGHT_COSINE: z.coerce.number().finite().min(0).default(0.6),
  RECOMMENDER_WEIGHT_LLR: z.coerce.number().finite().min(0).default(0.4),
  RECOMMENDER_NEIGHBOURHOOD_SIZE: z.coerce.number().int().min(1).max(100).default(5),
  RECOMMENDER_MAX_RECOMMENDED_SKILLS: z.coerce.number().int().min(0).max(100).default(10),
  RECOMMENDER_PEER_LIMIT: z.coerce.number().int().min(1).max(100).default(5),
}).refine(
  (env) => env.RECOMMENDER_WEIGHT_COSINE + env.RECOMMENDER_WEIGHT_LLR > 0,
  { message: 'At least one recommender weight must be positive', path: ['RECOMMENDER_WEIGHT_COSINE'] }
);

export const EnvironmentSchema = ServerConfigSchema
  .merge(StorageConfigSchema)
  .and(RecommenderConfigSchema);

// Type exports
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type RecommenderConfig = z.infer<typeof RecommenderConfigSchema>;
export type EnvironmentConfig = z.infer<typeof EnvironmentSchema>;

export type EnvValidationResult =
  | { success: true; data: EnvironmentConfig }
  | { success: false; errors: string[] };

// Validation utilities
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
  const parsed = EnvironmentSchema.safeParse(env);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  const errors = parsed.error.errors.map(err =>
    `${err.path.join('.')}: ${err.message}`
  );
  return { success: false, errors };
}
