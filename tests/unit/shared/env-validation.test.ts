/**
 * Unit Tests for environment validation and configuration building
 */

import { describe, test, expect } from '@jest/globals';
import { validateEnvironment } from '../../../shared/env-validation';
import { buildConfig } from '../../../server/config/unified-config';

describe('validateEnvironment', () => {
  test('applies defaults to an empty environment', () => {
    const result = validateEnvironment({});

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.NODE_ENV).toBe('development');
    expect(result.data.PORT).toBe(5000);
    expect(result.data.RECOMMENDER_WEIGHT_COSINE).toBe(0.6);
    expect(result.data.RECOMMENDER_WEIGHT_LLR).toBe(0.4);
    expect(result.data.RECOMMENDER_NEIGHBOURHOOD_SIZE).toBe(5);
  });

  test('coerces numeric variables', () => {
    const result = validateEnvironment({ PORT: '8080', RECOMMENDER_WEIGHT_LLR: '0.25' });

    if (!result.success) throw new Error('expected success');
    expect(result.data.PORT).toBe(8080);
    expect(result.data.RECOMMENDER_WEIGHT_LLR).toBe(0.25);
  });

  test('reports invalid values', () => {
    const result = validateEnvironment({ PORT: 'not-a-port', NODE_ENV: 'staging' });

    if (result.success) throw new Error('expected failure');
    expect(result.errors.some((e) => e.startsWith('PORT:'))).toBe(true);
    expect(result.errors.some((e) => e.startsWith('NODE_ENV:'))).toBe(true);
  });

  test('rejects recommender weights that are both zero', () => {
    const result = validateEnvironment({ RECOMMENDER_WEIGHT_COSINE: '0', RECOMMENDER_WEIGHT_LLR: '0' });

    if (result.success) throw new Error('expected failure');
    expect(result.errors).toEqual(['RECOMMENDER_WEIGHT_COSINE: At least one recommender weight must be positive']);
  });
});

describe('buildConfig', () => {
  test('builds typed settings from the environment', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      CORS_ORIGIN: 'https://a.example, https://b.example',
      SEED_DATA_PATH: 'data/seed.json',
      RECOMMENDER_WEIGHT_COSINE: '0.7',
      RECOMMENDER_WEIGHT_LLR: '0.3',
      RECOMMENDER_PEER_LIMIT: '3',
    });

    expect(config.env).toBe('production');
    expect(config.security.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.security.rateLimit).toEqual({ windowMs: 60_000, max: 120 });
    expect(config.storage.seedDataPath).toBe('data/seed.json');
    expect(config.recommender).toEqual({
      weights: { cosine: 0.7, llr: 0.3 },
      neighbourhoodSize: 5,
      maxRecommendedSkills: 10,
      peerLimit: 3,
    });
  });

  test('throws on an invalid environment', () => {
    expect(() => buildConfig({ RECOMMENDER_NEIGHBOURHOOD_SIZE: '0' })).toThrow(/Invalid environment configuration/);
  });
});
