/**
 * Unit Tests for Recommendation Routes
 * Exercises the HTTP layer against an in-process app over MemStorage
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../../server/app';
import { MemStorage } from '../../../server/storage';
import { twoJobSeed } from '../../helpers/catalog-fixtures';

describe('Recommendation Routes', () => {
  let app: Express;

  beforeEach(() => {
    app = createApp({ storage: new MemStorage(twoJobSeed()) });
  });

  describe('POST /api/v1/recommendations/combined', () => {
    test('ranks jobs for a stored user', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/combined')
        .send({ userId: 1 })
        .expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.algorithm).toBe('combined');
      expect(response.body.data.combined_recommendations.top_recommendation).toEqual({
        job_id: 1,
        title: 'Backend Engineer',
        skills: ['Python', 'SQL', 'FastAPI'],
        cosine_score: 0.8165,
        llr_score: 2.911,
        llr_normalized: 1,
        combined_score: 0.8899,
      });
      expect(response.body.data.summary).toEqual({ total_jobs_analyzed: 2, user_skills_count: 2 });
    });

    test('rejects weights that are both zero', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/combined')
        .send({ skillIds: [1, 2], weights: { cosine: 0, llr: 0 } })
        .expect(400);

      expect(response.body).toMatchObject({
        success: false,
        error: 'VALIDATION_ERROR',
        message: 'Invalid scoring weights: at least one weight must be positive',
      });
    });

    test('rejects a body with both userId and skillIds', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/combined')
        .send({ userId: 1, skillIds: [1] })
        .expect(400);

      expect(response.body.error).toBe('VALIDATION_ERROR');
      expect(response.body.message).toBe('Validation failed: userId: Provide exactly one of userId or skillIds');
    });

    test('answers 404 for an unknown user', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/combined')
        .send({ userId: 12 })
        .expect(404);

      expect(response.body.message).toBe("User with ID '12' not found");
    });
  });

  describe('single-algorithm endpoints', () => {
    test('POST /cosine returns the cosine ranking', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/cosine')
        .send({ skillIds: [4, 5] })
        .expect(200);

      expect(response.body.data.top_recommendation.job_id).toBe(2);
      expect(response.body.data.top_recommendation.cosine_score).toBe(1);
    });

    test('POST /llr honours the limit', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/llr')
        .send({ skillIds: [1], limit: 1 })
        .expect(200);

      expect(response.body.data.all_recommendations).toHaveLength(1);
      expect(response.body.data.total_jobs_analyzed).toBe(2);
    });

    test('returns a null top recommendation for a user without skills', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/cosine')
        .send({ skillIds: [] })
        .expect(200);

      expect(response.body.data.top_recommendation).toBeNull();
    });
  });

  describe('POST /api/v1/recommendations/jobs/:jobId/skills-analysis', () => {
    test('returns the gap analysis of one job', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/jobs/1/skills-analysis')
        .send({ userId: 1 })
        .expect(200);

      expect(response.body.data.stats).toEqual({
        total_user_skills: 2,
        total_job_skills: 3,
        matching_count: 2,
        missing_count: 1,
        recommended_count: 0,
        match_percentage: 66.7,
      });
    });

    test('answers 404 for an unknown job', async () => {
      await request(app)
        .post('/api/v1/recommendations/jobs/30/skills-analysis')
        .send({ userId: 1 })
        .expect(404);
    });

    test('answers 400 for a non-numeric job id', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/jobs/abc/skills-analysis')
        .send({ userId: 1 })
        .expect(400);

      expect(response.body.message).toBe("Field 'jobId' has invalid format. Expected: positive integer");
    });
  });
});
