/**
 * Unit Tests for catalogue, user and health routes
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../../server/app';
import { MemStorage } from '../../../server/storage';
import { twoJobSeed } from '../../helpers/catalog-fixtures';
import { API_ROUTES, buildRoute } from '../../../shared/api-contracts';

describe('Catalogue Routes', () => {
  let app: Express;

  beforeEach(() => {
    app = createApp({ storage: new MemStorage(twoJobSeed()) });
  });

  describe('health', () => {
    test('GET /api/v1/health reports a healthy service', async () => {
      const response = await request(app).get(API_ROUTES.HEALTH).expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.status).toBe('healthy');
      expect(response.body.data.environment).toBe('test');
    });

    test('echoes the caller request id', async () => {
      const response = await request(app)
        .get('/api/v1/health')
        .set('X-Request-Id', 'req-test-1')
        .expect(200);

      expect(response.headers['x-request-id']).toBe('req-test-1');
    });
  });

  describe('skills', () => {
    test('GET /api/v1/skills lists the catalogue', async () => {
      const response = await request(app).get('/api/v1/skills').expect(200);

      expect(response.body.data.total).toBe(5);
      expect(response.body.data.skills[0]).toEqual({ id: 1, name: 'Python' });
    });

    test('POST /api/v1/skills creates a skill', async () => {
      const response = await request(app).post('/api/v1/skills').send({ name: ' Kafka ' }).expect(201);

      expect(response.body.data.skill).toEqual({ id: 6, name: 'Kafka' });
    });

    test('POST /api/v1/skills answers 409 for a duplicate', async () => {
      const response = await request(app).post('/api/v1/skills').send({ name: 'sql' }).expect(409);

      expect(response.body).toMatchObject({ success: false, error: 'CONFLICT', message: "Skill 'SQL' already exists" });
    });

    test('POST /api/v1/skills answers 400 for an empty name', async () => {
      const response = await request(app).post('/api/v1/skills').send({ name: '   ' }).expect(400);

      expect(response.body.message).toBe('Validation failed: name: Skill name is required');
    });
  });

  describe('jobs', () => {
    test('POST /api/v1/jobs creates a job and GET returns it', async () => {
      const created = await request(app)
        .post('/api/v1/jobs')
        .send({ title: 'Data Engineer', skillIds: [1, 2] })
        .expect(201);

      expect(created.body.data.job).toEqual({
        id: 3,
        title: 'Data Engineer',
        description: '',
        requiredSkills: [{ id: 1, name: 'Python' }, { id: 2, name: 'SQL' }],
      });

      const fetched = await request(app).get(buildRoute(API_ROUTES.JOBS.GET_BY_ID, { id: 3 })).expect(200);
      expect(fetched.body.data.job.title).toBe('Data Engineer');
    });

    test('POST /api/v1/jobs rejects unknown skills', async () => {
      const response = await request(app)
        .post('/api/v1/jobs')
        .send({ title: 'Data Engineer', skillIds: [1, 99] })
        .expect(400);

      expect(response.body.message).toBe('One or more skills not found');
      expect(response.body.details).toEqual({ skillIds: [99] });
    });

    test('GET /api/v1/jobs/:id answers 404 for a missing job', async () => {
      const response = await request(app).get('/api/v1/jobs/9').expect(404);

      expect(response.body.error).toBe('NOT_FOUND');
    });

    test('GET /api/v1/jobs lists the corpus', async () => {
      const response = await request(app).get('/api/v1/jobs').expect(200);

      expect(response.body.data.jobs.map((job: { id: number }) => job.id)).toEqual([1, 2]);
    });
  });

  describe('users', () => {
    test('PUT /api/v1/users/:id/skills replaces the skills', async () => {
      const response = await request(app).put(buildRoute(API_ROUTES.USERS.UPDATE_SKILLS, { id: 1 })).send({ skillIds: [3] }).expect(200);

      expect(response.body.data.user.skills).toEqual([{ id: 3, name: 'FastAPI' }]);
    });

    test('GET /api/v1/users/:id/skill-recommendations returns peer skills', async () => {
      const response = await request(app).get(`${buildRoute(API_ROUTES.USERS.SKILL_RECOMMENDATIONS, { id: 2 })}?limit=3`).expect(200);

      expect(response.body.data.similar_users).toEqual([{ user_id: 1, username: 'ada', llr_score: expect.any(Number) }]);
      expect(response.body.data.recommended_skills).toEqual([{ skill_id: 2, skill_name: 'SQL' }]);
    });

    test('GET /api/v1/users/:id answers 404 for a missing user', async () => {
      await request(app).get(buildRoute(API_ROUTES.USERS.GET_BY_ID, { id: 55 })).expect(404);
    });
  });

  describe('rate limiting', () => {
    test('answers 429 once the window allowance is spent', async () => {
      const limited = createApp({ storage: new MemStorage(twoJobSeed()), rateLimit: { windowMs: 60_000, max: 2 } });

      await request(limited).get(API_ROUTES.HEALTH).expect(200);
      await request(limited).get(API_ROUTES.HEALTH).expect(200);
      const response = await request(limited).get(API_ROUTES.HEALTH).expect(429);

      expect(response.body).toMatchObject({
        success: false,
        error: 'RATE_LIMIT_EXCEEDED',
        details: { retryAfterSeconds: 60 },
      });
    });
  });

  describe('errors', () => {
    test('answers 400 for malformed JSON', async () => {
      const response = await request(app)
        .post('/api/v1/recommendations/combined')
        .set('Content-Type', 'application/json')
        .send('{"userId": 1')
        .expect(400);

      expect(response.body).toMatchObject({ success: false, error: 'BAD_REQUEST', message: 'Malformed JSON in request body' });
    });

    test('answers 404 for unknown API routes', async () => {
      const response = await request(app).get('/api/v1/nothing-here').expect(404);

      expect(response.body).toMatchObject({
        success: false,
        error: 'NOT_FOUND',
        message: "Route 'GET /api/v1/nothing-here' not found",
      });
    });
  });
});
