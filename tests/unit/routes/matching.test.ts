/**
 * Unit Tests for Matching Routes
 * Exercises the HTTP surface against an in-memory entity store
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../../server/app';
import { createMatchingService } from '../../../server/services/matching-service';
import { loadConfig } from '../../../server/config/unified-config';
import { MemEntityStorage } from '../../../server/storage';
import { FIXED_TIMESTAMP, must, needed } from '../../helpers/match-fixtures';

const skills = [must('python'), needed('sql')];

describe('Matching Routes', () => {
  let app: Express;
  let storage: MemEntityStorage;

  beforeEach(() => {
    storage = new MemEntityStorage([
      { id: 'cand-1', tenantId: 'tenant-a', kind: 'candidate', title: 'Data Analyst', skills, updatedAt: FIXED_TIMESTAMP },
      {
        id: 'job-1',
        tenantId: 'tenant-a',
        kind: 'job',
        title: 'Data Analyst',
        skills: [...skills, needed('excel')],
        updatedAt: FIXED_TIMESTAMP,
      },
      { id: 'cand-9', tenantId: 'tenant-b', kind: 'candidate', title: 'Data Analyst', skills, updatedAt: FIXED_TIMESTAMP },
    ]);
    app = createApp(createMatchingService(loadConfig({ NODE_ENV: 'test' }), storage));
  });

  describe('GET /api/matches/candidates/:candidateId/jobs', () => {
    test('should return ranked jobs in wire format', async () => {
      const response = await request(app)
        .get('/api/matches/candidates/cand-1/jobs')
        .set('x-tenant-id', 'tenant-a')
        .expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.k).toBe(5);
      expect(response.body.data.cached).toBe(false);
      expect(response.body.data.weights_version).toBe(1);
      expect(response.body.data.matches).toHaveLength(1);
      expect(response.body.data.matches[0]).toMatchObject({
        candidate_id: 'cand-1',
        job_id: 'job-1',
        score: 0.8725,
        must_ratio: 1,
        needed_ratio: 0.5,
        weighted_skill_score: 0.85,
        job_only_skills: ['excel'],
        distance_km: null,
        distance_score: null,
      });
    });

    test('should report a cached repeat', async () => {
      await request(app).get('/api/matches/candidates/cand-1/jobs').set('x-tenant-id', 'tenant-a');

      const response = await request(app)
        .get('/api/matches/candidates/cand-1/jobs')
        .set('x-tenant-id', 'tenant-a')
        .expect(200);

      expect(response.body.data.cached).toBe(true);
    });

    test('should answer a foreign id exactly like a missing one', async () => {
      const foreign = await request(app)
        .get('/api/matches/candidates/cand-9/jobs')
        .set('x-tenant-id', 'tenant-a')
        .expect(404);

      storage.remove('tenant-b', 'candidate', 'cand-9');
      const missing = await request(app)
        .get('/api/matches/candidates/cand-9/jobs')
        .set('x-tenant-id', 'tenant-a')
        .expect(404);

      expect(foreign.body.error).toEqual({
        code: 'NOT_FOUND',
        message: "Candidate with ID 'cand-9' not found",
      });
      expect(foreign.body.error).toEqual(missing.body.error);
    });

    test('should not resolve an anchor without a tenant header', async () => {
      const response = await request(app).get('/api/matches/candidates/cand-1/jobs').expect(404);

      expect(response.body.error.code).toBe('NOT_FOUND');
    });

    test('should reject an invalid K', async () => {
      const response = await request(app)
        .get('/api/matches/candidates/cand-1/jobs?k=0')
        .set('x-tenant-id', 'tenant-a')
        .expect(400);

      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  test('GET /api/matches/jobs/:jobId/candidates should rank candidates', async () => {
    const response = await request(app)
      .get('/api/matches/jobs/job-1/candidates?k=3&cityFilter=false')
      .set('x-tenant-id', 'tenant-a')
      .expect(200);

    expect(response.body.data.k).toBe(3);
    expect(response.body.data.matches.map((m: { candidate_id: string }) => m.candidate_id)).toEqual(['cand-1']);
  });

  test('GET /api/matches/explain/:candidateId/:jobId should list components', async () => {
    const response = await request(app)
      .get('/api/matches/explain/cand-1/job-1')
      .set('x-tenant-id', 'tenant-a')
      .expect(200);

    expect(response.body.data.score).toBe(0.8725);
    expect(response.body.data.degenerate_weights).toBe(false);
    expect(response.body.data.components.map((c: { name: string }) => c.name)).toEqual([
      'skill',
      'title',
      'semantic',
      'embedding',
      'distance',
    ]);
  });

  describe('weights', () => {
    test('should return the installed weights', async () => {
      const response = await request(app).get('/api/weights').expect(200);

      expect(response.body.data.weights.skill_weight).toBe(0.85);
      expect(response.body.data.weights.version).toBe(1);
      expect(response.body.data.warnings).toEqual([]);
    });

    test('should apply a valid update and report weight drift', async () => {
      const response = await request(app)
        .put('/api/weights')
        .send({ components: { title: 0.25 } })
        .expect(200);

      expect(response.body.data.weights.title_weight).toBe(0.25);
      expect(response.body.data.weights.version).toBe(2);
      expect(response.body.data.warnings).toEqual(['Component weights sum to 1.1000, expected about 1']);
    });

    test('should reject an out-of-range update and keep the old version', async () => {
      const response = await request(app)
        .put('/api/weights')
        .send({ components: { title: 2 } })
        .expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      const current = await request(app).get('/api/weights').expect(200);
      expect(current.body.data.weights.version).toBe(1);
    });

    test('should reject a body that is not JSON', async () => {
      const response = await request(app)
        .put('/api/weights')
        .set('Content-Type', 'application/json')
        .send('{"components":')
        .expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('cache', () => {
    test('should clear cached rankings', async () => {
      await request(app).get('/api/matches/candidates/cand-1/jobs').set('x-tenant-id', 'tenant-a');

      await request(app).delete('/api/matches/cache').expect(200);
      const stats = await request(app).get('/api/matches/cache/stats').expect(200);

      expect(stats.body.data.entries).toBe(0);
      expect(stats.body.data.capacity).toBe(500);
    });
  });

  test('should answer unknown routes with 404', async () => {
    const response = await request(app).get('/api/unknown').expect(404);

    expect(response.body.error.code).toBe('ROUTE_NOT_FOUND');
  });
});
