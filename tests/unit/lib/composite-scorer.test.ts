/**
 * Unit Tests for the Composite Scorer
 * Renormalization, degenerate weights, tenant isolation and ranking order
 */

import { describe, test, expect } from '@jest/globals';
import {
  combineComponents,
  compareMatches,
  rankPool,
  scorePair,
} from '../../../server/lib/composite-scorer';
import { AppNotFoundError, AppTenantMismatchError } from '@shared/errors';
import type { ComponentScore } from '@shared/api-contracts';
import type { ComponentName } from '@shared/schema';
import { candidate, job, makeWeights, must, needed } from '../../helpers/match-fixtures';

const absent: ComponentScore = { present: false, reason: 'missing_location' };
const value = (v: number): ComponentScore => ({ present: true, value: v });

function components(overrides: Partial<Record<ComponentName, ComponentScore>>) {
  return {
    skill: value(0),
    title: { present: false, reason: 'missing_title' } as const,
    semantic: { present: false, reason: 'missing_text' } as const,
    embedding: { present: false, reason: 'missing_embedding' } as const,
    distance: absent,
    ...overrides,
  };
}

describe('Composite Scorer', () => {
  describe('combineComponents', () => {
    test('should weight present components', () => {
      const combined = combineComponents(
        components({ skill: value(0.5), title: value(0.9) }),
        makeWeights().components
      );

      expect(combined.score).toBeCloseTo(0.56, 10);
      expect(combined.effectiveWeights.skill).toBeCloseTo(0.85, 10);
      expect(combined.effectiveWeights.title).toBeCloseTo(0.15, 10);
      expect(combined.degenerate).toBe(false);
    });

    test('should renormalize over present components only', () => {
      const weights = makeWeights({ components: { skill: 0.5, title: 0.2, distance: 0.3 } }).components;

      const combined = combineComponents(components({ skill: value(1), title: value(0.5) }), weights);

      expect(combined.score).toBeCloseTo(0.6 / 0.7, 10);
      expect(combined.effectiveWeights.distance).toBe(0);
      expect(combined.effectiveWeights.skill).toBeCloseTo(0.5 / 0.7, 10);
    });

    test('should fall back to the skill score when no active weight remains', () => {
      const weights = makeWeights({ components: { skill: 0, title: 0 } }).components;

      const combined = combineComponents(components({ skill: value(0.4), title: value(1) }), weights);

      expect(combined).toEqual({
        score: 0.4,
        effectiveWeights: { skill: 1, title: 0, semantic: 0, embedding: 0, distance: 0 },
        degenerate: true,
      });
    });
  });

  describe('scorePair', () => {
    test('should combine skill and title for a pair without coordinates or embeddings', () => {
      const anchor = candidate('cand-1', { title: 'Data Analyst', skills: [must('python'), needed('sql')] });
      const posting = job('job-1', {
        title: 'Data Analyst',
        skills: [must('python'), needed('sql'), needed('excel')],
      });

      const result = scorePair(anchor, posting, makeWeights());

      expect(result.breakdown.skill.weightedScore).toBeCloseTo(0.85, 10);
      expect(result.breakdown.components.title).toEqual({ present: true, value: 1 });
      expect(result.breakdown.components.distance.present).toBe(false);
      expect(result.score).toBeCloseTo(0.85 * 0.85 + 0.15 * 1, 10);
      expect(result.tieBreakKey).toBe('job-1');
      expect(result.weightsVersion).toBe(1);
    });

    test('should include distance when both sides have coordinates', () => {
      const weights = makeWeights({ components: { skill: 0.5, title: 0, distance: 0.5 } });
      const anchor = candidate('cand-1', { skills: [must('go')], location: { lat: 32.08, lon: 34.78 } });
      const posting = job('job-1', { skills: [must('go')], location: { lat: 32.08, lon: 34.78 } });

      const result = scorePair(anchor, posting, weights);

      expect(result.breakdown.distanceKm).toBe(0);
      expect(result.breakdown.components.distance).toEqual({ present: true, value: 1 });
      expect(result.score).toBeCloseTo(0.5 * 0.7 + 0.5 * 1, 10);
    });

    test('should reject a cross-tenant pair as not found', () => {
      const anchor = candidate('cand-1', { skills: [must('go')] });
      const foreign = job('job-9', { tenantId: 'tenant-b', skills: [must('go')] });

      expect(() => scorePair(anchor, foreign, makeWeights())).toThrow(AppTenantMismatchError);
      expect(() => scorePair(anchor, foreign, makeWeights())).toThrow(AppNotFoundError);
      expect(() => scorePair(anchor, foreign, makeWeights())).toThrow("Job with ID 'job-9' not found");
    });

    test('should keep every score within [0, 1]', () => {
      const heavy = makeWeights({
        components: { skill: 1, title: 1, semantic: 1, embedding: 1, distance: 1 },
        categories: { must: 1, needed: 1 },
      });
      const anchor = candidate('cand-1', {
        title: 'Engineer',
        skills: [must('go'), needed('sql')],
        textBlob: 'distributed systems engineer',
        embedding: [1, 0],
        location: { lat: 0, lon: 0 },
      });
      const posting = job('job-1', {
        title: 'Engineer',
        skills: [must('go'), needed('sql')],
        textBlob: 'distributed systems engineer',
        embedding: [1, 0],
        location: { lat: 0, lon: 0 },
      });

      const result = scorePair(anchor, posting, heavy);

      expect(result.score).toBe(1);
    });
  });

  describe('rankPool', () => {
    const anchor = candidate('cand-1', { title: 'Backend Engineer', skills: [must('go'), needed('sql')] });

    test('should never return a cross-tenant member', () => {
      const pool = [
        job('job-weak', { title: 'Backend Engineer', skills: [needed('sql')] }),
        job('job-foreign', {
          tenantId: 'tenant-b',
          title: 'Backend Engineer',
          skills: [must('go'), needed('sql')],
        }),
        job('job-strong', { title: 'Backend Engineer', skills: [must('go'), needed('sql')] }),
      ];

      const ranked = rankPool(anchor, pool, 10, makeWeights());

      expect(ranked.map((r) => r.counterpartId)).toEqual(['job-strong', 'job-weak']);
    });

    test('should not match a member whose tenant id differs only by whitespace', () => {
      const padded = { ...job('job-foreign', { title: 'Backend Engineer', skills: [must('go')] }), tenantId: 'tenant-a ' };

      expect(rankPool(anchor, [padded], 5, makeWeights())).toEqual([]);
    });

    test('should break score ties by id ascending', () => {
      const twin = { title: 'Backend Engineer', skills: [must('go'), needed('sql')] };
      const ranked = rankPool(anchor, [job('job-b', twin), job('job-a', twin)], 5, makeWeights());

      expect(ranked.map((r) => r.counterpartId)).toEqual(['job-a', 'job-b']);
    });

    test('should return nothing for a non-positive K', () => {
      expect(rankPool(anchor, [job('job-a')], 0, makeWeights())).toEqual([]);
    });

    test('should return at most K results', () => {
      const pool = ['job-a', 'job-b', 'job-c'].map((id) => job(id, { skills: [must('go')] }));

      expect(rankPool(anchor, pool, 2, makeWeights())).toHaveLength(2);
    });

    test('should drop members beyond the distance limit but keep unknown distances', () => {
      const located = candidate('cand-2', { skills: [must('go')], location: { lat: 0, lon: 0 } });
      const pool = [
        job('job-near', { skills: [must('go')], location: { lat: 0, lon: 0.1 } }),
        job('job-far', { skills: [must('go')], location: { lat: 0, lon: 3 } }),
        job('job-unknown', { skills: [must('go')] }),
      ];

      const ranked = rankPool(located, pool, 10, makeWeights(), { maxDistanceKm: 50 });

      expect(ranked.map((r) => r.counterpartId).sort()).toEqual(['job-near', 'job-unknown']);
    });

    test('should score at most maxPoolSize members', () => {
      const pool = ['job-a', 'job-b', 'job-c'].map((id) => job(id, { skills: [must('go')] }));

      const ranked = rankPool(anchor, pool, 10, makeWeights(), { maxPoolSize: 2 });

      expect(ranked.map((r) => r.counterpartId)).toEqual(['job-a', 'job-b']);
    });
  });

  test('compareMatches should order by score descending', () => {
    const weights = makeWeights();
    const anchor = candidate('cand-1', { skills: [must('go')] });
    const high = scorePair(anchor, job('job-z', { skills: [must('go')] }), weights);
    const low = scorePair(anchor, job('job-a', { skills: [needed('go')] }), weights);

    expect([low, high].sort(compareMatches()).map((r) => r.counterpartId)).toEqual(['job-z', 'job-a']);
  });
});
