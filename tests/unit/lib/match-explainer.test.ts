/**
 * Unit Tests for the Explainability Assembler
 */

import { describe, test, expect } from '@jest/globals';
import { scorePair } from '../../../server/lib/composite-scorer';
import {
  explainMatch,
  toWireExplanation,
  toWireMatch,
  toWireWeights,
} from '../../../server/lib/match-explainer';
import { candidate, job, makeWeights, must, needed } from '../../helpers/match-fixtures';

describe('Match Explainer', () => {
  const weights = makeWeights();
  const analyst = candidate('cand-1', { title: 'Data Analyst', skills: [must('python'), needed('sql')] });
  const posting = job('job-1', {
    title: 'Data Analyst',
    skills: [must('python'), needed('sql'), needed('excel')],
  });

  test('should expose every component with contributions summing to the score', () => {
    const result = scorePair(analyst, posting, weights);

    const explanation = explainMatch(result, weights);

    expect(explanation.components.map((c) => c.name)).toEqual([
      'skill',
      'title',
      'semantic',
      'embedding',
      'distance',
    ]);
    const total = explanation.components.reduce((sum, c) => sum + c.weighted, 0);
    expect(total).toBeCloseTo(result.score, 10);
    expect(explanation.components[2]).toEqual({
      name: 'semantic',
      present: false,
      raw: null,
      reason: 'missing_text',
      weight: 0,
      effectiveWeight: 0,
      weighted: 0,
    });
  });

  test('should refuse to explain with a different weight version', () => {
    const result = scorePair(analyst, posting, weights);

    expect(() => explainMatch(result, makeWeights({ version: 2 }))).toThrow(RangeError);
  });

  test('should orient skill lists by entity kind', () => {
    const fromJob = explainMatch(scorePair(posting, analyst, weights), weights);

    expect(fromJob.candidateId).toBe('cand-1');
    expect(fromJob.jobId).toBe('job-1');
    expect(fromJob.skills.candidateOnly).toEqual([]);
    expect(fromJob.skills.jobOnly).toEqual(['excel']);
  });

  test('should build the wire representation of a match', () => {
    const wire = toWireMatch(scorePair(analyst, posting, weights));

    expect(wire).toEqual({
      candidate_id: 'cand-1',
      job_id: 'job-1',
      score: 0.8725,
      skill_overlap: ['python', 'sql'],
      candidate_only_skills: [],
      job_only_skills: ['excel'],
      must_ratio: 1,
      needed_ratio: 0.5,
      weighted_skill_score: 0.85,
      base_skill_overlap: 0.6667,
      title_similarity: 1,
      semantic_similarity: 0,
      embedding_similarity: 0,
      distance_km: null,
      distance_score: null,
      low_skill_floor: true,
      skills_must_list: [{ name: 'python', matched: true }],
      skills_nice_list: [
        { name: 'excel', matched: false },
        { name: 'sql', matched: true },
      ],
      skills_matched_must: 1,
      skills_total_must: 1,
      skills_matched_nice: 1,
      skills_total_nice: 2,
      weights_version: 1,
    });
  });

  test('should round distance to one decimal', () => {
    const near = scorePair(
      candidate('cand-2', { location: { lat: 0, lon: 0 } }),
      job('job-2', { location: { lat: 0, lon: 1 } }),
      makeWeights({ components: { distance: 0.2 } })
    );

    const wire = toWireMatch(near);

    expect(wire.distance_km).toBe(111.2);
    expect(wire.distance_score).toBe(0.2676);
  });

  test('should add component detail to the wire explanation', () => {
    const result = scorePair(analyst, posting, weights);
    const wire = toWireExplanation(result, explainMatch(result, weights));

    expect(wire.degenerate_weights).toBe(false);
    expect(wire.components[0]).toEqual({
      name: 'skill',
      present: true,
      raw: 0.85,
      weight: 0.85,
      effective_weight: 0.85,
      weighted: 0.7225,
    });
  });

  test('should serialize weights with snake_case names', () => {
    expect(toWireWeights(weights)).toEqual({
      skill_weight: 0.85,
      title_weight: 0.15,
      semantic_weight: 0,
      embedding_weight: 0,
      distance_weight: 0,
      must_category_weight: 0.7,
      needed_category_weight: 0.3,
      min_skill_floor: 3,
      version: 1,
      updated_at: '2026-01-15T09:30:00.000Z',
    });
  });
});
