/**
 * Response envelopes, scoring result shapes and wire types shared by the
 * service and HTTP layers.
 *
 * Internal shapes are camelCase; `Wire*` types are what the HTTP layer emits
 * and keep the snake_case field names existing API consumers read.
 */

import type { ComponentName, EntityKind } from './schema';

// API response wrapper types
export interface ApiResponse<T = unknown> {
  data: T;
  success: true;
  timestamp: string;
}

export interface ApiError {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  timestamp: string;
}

export const API_BASE = '/api';

export const TENANT_HEADER = 'x-tenant-id';

// ==================== SCORING RESULTS ====================

/**
 * A component either has a value or was not computable for the pair.
 * An absent component is its own variant, never a 0 value.
 */
export type ComponentScore =
  | { readonly present: true; readonly value: number }
  | { readonly present: false; readonly reason: AbsentReason };

export type AbsentReason =
  | 'missing_title'
  | 'missing_text'
  | 'missing_embedding'
  | 'embedding_dimension_mismatch'
  | 'missing_location';

export interface RequirementCheck {
  readonly name: string;
  readonly matched: boolean;
}

export interface RequirementSummary {
  readonly must: readonly RequirementCheck[];
  readonly needed: readonly RequirementCheck[];
  readonly matchedMust: number;
  readonly totalMust: number;
  readonly matchedNeeded: number;
  readonly totalNeeded: number;
}

export interface SkillBreakdown {
  readonly weightedScore: number;
  readonly mustRatio: number;
  readonly neededRatio: number;
  /** Category-blind overlap over all skills */
  readonly baseOverlap: number;
  readonly overlap: readonly string[];
  readonly anchorOnly: readonly string[];
  readonly counterpartOnly: readonly string[];
  readonly anchorSkillCount: number;
  readonly counterpartSkillCount: number;
  readonly lowSkillFloor: boolean;
  /** Job-side requirements checked against the candidate side */
  readonly requirements: RequirementSummary;
}

export interface MatchBreakdown {
  readonly components: Readonly<Record<ComponentName, ComponentScore>>;
  /** Weight each component actually carried after renormalization */
  readonly effectiveWeights: Readonly<Record<ComponentName, number>>;
  readonly degenerateWeights: boolean;
  readonly skill: SkillBreakdown;
  readonly distanceKm: number | null;
}

export interface MatchResult {
  readonly tenantId: string;
  readonly anchorId: string;
  readonly anchorKind: EntityKind;
  readonly counterpartId: string;
  readonly score: number;
  readonly tieBreakKey: string;
  readonly weightsVersion: number;
  readonly breakdown: MatchBreakdown;
}

// ==================== EXPLANATIONS ====================

export interface ExplainedComponent {
  readonly name: ComponentName;
  readonly present: boolean;
  readonly raw: number | null;
  readonly reason?: AbsentReason;
  readonly weight: number;
  readonly effectiveWeight: number;
  readonly weighted: number;
}

export interface MatchExplanation {
  readonly anchorId: string;
  readonly anchorKind: EntityKind;
  readonly counterpartId: string;
  readonly candidateId: string;
  readonly jobId: string;
  readonly score: number;
  readonly weightsVersion: number;
  readonly degenerateWeights: boolean;
  readonly components: readonly ExplainedComponent[];
  readonly skills: SkillBreakdown & {
    readonly candidateOnly: readonly string[];
    readonly jobOnly: readonly string[];
  };
  readonly distanceKm: number | null;
}

// ==================== WIRE FORMAT ====================

export interface WireRequirementCheck {
  name: string;
  matched: boolean;
}

export interface WireMatch {
  candidate_id: string;
  job_id: string;
  score: number;
  skill_overlap: string[];
  candidate_only_skills: string[];
  job_only_skills: string[];
  must_ratio: number;
  needed_ratio: number;
  weighted_skill_score: number;
  base_skill_overlap: number;
  title_similarity: number;
  semantic_similarity: number;
  embedding_similarity: number;
  distance_km: number | null;
  distance_score: number | null;
  low_skill_floor: boolean;
  skills_must_list: WireRequirementCheck[];
  skills_nice_list: WireRequirementCheck[];
  skills_matched_must: number;
  skills_total_must: number;
  skills_matched_nice: number;
  skills_total_nice: number;
  weights_version: number;
}

export interface WireComponent {
  name: ComponentName;
  present: boolean;
  raw: number | null;
  weight: number;
  effective_weight: number;
  weighted: number;
}

export interface WireExplanation extends WireMatch {
  components: WireComponent[];
  degenerate_weights: boolean;
}

export interface WireWeights {
  skill_weight: number;
  title_weight: number;
  semantic_weight: number;
  embedding_weight: number;
  distance_weight: number;
  must_category_weight: number;
  needed_category_weight: number;
  min_skill_floor: number;
  version: number;
  updated_at: string;
}
