/**
 * Explainability Assembler
 *
 * Pure transformations of an already-scored MatchResult: named components,
 * orientation-aware skill lists, and the snake_case wire shapes. Nothing here
 * recomputes a similarity.
 */

import { COMPONENT_NAMES, type WeightConfiguration } from "@shared/schema";
import type {
  ExplainedComponent,
  MatchExplanation,
  MatchResult,
  WireComponent,
  WireExplanation,
  WireMatch,
  WireWeights,
} from "@shared/api-contracts";

export const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;
const round1 = (value: number): number => Math.round(value * 10) / 10;

function orient(result: MatchResult) {
  const { skill } = result.breakdown;
  return result.anchorKind === "candidate"
    ? {
        candidateId: result.anchorId,
        jobId: result.counterpartId,
        candidateOnly: skill.anchorOnly,
        jobOnly: skill.counterpartOnly,
      }
    : {
        candidateId: result.counterpartId,
        jobId: result.anchorId,
        candidateOnly: skill.counterpartOnly,
        jobOnly: skill.anchorOnly,
      };
}

/**
 * Expand a result into its named components.
 *
 * @param weights - the snapshot the result was scored with
 * @throws {RangeError} when `weights` is a different version than the result's
 */
export function explainMatch(result: MatchResult, weights: WeightConfiguration): MatchExplanation {
  if (weights.version !== result.weightsVersion) {
    throw new RangeError(
      `Result scored with weights v${result.weightsVersion} cannot be explained with v${weights.version}`
    );
  }

  const { breakdown } = result;
  const components: ExplainedComponent[] = COMPONENT_NAMES.map((name) => {
    const component = breakdown.components[name];
    const effectiveWeight = breakdown.effectiveWeights[name];
    if (!component.present) {
      return {
        name,
        present: false,
        raw: null,
        reason: component.reason,
        weight: weights.components[name],
        effectiveWeight,
        weighted: 0,
      };
    }
    return {
      name,
      present: true,
      raw: component.value,
      weight: weights.components[name],
      effectiveWeight,
      weighted: component.value * effectiveWeight,
    };
  });

  const { candidateId, jobId, candidateOnly, jobOnly } = orient(result);

  return {
    anchorId: result.anchorId,
    anchorKind: result.anchorKind,
    counterpartId: result.counterpartId,
    candidateId,
    jobId,
    score: result.score,
    weightsVersion: result.weightsVersion,
    degenerateWeights: breakdown.degenerateWeights,
    components,
    skills: { ...breakdown.skill, candidateOnly, jobOnly },
    distanceKm: breakdown.distanceKm,
  };
}

function componentValue(result: MatchResult, name: "title" | "semantic" | "embedding"): number {
  const component = result.breakdown.components[name];
  return component.present ? round4(component.value) : 0;
}

/**
 * Wire representation of one ranked match
 */
export function toWireMatch(result: MatchResult): WireMatch {
  const { skill, components, distanceKm } = result.breakdown;
  const { candidateId, jobId, candidateOnly, jobOnly } = orient(result);
  const distance = components.distance;

  return {
    candidate_id: candidateId,
    job_id: jobId,
    score: round4(result.score),
    skill_overlap: [...skill.overlap],
    candidate_only_skills: [...candidateOnly],
    job_only_skills: [...jobOnly],
    must_ratio: round4(skill.mustRatio),
    needed_ratio: round4(skill.neededRatio),
    weighted_skill_score: round4(skill.weightedScore),
    base_skill_overlap: round4(skill.baseOverlap),
    title_similarity: componentValue(result, "title"),
    semantic_similarity: componentValue(result, "semantic"),
    embedding_similarity: componentValue(result, "embedding"),
    distance_km: distanceKm === null ? null : round1(distanceKm),
    distance_score: distance.present ? round4(distance.value) : null,
    low_skill_floor: skill.lowSkillFloor,
    skills_must_list: skill.requirements.must.map((check) => ({ ...check })),
    skills_nice_list: skill.requirements.needed.map((check) => ({ ...check })),
    skills_matched_must: skill.requirements.matchedMust,
    skills_total_must: skill.requirements.totalMust,
    skills_matched_nice: skill.requirements.matchedNeeded,
    skills_total_nice: skill.requirements.totalNeeded,
    weights_version: result.weightsVersion,
  };
}

export function toWireExplanation(result: MatchResult, explanation: MatchExplanation): WireExplanation {
  const components: WireComponent[] = explanation.components.map((component) => ({
    name: component.name,
    present: component.present,
    raw: component.raw === null ? null : round4(component.raw),
    weight: component.weight,
    effective_weight: round4(component.effectiveWeight),
    weighted: round4(component.weighted),
  }));

  return {
    ...toWireMatch(result),
    components,
    degenerate_weights: explanation.degenerateWeights,
  };
}

export function toWireWeights(config: WeightConfiguration): WireWeights {
  return {
    skill_weight: config.components.skill,
    title_weight: config.components.title,
    semantic_weight: config.components.semantic,
    embedding_weight: config.components.embedding,
    distance_weight: config.components.distance,
    must_category_weight: config.categories.must,
    needed_category_weight: config.categories.needed,
    min_skill_floor: config.minSkillFloor,
    version: config.version,
    updated_at: config.updatedAt,
  };
}
