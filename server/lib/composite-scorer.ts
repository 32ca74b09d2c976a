/**
 * Composite Scorer
 *
 * Renormalized linear combination of the component scores:
 *
 *   score = Σ_{c ∈ P} W[c]·component[c] / Σ_{c ∈ P} W[c]
 *
 * where P is the set of components computable for the pair. Skill is always
 * in P. A zero active weight sum falls back to the skill component alone.
 */

import { logger } from "../config/logger";
import {
  COMPONENT_NAMES,
  type ComponentName,
  type ComponentWeights,
  type Entity,
  type WeightConfiguration,
} from "@shared/schema";
import type { ComponentScore, MatchResult } from "@shared/api-contracts";
import { compareEmbeddings } from "./embeddings";
import { scoreDistance } from "./geo-distance";
import { semanticSimilarity } from "./semantic-similarity";
import { clamp01, scoreSkills } from "./skill-scorer";
import { normalizeSkillRefs } from "./skill-vocabulary";
import { assertSameTenant, filterPoolByTenant } from "./tenant-guard";
import { titleSimilarity } from "./title-similarity";

export const DEFAULT_TIE_EPSILON = 1e-9;

export interface RankOptions {
  tieEpsilon?: number;
  /** Drop members whose known distance exceeds this many km */
  maxDistanceKm?: number;
  /** Score at most this many same-tenant members */
  maxPoolSize?: number;
}

export interface CombinedScore {
  score: number;
  effectiveWeights: Record<ComponentName, number>;
  degenerate: boolean;
}

const present = (value: number): ComponentScore => ({ present: true, value });

/**
 * Weighted mean over present components; absent components are excluded from
 * both numerator and denominator.
 */
export function combineComponents(
  components: Readonly<Record<ComponentName, ComponentScore>>,
  weights: Readonly<ComponentWeights>
): CombinedScore {
  const effectiveWeights: Record<ComponentName, number> = {
    skill: 0,
    title: 0,
    semantic: 0,
    embedding: 0,
    distance: 0,
  };

  let activeSum = 0;
  let weightedSum = 0;
  for (const name of COMPONENT_NAMES) {
    const component = components[name];
    if (component.present) {
      activeSum += weights[name];
      weightedSum += weights[name] * component.value;
    }
  }

  const skill = components.skill;
  const skillValue = skill.present ? skill.value : 0;

  if (activeSum <= 0) {
    effectiveWeights.skill = 1;
    return { score: clamp01(skillValue), effectiveWeights, degenerate: true };
  }

  for (const name of COMPONENT_NAMES) {
    if (components[name].present) {
      effectiveWeights[name] = weights[name] / activeSum;
    }
  }
  return { score: clamp01(weightedSum / activeSum), effectiveWeights, degenerate: false };
}

/**
 * Score one same-tenant pair against a weight snapshot.
 *
 * @throws {AppTenantMismatchError} for a cross-tenant pair
 */
export function scorePair(
  anchor: Entity,
  counterpart: Entity,
  weights: WeightConfiguration
): MatchResult {
  const tenantId = assertSameTenant(anchor, counterpart);

  const skill = scoreSkills(
    normalizeSkillRefs(anchor.skills),
    normalizeSkillRefs(counterpart.skills),
    weights,
    anchor.kind === "job" ? "anchor" : "counterpart"
  );

  const title = titleSimilarity(anchor.title, counterpart.title);
  const semantic = semanticSimilarity(anchor.textBlob, counterpart.textBlob);
  const embedding = compareEmbeddings(anchor.embedding, counterpart.embedding);
  const distance = scoreDistance(anchor.location, counterpart.location);

  const components: Record<ComponentName, ComponentScore> = {
    skill: present(skill.weightedScore),
    title: title === null ? { present: false, reason: "missing_title" } : present(title),
    semantic: semantic === null ? { present: false, reason: "missing_text" } : present(semantic),
    embedding: embedding.present ? present(embedding.value) : embedding,
    distance: distance === null ? { present: false, reason: "missing_location" } : present(distance.score),
  };

  const combined = combineComponents(components, weights.components);

  return {
    tenantId,
    anchorId: anchor.id,
    anchorKind: anchor.kind,
    counterpartId: counterpart.id,
    score: combined.score,
    tieBreakKey: counterpart.id,
    weightsVersion: weights.version,
    breakdown: {
      components,
      effectiveWeights: combined.effectiveWeights,
      degenerateWeights: combined.degenerate,
      skill,
      distanceKm: distance === null ? null : distance.km,
    },
  };
}

/**
 * Score descending; scores within `epsilon` ordered by tie-break key ascending
 */
export function compareMatches(epsilon: number = DEFAULT_TIE_EPSILON) {
  return (a: MatchResult, b: MatchResult): number => {
    if (Math.abs(a.score - b.score) <= epsilon) {
      if (a.tieBreakKey === b.tieBreakKey) {
        return 0;
      }
      return a.tieBreakKey < b.tieBreakKey ? -1 : 1;
    }
    return b.score - a.score;
  };
}

/**
 * Rank a pool for an anchor and return the top K matches.
 *
 * Cross-tenant members are dropped before anything is computed.
 */
export function rankPool(
  anchor: Entity,
  pool: readonly Entity[],
  topK: number,
  weights: WeightConfiguration,
  options: RankOptions = {}
): MatchResult[] {
  const limit = Math.floor(topK);
  const { tenantId, members } = filterPoolByTenant(anchor, pool);
  if (limit <= 0) {
    return [];
  }

  let scoped = members.filter((member) => !(member.id === anchor.id && member.kind === anchor.kind));
  if (options.maxPoolSize !== undefined && scoped.length > options.maxPoolSize) {
    logger.warn(
      { tenantId, poolSize: scoped.length, maxPoolSize: options.maxPoolSize },
      "Ranking pool truncated"
    );
    scoped = scoped.slice(0, options.maxPoolSize);
  }

  const maxDistanceKm = options.maxDistanceKm;
  const results = scoped
    .map((member) => scorePair(anchor, member, weights))
    .filter((result) => {
      const km = result.breakdown.distanceKm;
      return maxDistanceKm === undefined || km === null || km <= maxDistanceKm;
    });

  return results.sort(compareMatches(options.tieEpsilon)).slice(0, limit);
}
