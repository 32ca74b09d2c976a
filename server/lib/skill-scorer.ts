/**
 * Category-Weighted Skill Scorer
 *
 * Combines must/needed skill-set overlap into the skill component of the
 * composite score.
 */

import type { SkillRef, WeightConfiguration } from "@shared/schema";
import type { RequirementCheck, RequirementSummary, SkillBreakdown } from "@shared/api-contracts";
import { partitionSkills } from "./skill-vocabulary";

export type JobSide = "anchor" | "counterpart";

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * |A ∩ B| / max(|A|, |B|, 1). Two empty sets score 0: having no skills is
 * never rewarded.
 */
export function setOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const name of small) {
    if (large.has(name)) {
      shared++;
    }
  }
  return shared / Math.max(a.size, b.size, 1);
}

function sortedDifference(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return Array.from(a).filter((name) => !b.has(name)).sort();
}

function checkRequirements(
  required: ReadonlySet<string>,
  offered: ReadonlySet<string>
): RequirementCheck[] {
  return Array.from(required)
    .sort()
    .map((name) => ({ name, matched: offered.has(name) }));
}

function summarizeRequirements(
  job: ReturnType<typeof partitionSkills>,
  candidate: ReturnType<typeof partitionSkills>
): RequirementSummary {
  const must = checkRequirements(job.must, candidate.all);
  const needed = checkRequirements(job.needed, candidate.all);
  return {
    must,
    needed,
    matchedMust: must.filter((check) => check.matched).length,
    totalMust: must.length,
    matchedNeeded: needed.filter((check) => check.matched).length,
    totalNeeded: needed.length,
  };
}

/**
 * Score two normalized skill sets.
 *
 * `lowSkillFloor` is informational: it is set when either side has fewer
 * skills than `minSkillFloor`, and the score is left untouched.
 *
 * @param jobSide - which argument is the job posting, used to orient the
 *   requirement checklist
 */
export function scoreSkills(
  anchorSkills: readonly SkillRef[],
  counterpartSkills: readonly SkillRef[],
  weights: WeightConfiguration,
  jobSide: JobSide
): SkillBreakdown {
  const anchor = partitionSkills(anchorSkills);
  const counterpart = partitionSkills(counterpartSkills);

  const mustRatio = setOverlap(anchor.must, counterpart.must);
  const neededRatio = setOverlap(anchor.needed, counterpart.needed);
  const weightedScore = clamp01(
    weights.categories.must * mustRatio + weights.categories.needed * neededRatio
  );

  const [job, candidate] = jobSide === "anchor" ? [anchor, counterpart] : [counterpart, anchor];

  return {
    weightedScore,
    mustRatio,
    neededRatio,
    baseOverlap: setOverlap(anchor.all, counterpart.all),
    overlap: Array.from(anchor.all).filter((name) => counterpart.all.has(name)).sort(),
    anchorOnly: sortedDifference(anchor.all, counterpart.all),
    counterpartOnly: sortedDifference(counterpart.all, anchor.all),
    anchorSkillCount: anchor.all.size,
    counterpartSkillCount: counterpart.all.size,
    lowSkillFloor:
      anchor.all.size < weights.minSkillFloor || counterpart.all.size < weights.minSkillFloor,
    requirements: summarizeRequirements(job, candidate),
  };
}
