/**
 * Weight Configuration Store
 *
 * Holds one immutable, versioned weight snapshot. Updates validate the merged
 * settings and install a new frozen snapshot with `version + 1`; nothing is
 * ever mutated in place, so a ranking pass that already read a snapshot
 * finishes on that version even if an update lands meanwhile.
 */

import { logger } from "../config/logger";
import { AppConfigurationError, AppValidationError } from "@shared/errors";
import { failure, success, type WeightUpdateResult } from "@shared/result-types";
import {
  weightPatchSchema,
  weightSettingsSchema,
  type WeightConfiguration,
  type WeightSettings,
} from "@shared/schema";

/** Allowed distance of the component weight sum from 1 before warning */
export const WEIGHT_SUM_TOLERANCE = 0.05;

/**
 * Non-fatal observations about a configuration: the intended operating point
 * has component and category weights each summing to about 1.
 */
export function describeWeightDrift(settings: WeightSettings): string[] {
  const warnings: string[] = [];
  const { skill, title, semantic, embedding, distance } = settings.components;
  const componentSum = skill + title + semantic + embedding + distance;
  if (Math.abs(componentSum - 1) > WEIGHT_SUM_TOLERANCE) {
    warnings.push(`Component weights sum to ${componentSum.toFixed(4)}, expected about 1`);
  }

  const categorySum = settings.categories.must + settings.categories.needed;
  if (Math.abs(categorySum - 1) > WEIGHT_SUM_TOLERANCE) {
    warnings.push(`Category weights sum to ${categorySum.toFixed(4)}, expected about 1`);
  }
  return warnings;
}

function freezeSnapshot(settings: WeightSettings, version: number, updatedAt: string): WeightConfiguration {
  return Object.freeze({
    components: Object.freeze({ ...settings.components }),
    categories: Object.freeze({ ...settings.categories }),
    minSkillFloor: settings.minSkillFloor,
    version,
    updatedAt,
  });
}

export class WeightConfigStore {
  private snapshot: WeightConfiguration;
  private readonly now: () => Date;

  /**
   * @throws {AppConfigurationError} when the defaults are invalid; without a
   *   valid snapshot no scoring call can run
   */
  constructor(defaults: WeightSettings, now: () => Date = () => new Date()) {
    this.now = now;
    const parsed = weightSettingsSchema.safeParse(defaults);
    if (!parsed.success) {
      const error = AppValidationError.fromZodError(parsed.error, "default weights");
      throw AppConfigurationError.invalidDefaultWeights(error.message, error.details);
    }

    for (const warning of describeWeightDrift(parsed.data)) {
      logger.warn({ weights: parsed.data }, warning);
    }
    this.snapshot = freezeSnapshot(parsed.data, 1, this.now().toISOString());
  }

  /**
   * The installed snapshot. Callers should read it once per scoring pass.
   */
  current(): WeightConfiguration {
    return this.snapshot;
  }

  /**
   * Merge a partial update over the current snapshot, validate, then swap.
   * On any validation failure the installed snapshot is left untouched.
   */
  update(patch: unknown): WeightUpdateResult<WeightConfiguration> {
    const parsedPatch = weightPatchSchema.safeParse(patch);
    if (!parsedPatch.success) {
      return failure(AppValidationError.fromZodError(parsedPatch.error, "weight update"));
    }

    const base = this.snapshot;
    const merged = {
      components: { ...base.components, ...parsedPatch.data.components },
      categories: { ...base.categories, ...parsedPatch.data.categories },
      minSkillFloor: parsedPatch.data.minSkillFloor ?? base.minSkillFloor,
    };

    const parsed = weightSettingsSchema.safeParse(merged);
    if (!parsed.success) {
      return failure(AppValidationError.fromZodError(parsed.error, "weight update"));
    }

    const next = freezeSnapshot(parsed.data, base.version + 1, this.now().toISOString());
    this.snapshot = next;

    logger.info(
      { fromVersion: base.version, toVersion: next.version, weights: parsed.data },
      "Weight configuration updated"
    );
    for (const warning of describeWeightDrift(parsed.data)) {
      logger.warn({ version: next.version }, warning);
    }
    return success(next);
  }
}
