/**
 * Unified Configuration System
 *
 * Single source of truth for the engine's configuration. Environment variables
 * are coerced and checked with zod; weight *ranges* are left to the weight
 * store so that a bad default surfaces as the startup-fatal
 * `AppConfigurationError` rather than a generic parse failure.
 */

import { z } from "zod";
import { Environment } from "../types/environment";
import { AppConfigurationError } from "@shared/errors";
import type { WeightSettings } from "@shared/schema";

export { Environment };

// `WEIGHT_SKILLS=` in a .env file means unset, not zero
const unsetIfBlank = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envNumber = (fallback: number, refine: (n: z.ZodNumber) => z.ZodNumber = (n) => n) =>
  z.preprocess(unsetIfBlank, refine(z.coerce.number()).default(fallback));
const number = (fallback: number) => envNumber(fallback);
const count = (fallback: number) => envNumber(fallback, (n) => n.int().min(0));
const positiveInt = (fallback: number) => envNumber(fallback, (n) => n.int().min(1));

export const EnvironmentSchema = z.object({
  NODE_ENV: z.nativeEnum(Environment).default(Environment.Development),
  PORT: envNumber(3000, (n) => n.int().min(1).max(65535)),

  // Default scoring weights
  WEIGHT_SKILLS: number(0.85),
  WEIGHT_TITLE_SIM: number(0.15),
  WEIGHT_SEMANTIC: number(0),
  WEIGHT_EMBEDDING: number(0),
  WEIGHT_DISTANCE: number(0),
  MUST_CATEGORY_WEIGHT: number(0.7),
  NEEDED_CATEGORY_WEIGHT: number(0.3),
  MIN_SKILL_FLOOR: number(3),

  // Match query cache
  MATCH_CACHE_CAPACITY: positiveInt(500),
  MATCH_CACHE_TTL_MS: count(900_000),

  // Ranking bounds
  MATCH_DEFAULT_TOP_K: positiveInt(5),
  MATCH_MAX_TOP_K: positiveInt(100),
  MATCH_MAX_POOL_SIZE: positiveInt(1000),
  // Tie grouping is only consistent while the epsilon stays tiny
  SCORE_TIE_EPSILON: envNumber(1e-9, (n) => n.min(0).max(1e-6)),

  // Optional JSON file of entities loaded into the in-memory store at startup
  ENTITY_SEED_FILE: z.string().trim().min(1).optional(),
});

export type EnvironmentVariables = z.infer<typeof EnvironmentSchema>;

export interface AppConfig {
  env: Environment;
  port: number;
  seedFile?: string;

  /** Unvalidated defaults; the weight store validates them at construction */
  defaultWeights: WeightSettings;

  cache: {
    capacity: number;
    ttlMs: number;
  };

  ranking: {
    defaultTopK: number;
    maxTopK: number;
    maxPoolSize: number;
    tieEpsilon: number;
  };
}

/**
 * Build the configuration object from an environment map.
 *
 * @throws {AppConfigurationError} when a variable cannot be coerced
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      variable: issue.path.join("."),
      message: issue.message,
    }));
    throw new AppConfigurationError(
      `Invalid environment: ${issues.map((i) => `${i.variable} (${i.message})`).join(", ")}`,
      issues[0]?.variable,
      { issues }
    );
  }

  const vars = parsed.data;
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    seedFile: vars.ENTITY_SEED_FILE,
    defaultWeights: {
      components: {
        skill: vars.WEIGHT_SKILLS,
        title: vars.WEIGHT_TITLE_SIM,
        semantic: vars.WEIGHT_SEMANTIC,
        embedding: vars.WEIGHT_EMBEDDING,
        distance: vars.WEIGHT_DISTANCE,
      },
      categories: {
        must: vars.MUST_CATEGORY_WEIGHT,
        needed: vars.NEEDED_CATEGORY_WEIGHT,
      },
      minSkillFloor: vars.MIN_SKILL_FLOOR,
    },
    cache: {
      capacity: vars.MATCH_CACHE_CAPACITY,
      ttlMs: vars.MATCH_CACHE_TTL_MS,
    },
    ranking: {
      defaultTopK: vars.MATCH_DEFAULT_TOP_K,
      maxTopK: vars.MATCH_MAX_TOP_K,
      maxPoolSize: vars.MATCH_MAX_POOL_SIZE,
      tieEpsilon: vars.SCORE_TIE_EPSILON,
    },
  };
}
