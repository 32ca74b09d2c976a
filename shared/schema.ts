import { z } from "zod";

// ==================== SKILLS ====================

export const skillCategorySchema = z.enum(["must", "needed"]);
export const skillProvenanceSchema = z.enum(["extracted", "synthetic"]);

export type SkillCategory = z.infer<typeof skillCategorySchema>;
export type SkillProvenance = z.infer<typeof skillProvenanceSchema>;

export const skillRefSchema = z.object({
  name: z.string().trim().min(1),
  category: skillCategorySchema,
  provenance: skillProvenanceSchema.default("extracted"),
});

export type SkillRef = z.infer<typeof skillRefSchema>;

// Legacy records carry a flat list of names with no category
export const rawSkillSchema = z.union([z.string(), skillRefSchema]);
export type RawSkill = z.infer<typeof rawSkillSchema>;

// ==================== ENTITIES ====================

export const entityKindSchema = z.enum(["candidate", "job"]);
export type EntityKind = z.infer<typeof entityKindSchema>;

export const geoPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export type GeoPoint = z.infer<typeof geoPointSchema>;

export const entitySchema = z.object({
  id: z.string().min(1),
  tenantId: z.string().trim(),
  kind: entityKindSchema,
  title: z.string().default(""),
  city: z.string().optional(),
  location: geoPointSchema.optional(),
  skills: z.array(rawSkillSchema).default([]),
  embedding: z.array(z.number()).optional(),
  textBlob: z.string().optional(),
  updatedAt: z.string().datetime(),
});

/** Entity as accepted from the ingestion collaborator */
export type EntityInput = z.input<typeof entitySchema>;
/** Entity after schema defaults have been applied */
export type Entity = z.infer<typeof entitySchema>;

// ==================== WEIGHTS ====================

const unitWeight = z.number().min(0).max(1);

export const componentWeightsSchema = z.object({
  skill: unitWeight,
  title: unitWeight,
  semantic: unitWeight,
  embedding: unitWeight,
  distance: unitWeight,
});

export const categoryWeightsSchema = z.object({
  must: unitWeight,
  needed: unitWeight,
});

export const weightSettingsSchema = z.object({
  components: componentWeightsSchema,
  categories: categoryWeightsSchema,
  minSkillFloor: z.number().int().min(0),
});

export type ComponentWeights = z.infer<typeof componentWeightsSchema>;
export type CategoryWeights = z.infer<typeof categoryWeightsSchema>;
export type WeightSettings = z.infer<typeof weightSettingsSchema>;

/** Partial update accepted by the weight store; merged over the current snapshot */
export const weightPatchSchema = z
  .object({
    components: componentWeightsSchema.partial().optional(),
    categories: categoryWeightsSchema.partial().optional(),
    minSkillFloor: z.number().optional(),
  })
  .strict();

export type ComponentName = keyof ComponentWeights;

export const COMPONENT_NAMES: readonly ComponentName[] = [
  "skill",
  "title",
  "semantic",
  "embedding",
  "distance",
] as const;

/**
 * Immutable, versioned weight snapshot. Every scoring call reads one of these
 * and keeps using it until the call completes.
 */
export interface WeightConfiguration {
  readonly components: Readonly<ComponentWeights>;
  readonly categories: Readonly<CategoryWeights>;
  readonly minSkillFloor: number;
  readonly version: number;
  readonly updatedAt: string;
}

// ==================== QUERIES ====================

export const poolFilterSchema = z.object({
  kind: entityKindSchema,
  city: z.string().optional(),
});

export type PoolFilter = z.infer<typeof poolFilterSchema>;

const booleanFlag = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((value) => value === true || value === "true" || value === "1");

export const rankQuerySchema = z.object({
  k: z.coerce.number().int().min(1).optional(),
  cityFilter: booleanFlag.default(true),
  maxDistanceKm: z.coerce.number().min(0).optional(),
});

export type RankQuery = z.infer<typeof rankQuerySchema>;
