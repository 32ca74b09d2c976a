/**
 * Shared builders for matching tests
 */

import {
  entitySchema,
  type Entity,
  type EntityInput,
  type SkillRef,
  type WeightConfiguration,
} from '@shared/schema';

export const FIXED_TIMESTAMP = '2026-01-15T09:30:00.000Z';

type EntityOverrides = Partial<EntityInput> & Pick<EntityInput, 'id' | 'kind'>;

export function makeEntity(overrides: EntityOverrides): Entity {
  return entitySchema.parse({
    tenantId: 'tenant-a',
    updatedAt: FIXED_TIMESTAMP,
    ...overrides,
  });
}

export const candidate = (id: string, overrides: Partial<EntityInput> = {}): Entity =>
  makeEntity({ id, kind: 'candidate', ...overrides });

export const job = (id: string, overrides: Partial<EntityInput> = {}): Entity =>
  makeEntity({ id, kind: 'job', ...overrides });

export function makeWeights(
  overrides: {
    components?: Partial<WeightConfiguration['components']>;
    categories?: Partial<WeightConfiguration['categories']>;
    minSkillFloor?: number;
    version?: number;
  } = {}
): WeightConfiguration {
  return {
    components: {
      skill: 0.85,
      title: 0.15,
      semantic: 0,
      embedding: 0,
      distance: 0,
      ...overrides.components,
    },
    categories: { must: 0.7, needed: 0.3, ...overrides.categories },
    minSkillFloor: overrides.minSkillFloor ?? 3,
    version: overrides.version ?? 1,
    updatedAt: FIXED_TIMESTAMP,
  };
}

export const must = (name: string): SkillRef => ({ name, category: 'must', provenance: 'extracted' });
export const needed = (name: string): SkillRef => ({ name, category: 'needed', provenance: 'extracted' });
