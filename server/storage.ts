import { logger } from "./config/logger";
import { AppValidationError } from "@shared/errors";
import {
  entitySchema,
  type Entity,
  type EntityInput,
  type EntityKind,
  type PoolFilter,
} from "@shared/schema";

/**
 * Read-side contract of the ingestion collaborator.
 *
 * Entities arrive already skill-annotated; the matching core never writes
 * through this interface.
 *
 * @example
 * ```typescript
 * const anchor = await storage.getEntity('acme', 'candidate', 'cand-1');
 * const pool = await storage.queryPool('acme', { kind: 'job', city: 'haifa' });
 * ```
 */
export interface IEntityStorage {
  /**
   * Resolves to undefined when the entity does not exist *for this tenant*
   */
  getEntity(tenantId: string, kind: EntityKind, entityId: string): Promise<Entity | undefined>;

  /**
   * All entities of `filter.kind` in the tenant, optionally constrained to a city
   */
  queryPool(tenantId: string, filter: PoolFilter): Promise<Entity[]>;
}

const storageKey = (tenantId: string, kind: EntityKind, id: string): string =>
  `${encodeURIComponent(tenantId)}:${kind}:${id}`;

const canonicalCity = (city: string | undefined): string | undefined => {
  const normalized = city?.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return normalized ? normalized : undefined;
};

/**
 * In-memory entity store, used by the standalone server and by tests
 */
export class MemEntityStorage implements IEntityStorage {
  private entities: Map<string, Entity>;

  constructor(initial: readonly EntityInput[] = []) {
    this.entities = new Map();
    for (const entity of initial) {
      this.upsert(entity);
    }
  }

  /**
   * Accepts raw records (seed files, fixtures) as well as typed input
   *
   * @throws {AppValidationError} when the record does not match the entity schema
   */
  upsert(input: unknown): Entity {
    const parsed = entitySchema.safeParse(input);
    if (!parsed.success) {
      throw AppValidationError.fromZodError(parsed.error, "entity");
    }
    const entity = parsed.data;
    this.entities.set(storageKey(entity.tenantId, entity.kind, entity.id), entity);
    logger.debug({ kind: entity.kind, id: entity.id, tenantId: entity.tenantId }, "Entity stored");
    return entity;
  }

  remove(tenantId: string, kind: EntityKind, id: string): boolean {
    return this.entities.delete(storageKey(tenantId, kind, id));
  }

  async getEntity(tenantId: string, kind: EntityKind, entityId: string): Promise<Entity | undefined> {
    return this.entities.get(storageKey(tenantId, kind, entityId));
  }

  async queryPool(tenantId: string, filter: PoolFilter): Promise<Entity[]> {
    const city = canonicalCity(filter.city);
    return Array.from(this.entities.values()).filter(
      (entity) =>
        entity.tenantId === tenantId &&
        entity.kind === filter.kind &&
        (city === undefined || canonicalCity(entity.city) === city)
    );
  }
}
