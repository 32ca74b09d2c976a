/**
 * Tenant Guard
 *
 * Hard isolation boundary, run before scoring, caching or explanation. A pair
 * whose tenants differ is reported as not found, never as forbidden, so a
 * foreign id is indistinguishable from a missing one.
 */

import { logger } from "../config/logger";
import { AppNotFoundError, AppTenantMismatchError } from "@shared/errors";
import type { Entity } from "@shared/schema";

export interface TenantFilterResult {
  tenantId: string;
  members: Entity[];
  rejected: number;
}

/**
 * Tenant ids are compared exactly; the entity schema trims them on ingestion.
 *
 * @throws {AppNotFoundError} when the anchor has no resolvable tenant
 */
export function resolveTenant(anchor: Entity): string {
  const tenantId = anchor.tenantId;
  if (!tenantId.trim()) {
    logger.warn({ anchorKind: anchor.kind }, "Tenant guard: anchor tenant unresolved");
    throw AppNotFoundError.entity(anchor.kind, anchor.id);
  }
  return tenantId;
}

export function sameTenant(tenantId: string, entity: Entity): boolean {
  return entity.tenantId === tenantId;
}

/**
 * @throws {AppTenantMismatchError} when the counterpart belongs elsewhere
 */
export function assertSameTenant(anchor: Entity, counterpart: Entity): string {
  const tenantId = resolveTenant(anchor);
  if (!sameTenant(tenantId, counterpart)) {
    logger.warn({ tenantId, counterpartKind: counterpart.kind }, "Tenant guard: cross-tenant pair rejected");
    throw new AppTenantMismatchError(counterpart.kind, counterpart.id);
  }
  return tenantId;
}

/**
 * Keep only pool members sharing the anchor's tenant
 */
export function filterPoolByTenant(anchor: Entity, pool: readonly Entity[]): TenantFilterResult {
  const tenantId = resolveTenant(anchor);
  const members = pool.filter((member) => sameTenant(tenantId, member));
  const rejected = pool.length - members.length;

  if (rejected > 0) {
    logger.warn({ tenantId, rejected }, "Tenant guard: dropped cross-tenant pool members");
  }
  return { tenantId, members, rejected };
}
