/**
 * Cache key generation for match queries, with canonicalization and versioning.
 *
 * Keys always embed the tenant id and the weight-configuration version, so a
 * weight update leaves older entries unaddressable without any sweep, and no
 * tenant can ever read another tenant's entry.
 */
import crypto from "crypto";
import type { Entity, EntityKind } from "@shared/schema";

export type MatchQueryParts = {
  tenantId: string;
  weightsVersion: number;
  direction: EntityKind;
  anchorId: string;
  anchorUpdatedAt: string;
  topK: number;
  cityFilter: boolean;
  maxDistanceKm?: number;
  /** Fingerprint of a caller-supplied pool; absent for store-backed queries */
  poolFingerprint?: string;
};

/**
 * Canonicalize data so field order never changes the key. String values are
 * kept verbatim: ids are compared exactly everywhere else.
 */
export const canonicalize = (v: unknown): unknown => {
  if (Array.isArray(v)) {
    return v.map(canonicalize);
  }

  if (v && typeof v === "object") {
    const canonical: Record<string, unknown> = {};
    const entries: [string, unknown][] = Object.entries(v);
    for (const [k, value] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (value !== undefined) {
        canonical[k] = canonicalize(value);
      }
    }
    return canonical;
  }

  return v;
};

/**
 * Order-independent digest of pool membership, ownership and freshness
 */
export function fingerprintPool(pool: readonly Entity[]): string {
  const members = pool
    .map((member) => JSON.stringify([member.tenantId, member.kind, member.id, member.updatedAt]))
    .sort();
  return crypto.createHash("sha256").update(members.join("\n")).digest("hex");
}

/**
 * Generate deterministic cache key for a ranking query
 */
export function generateMatchQueryKey(parts: MatchQueryParts): string {
  const { tenantId, weightsVersion, ...query } = parts;
  const hash = crypto
    .createHash("sha256")
    .update(JSON.stringify(canonicalize(query)))
    .digest("hex");

  return `match:${encodeURIComponent(tenantId)}:v${weightsVersion}:${hash}`;
}
