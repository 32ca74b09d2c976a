/**
 * BUSINESS LOGIC: Matching Service Layer
 * Rank, Explain, UpdateWeights and ClearCache over the scoring core
 *
 * @fileoverview Wires the weight store, the match query cache and the entity
 * storage collaborator around the pure scorers. Every ranking pass reads one
 * weight snapshot and keeps it until the pass completes.
 *
 * @example
 * ```typescript
 * const service = createMatchingService(loadConfig(), new MemEntityStorage(records));
 *
 * const ranked = await service.rankForAnchor('acme', 'candidate', 'cand-1', { k: 10 });
 * if (isSuccess(ranked)) {
 *   console.log(ranked.data.results.map(toWireMatch));
 * }
 *
 * service.updateWeights({ components: { distance: 0.2 } });
 * ```
 */

import { logger } from "../config/logger";
import type { AppConfig } from "../config/unified-config";
import type { IEntityStorage } from "../storage";
import { fingerprintPool, generateMatchQueryKey } from "../lib/cache-key-generator";
import { rankPool, scorePair, type RankOptions } from "../lib/composite-scorer";
import { explainMatch } from "../lib/match-explainer";
import { MatchQueryCache, type CachedLookup } from "../lib/match-query-cache";
import { resolveTenant } from "../lib/tenant-guard";
import { WeightConfigStore } from "../lib/weight-config-store";
import type { CacheStats } from "../lib/bounded-lru-cache";
import { AppNotFoundError } from "@shared/errors";
import {
  failure,
  success,
  type MatchQueryResult,
  type WeightUpdateResult,
} from "@shared/result-types";
import type { MatchExplanation, MatchResult } from "@shared/api-contracts";
import type { Entity, EntityKind, WeightConfiguration } from "@shared/schema";

// ===== SERVICE INTERFACES =====

/**
 * Options for a store-backed ranking query
 */
export interface RankForAnchorOptions {
  /** Result count; defaults to the configured top K and is capped at the maximum */
  k?: number;
  /** Restrict the pool to the anchor's city when distance carries no weight */
  cityFilter?: boolean;
  maxDistanceKm?: number;
}

export interface RankedMatches extends CachedLookup {
  anchor: Entity;
  topK: number;
  weightsVersion: number;
}

export interface ExplainedMatch {
  result: MatchResult;
  explanation: MatchExplanation;
}

export interface MatchingServiceOptions {
  defaultTopK: number;
  maxTopK: number;
  maxPoolSize: number;
  tieEpsilon: number;
}

const oppositeKind = (kind: EntityKind): EntityKind => (kind === "candidate" ? "job" : "candidate");

// ===== MATCHING SERVICE IMPLEMENTATION =====

export class MatchingService {
  constructor(
    private readonly weightStore: WeightConfigStore,
    private readonly cache: MatchQueryCache,
    private readonly storage: IEntityStorage,
    private readonly options: MatchingServiceOptions
  ) {
    logger.info({ ...options }, "MatchingService initialized");
  }

  private rankOptions(maxDistanceKm?: number): RankOptions {
    return {
      tieEpsilon: this.options.tieEpsilon,
      maxPoolSize: this.options.maxPoolSize,
      maxDistanceKm,
    };
  }

  /**
   * Top K matches for an anchor over a caller-supplied pool.
   *
   * Served from the cache when `weights` is omitted or is the installed
   * snapshot; any other snapshot is scored directly.
   *
   * @throws {AppNotFoundError} when the anchor has no resolvable tenant
   */
  rank(
    anchor: Entity,
    pool: readonly Entity[],
    topK: number,
    weights?: WeightConfiguration
  ): readonly MatchResult[] {
    const tenantId = resolveTenant(anchor);
    const installed = this.weightStore.current();
    const snapshot = weights ?? installed;
    const compute = () => rankPool(anchor, pool, topK, snapshot, this.rankOptions());

    if (snapshot !== installed) {
      return compute();
    }

    const key = generateMatchQueryKey({
      tenantId,
      weightsVersion: snapshot.version,
      direction: anchor.kind,
      anchorId: anchor.id,
      anchorUpdatedAt: anchor.updatedAt,
      topK: Math.floor(topK),
      cityFilter: false,
      poolFingerprint: fingerprintPool(pool),
    });
    return this.cache.getOrCompute(key, compute).results;
  }

  /**
   * Score and explain a single pair. Never cached.
   *
   * @throws {AppTenantMismatchError} for a cross-tenant pair
   */
  explain(anchor: Entity, counterpart: Entity, weights?: WeightConfiguration): ExplainedMatch {
    const snapshot = weights ?? this.weightStore.current();
    const result = scorePair(anchor, counterpart, snapshot);
    return { result, explanation: explainMatch(result, snapshot) };
  }

  /**
   * Merge a partial weight update; on success every later query misses the
   * cache because keys carry the new version.
   */
  updateWeights(patch: unknown): WeightUpdateResult<WeightConfiguration> {
    return this.weightStore.update(patch);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getWeights(): WeightConfiguration {
    return this.weightStore.current();
  }

  getCacheStats(): CacheStats & { inflight: number } {
    return this.cache.getStats();
  }

  /**
   * Rank the opposite-kind pool for a stored anchor.
   *
   * A missing anchor and an anchor owned by another tenant produce the same
   * not-found failure.
   */
  async rankForAnchor(
    tenantId: string,
    anchorKind: EntityKind,
    anchorId: string,
    options: RankForAnchorOptions = {}
  ): Promise<MatchQueryResult<RankedMatches>> {
    const tenant = tenantId.trim();
    const anchor = tenant ? await this.storage.getEntity(tenant, anchorKind, anchorId) : undefined;
    if (!anchor) {
      return failure(AppNotFoundError.entity(anchorKind, anchorId));
    }

    const weights = this.weightStore.current();
    const topK = Math.min(options.k ?? this.options.defaultTopK, this.options.maxTopK);
    const cityFilter = options.cityFilter ?? true;
    const city =
      cityFilter && anchor.city && weights.components.distance === 0 ? anchor.city : undefined;

    const key = generateMatchQueryKey({
      tenantId: tenant,
      weightsVersion: weights.version,
      direction: anchor.kind,
      anchorId: anchor.id,
      anchorUpdatedAt: anchor.updatedAt,
      topK,
      cityFilter,
      maxDistanceKm: options.maxDistanceKm,
    });

    const lookup = await this.cache.getOrComputeAsync(key, async () => {
      const pool = await this.storage.queryPool(tenant, { kind: oppositeKind(anchor.kind), city });
      const results = rankPool(anchor, pool, topK, weights, this.rankOptions(options.maxDistanceKm));
      logger.debug(
        { tenantId: tenant, anchorKind, poolSize: pool.length, returned: results.length },
        "Ranked pool for anchor"
      );
      return results;
    });

    return success({ ...lookup, anchor, topK, weightsVersion: weights.version });
  }

  /**
   * Explain one stored candidate against one stored job of the same tenant
   */
  async explainPair(
    tenantId: string,
    candidateId: string,
    jobId: string
  ): Promise<MatchQueryResult<ExplainedMatch>> {
    const tenant = tenantId.trim();
    const [candidate, job] = tenant
      ? await Promise.all([
          this.storage.getEntity(tenant, "candidate", candidateId),
          this.storage.getEntity(tenant, "job", jobId),
        ])
      : [undefined, undefined];

    if (!candidate) {
      return failure(AppNotFoundError.entity("candidate", candidateId));
    }
    if (!job) {
      return failure(AppNotFoundError.entity("job", jobId));
    }
    return success(this.explain(candidate, job));
  }
}

/**
 * Build a service from validated configuration.
 *
 * @throws {AppConfigurationError} when the default weights are invalid
 */
export function createMatchingService(config: AppConfig, storage: IEntityStorage): MatchingService {
  const weightStore = new WeightConfigStore(config.defaultWeights);
  const cache = new MatchQueryCache({ capacity: config.cache.capacity, ttlMs: config.cache.ttlMs });
  return new MatchingService(weightStore, cache, storage, config.ranking);
}
