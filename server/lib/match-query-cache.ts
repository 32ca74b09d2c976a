/**
 * Match Query Cache
 *
 * Bounded LRU of ranked result lists keyed by (tenant, canonical query,
 * weight version). Cached lists are frozen so a hit hands back exactly what
 * was stored. Concurrent misses on the same key share one computation.
 */

import { logger } from "../config/logger";
import type { MatchResult } from "@shared/api-contracts";
import { BoundedLRUCache, type BoundedLRUCacheOptions, type CacheStats } from "./bounded-lru-cache";

export type RankedList = readonly MatchResult[];

export interface CachedLookup {
  results: RankedList;
  cached: boolean;
}

export class MatchQueryCache {
  private readonly entries: BoundedLRUCache<RankedList>;
  private readonly inflight = new Map<string, Promise<RankedList>>();

  constructor(options: BoundedLRUCacheOptions) {
    this.entries = new BoundedLRUCache<RankedList>(options);
  }

  get(key: string): RankedList | undefined {
    return this.entries.get(key);
  }

  set(key: string, results: readonly MatchResult[]): RankedList {
    const frozen = Object.freeze([...results]);
    this.entries.set(key, frozen);
    return frozen;
  }

  /**
   * Synchronous read-through for callers that already hold the pool
   */
  getOrCompute(key: string, compute: () => readonly MatchResult[]): CachedLookup {
    const hit = this.entries.get(key);
    if (hit) {
      logger.debug({ key }, "Match cache hit");
      return { results: hit, cached: true };
    }
    logger.debug({ key }, "Match cache miss");
    return { results: this.set(key, compute()), cached: false };
  }

  /**
   * Async read-through; identical in-flight misses await the same promise
   */
  async getOrComputeAsync(
    key: string,
    compute: () => Promise<readonly MatchResult[]>
  ): Promise<CachedLookup> {
    const hit = this.entries.get(key);
    if (hit) {
      logger.debug({ key }, "Match cache hit");
      return { results: hit, cached: true };
    }

    const pending = this.inflight.get(key);
    if (pending) {
      logger.debug({ key }, "Match cache miss joined in-flight computation");
      return { results: await pending, cached: false };
    }

    logger.debug({ key }, "Match cache miss");
    const computation = compute().then((results) => this.set(key, results));
    this.inflight.set(key, computation);
    try {
      return { results: await computation, cached: false };
    } finally {
      this.inflight.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
    logger.info("Match cache cleared");
  }

  getStats(): CacheStats & { inflight: number } {
    return { ...this.entries.getStats(), inflight: this.inflight.size };
  }
}
