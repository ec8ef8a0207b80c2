import { err, ok, Result } from "neverthrow";
import type { CacheSettings } from "../../config/settings.ts";
import type { SearchResponse } from "../../domain/models/search.ts";
import { debug, warn } from "../../config/logger.ts";
import type { CacheError, CacheRepository } from "../ports/out/CacheRepository.ts";

/**
 * Memory tier in front of an optional shared tier.
 * A shared-tier failure is logged and treated as a miss; it never fails a search.
 */
export class TieredCacheService {
  constructor(
    private readonly memory: CacheRepository<SearchResponse>,
    private readonly settings: CacheSettings,
    private readonly shared?: CacheRepository<SearchResponse>,
  ) {}

  async get(key: string): Promise<SearchResponse | undefined> {
    const local = await this.memory.get(key);
    if (local.isOk() && local.value) {
      debug(`[CACHE] memory hit ${key}`);
      return { ...local.value, cacheHit: true };
    }
    if (local.isErr()) {
      warn(`[CACHE] memory tier read failed: ${local.error.message}`);
    }

    if (!this.shared) {
      return undefined;
    }
    const remote = await this.shared.get(key);
    if (remote.isErr()) {
      warn(`[CACHE] ${this.shared.tier} tier read failed: ${remote.error.message}`);
      return undefined;
    }
    if (!remote.value) {
      return undefined;
    }

    const ttlMs = await this.promotionTtlMs(this.shared, key);
    debug(`[CACHE] ${this.shared.tier} hit ${key}, promoting to memory for ${ttlMs}ms`);
    await this.memory.set(key, remote.value, ttlMs);
    return { ...remote.value, cacheHit: true };
  }

  async set(key: string, response: SearchResponse): Promise<void> {
    const stored: SearchResponse = { ...response, cacheHit: false };
    const local = await this.memory.set(key, stored, this.settings.memoryTtlSeconds * 1000);
    if (local.isErr()) {
      warn(`[CACHE] memory tier write failed: ${local.error.message}`);
    }
    if (this.shared) {
      const remote = await this.shared.set(key, stored, this.settings.redisTtlSeconds * 1000);
      if (remote.isErr()) {
        warn(`[CACHE] ${this.shared.tier} tier write failed: ${remote.error.message}`);
      }
    }
  }

  /**
   * Removes a key or `*` pattern from every tier. Counts are reported per tier.
   */
  async invalidate(keyOrPattern: string): Promise<Result<Record<string, number>, CacheError>> {
    const removed: Record<string, number> = {};
    for (const tier of this.tiers()) {
      const result = await tier.invalidate(keyOrPattern);
      if (result.isErr()) {
        return err(result.error);
      }
      removed[tier.tier] = result.value;
    }
    debug(`[CACHE] invalidated ${keyOrPattern}: ${JSON.stringify(removed)}`);
    return ok(removed);
  }

  /**
   * A promoted entry never outlives its shared copy
   */
  private async promotionTtlMs(shared: CacheRepository<SearchResponse>, key: string): Promise<number> {
    const memoryTtlMs = this.settings.memoryTtlSeconds * 1000;
    const remaining = await shared.remainingTtlMs(key);
    if (remaining.isErr()) {
      warn(`[CACHE] ${shared.tier} tier TTL read failed: ${remaining.error.message}`);
      return memoryTtlMs;
    }
    return remaining.value === undefined ? memoryTtlMs : Math.min(memoryTtlMs, remaining.value);
  }

  private tiers(): CacheRepository<SearchResponse>[] {
    return this.shared ? [this.memory, this.shared] : [this.memory];
  }
}
