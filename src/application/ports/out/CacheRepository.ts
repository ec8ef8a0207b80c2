import { Result } from "neverthrow";

export type CacheTier = "memory" | "redis";

/**
 * Output port for one cache tier
 */
export interface CacheRepository<V> {
  readonly tier: CacheTier;

  get(key: string): Promise<Result<V | undefined, CacheError>>;

  set(key: string, value: V, ttlMs: number): Promise<Result<void, CacheError>>;

  /**
   * Milliseconds until `key` expires; undefined when it is missing or never expires
   */
  remainingTtlMs(key: string): Promise<Result<number | undefined, CacheError>>;

  /**
   * Removes one key, or every key matching a `*` glob pattern. Yields the number removed.
   */
  invalidate(keyOrPattern: string): Promise<Result<number, CacheError>>;
}

/**
 * Cache error type
 */
export type CacheError = {
  type: "storage";
  message: string;
};
