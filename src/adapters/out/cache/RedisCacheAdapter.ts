import { err, ok, Result, ResultAsync } from "neverthrow";
import type { createClient } from "redis";
import { z } from "zod";
import type { CacheError, CacheRepository } from "../../../application/ports/out/CacheRepository.ts";
import { STRATEGY_NAMES } from "../../../domain/models/routing.ts";
import type { SearchResponse } from "../../../domain/models/search.ts";
import { debug, warn } from "../../../config/logger.ts";

type NodeRedisClient = ReturnType<typeof createClient>;

/**
 * The handful of Redis commands the cache tier needs
 */
export interface RedisStore {
  readonly isReady: boolean;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(keys: string[]): Promise<number>;
  /** -2 when the key is missing, -1 when it has no expiry */
  pTTL(key: string): Promise<number>;
  scan(pattern: string): AsyncIterable<string>;
}

export function fromNodeRedis(client: NodeRedisClient): RedisStore {
  return {
    get isReady() {
      return client.isReady;
    },
    get: (key) => client.get(key),
    set: async (key, value, ttlSeconds) => {
      await client.set(key, value, { EX: ttlSeconds });
    },
    del: (keys) => client.del(keys),
    pTTL: (key) => client.pTTL(key),
    scan: (pattern) => client.scanIterator({ MATCH: pattern, COUNT: 100 }),
  };
}

export interface CacheCodec<V> {
  encode(value: V): string;
  decode(raw: string): Result<V, CacheError>;
}

const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const MergedResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
  content: z.string().optional(),
  score: z.number(),
  source: z.string(),
  publishedAt: z.string().optional(),
  metadata: z.record(z.string(), MetadataValueSchema),
  rank: z.number().int(),
  consensusCount: z.number().int(),
  finalScore: z.number(),
  sources: z.array(z.string()),
});

export const SearchResponseSchema = z.object({
  query: z.string(),
  results: z.array(MergedResultSchema),
  providersUsed: z.array(z.string()),
  totalResults: z.number().int(),
  elapsedMs: z.number(),
  totalCost: z.string(),
  cacheHit: z.boolean(),
  strategy: z.enum(STRATEGY_NAMES),
  fingerprint: z.string(),
});

export const searchResponseCodec: CacheCodec<SearchResponse> = {
  encode: (value) => JSON.stringify(value),
  decode: (raw) =>
    Result.fromThrowable(
      (): unknown => JSON.parse(raw),
      (e): CacheError => ({
        type: "storage",
        message: `Cached value is not JSON: ${e instanceof Error ? e.message : String(e)}`,
      }),
    )().andThen((json) => {
      const parsed = SearchResponseSchema.safeParse(json);
      return parsed.success ? ok(parsed.data) : err<SearchResponse, CacheError>({
        type: "storage",
        message: `Cached value has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      });
    }),
};

function toCacheError(operation: string) {
  return (e: unknown): CacheError => ({
    type: "storage",
    message: `Redis ${operation} failed: ${e instanceof Error ? e.message : String(e)}`,
  });
}

/**
 * Shared Redis tier. TTLs are rounded up to whole seconds.
 */
export class RedisCacheAdapter<V> implements CacheRepository<V> {
  readonly tier = "redis";

  constructor(
    private readonly store: RedisStore,
    private readonly codec: CacheCodec<V>,
  ) {}

  async get(key: string): Promise<Result<V | undefined, CacheError>> {
    if (!this.store.isReady) {
      return err({ type: "storage", message: "Redis is not connected" });
    }
    return await ResultAsync.fromPromise(this.store.get(key), toCacheError("GET"))
      .andThen((raw): Result<V | undefined, CacheError> => {
        if (raw === null) return ok(undefined);
        return this.codec.decode(raw).orElse((e) => {
          warn(`[CACHE] Discarding unreadable entry ${key}: ${e.message}`);
          return ok(undefined);
        });
      });
  }

  async set(key: string, value: V, ttlMs: number): Promise<Result<void, CacheError>> {
    if (!this.store.isReady) {
      return err({ type: "storage", message: "Redis is not connected" });
    }
    const ttlSeconds = Math.max(1, Math.ceil(ttlMs / 1000));
    return await ResultAsync.fromPromise(
      this.store.set(key, this.codec.encode(value), ttlSeconds),
      toCacheError("SET"),
    );
  }

  async remainingTtlMs(key: string): Promise<Result<number | undefined, CacheError>> {
    if (!this.store.isReady) {
      return err({ type: "storage", message: "Redis is not connected" });
    }
    return await ResultAsync.fromPromise(this.store.pTTL(key), toCacheError("PTTL"))
      .map((ttl) => (ttl > 0 ? ttl : undefined));
  }

  async invalidate(keyOrPattern: string): Promise<Result<number, CacheError>> {
    if (!this.store.isReady) {
      return err({ type: "storage", message: "Redis is not connected" });
    }
    if (!keyOrPattern.includes("*")) {
      return await ResultAsync.fromPromise(this.store.del([keyOrPattern]), toCacheError("DEL"));
    }

    return await ResultAsync.fromPromise(this.collectKeys(keyOrPattern), toCacheError("SCAN"))
      .andThen((keys) => {
        debug(`[CACHE] ${keys.length} Redis key(s) match ${keyOrPattern}`);
        return keys.length === 0
          ? ResultAsync.fromSafePromise(Promise.resolve(0))
          : ResultAsync.fromPromise(this.store.del(keys), toCacheError("DEL"));
      });
  }

  private async collectKeys(pattern: string): Promise<string[]> {
    const keys: string[] = [];
    for await (const key of this.store.scan(pattern)) {
      keys.push(key);
    }
    return keys;
  }
}
