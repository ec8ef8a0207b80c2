import { createClient } from "redis";
import { err, ok, Result, ResultAsync } from "neverthrow";
import type { ProviderAdapter } from "../application/ports/out/ProviderAdapter.ts";
import { MemoryCacheAdapter } from "../adapters/out/cache/MemoryCacheAdapter.ts";
import {
  fromNodeRedis,
  RedisCacheAdapter,
  searchResponseCodec,
} from "../adapters/out/cache/RedisCacheAdapter.ts";
import { BraveSearchAdapter } from "../adapters/out/search/BraveSearchAdapter.ts";
import { ProviderRegistry } from "../adapters/out/search/Registry.ts";
import { TavilySearchAdapter } from "../adapters/out/search/TavilySearchAdapter.ts";
import type { SearchResponse } from "../domain/models/search.ts";
import type { ApiKeys } from "./env.ts";
import { debug, info, warn } from "./logger.ts";
import type { HubSettings } from "./settings.ts";

type RedisClient = ReturnType<typeof createClient>;

/**
 * Type definition representing the adapter container.
 */
export interface AdapterContainer {
  providers: ProviderRegistry;
  memoryCache: MemoryCacheAdapter<SearchResponse>;
  sharedCache?: RedisCacheAdapter<SearchResponse>;
  redis?: RedisClient;
}

export type AdapterInitError = {
  type: "no_adapters" | "redis";
  message: string;
};

/**
 * Initializes and registers adapters.
 * Backends without an API key are skipped; `extra` adapters are registered as given.
 */
export function initializeAdapters(
  apiKeys: ApiKeys,
  settings: HubSettings,
  extra: ReadonlyArray<ProviderAdapter> = [],
): Result<AdapterContainer, AdapterInitError> {
  const providers = new ProviderRegistry();

  if (apiKeys.brave) {
    providers.register(new BraveSearchAdapter(apiKeys.brave));
    info("Registered BraveSearchAdapter");
  } else {
    info("Brave Search integration disabled (no API key)");
  }

  if (apiKeys.tavily) {
    providers.register(new TavilySearchAdapter(apiKeys.tavily));
    info("Registered TavilySearchAdapter");
  } else {
    info("Tavily integration disabled (no API key)");
  }

  for (const adapter of extra) {
    providers.register(adapter);
    info(`Registered ${adapter.name}`);
  }

  if (providers.size === 0) {
    return err({
      type: "no_adapters",
      message: "No search adapters registered",
    });
  }

  const memoryCache = new MemoryCacheAdapter<SearchResponse>(settings.cache.memoryMaxEntries);
  if (!settings.cache.redisEnabled) {
    debug("Redis cache tier disabled");
    return ok({ providers, memoryCache });
  }

  let ready = false;
  const redis = createClient({
    url: settings.cache.redisUrl,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: settings.cache.redisConnectTimeoutMs,
      reconnectStrategy: redisReconnectStrategy(settings.cache.redisStartupRetries, () => ready),
    },
  });
  redis.on("ready", () => {
    ready = true;
  });
  redis.on("error", (e: unknown) => {
    warn(`[CACHE] Redis error: ${e instanceof Error ? e.message : String(e)}`);
  });
  const sharedCache = new RedisCacheAdapter(fromNodeRedis(redis), searchResponseCodec);

  return ok({ providers, memoryCache, sharedCache, redis });
}

/**
 * Until the client has been ready once, give up after `startupRetries` reconnects so that
 * `connect()` rejects instead of retrying forever. After that, keep reconnecting with backoff.
 */
export function redisReconnectStrategy(
  startupRetries: number,
  hasBeenReady: () => boolean,
): (retries: number, cause: Error) => number | Error {
  return (retries, cause) => {
    if (!hasBeenReady() && retries >= startupRetries) {
      return new Error(`gave up after ${retries + 1} attempt(s): ${cause.message}`);
    }
    return Math.min(100 * 2 ** retries, 5000);
  };
}

/**
 * Connects the shared cache tier when one is configured. Until it connects, the tier reads as a miss.
 */
export function connectSharedCache(container: AdapterContainer): ResultAsync<void, AdapterInitError> {
  const redis = container.redis;
  if (!redis) {
    return ResultAsync.fromSafePromise(Promise.resolve(undefined));
  }
  return ResultAsync.fromPromise(
    redis.connect().then(() => info("[CACHE] Redis tier connected")),
    (e): AdapterInitError => ({
      type: "redis",
      message: `Redis connection failed: ${e instanceof Error ? e.message : String(e)}`,
    }),
  );
}

export function disconnectSharedCache(container: AdapterContainer): ResultAsync<void, AdapterInitError> {
  const redis = container.redis;
  if (!redis || !redis.isOpen) {
    return ResultAsync.fromSafePromise(Promise.resolve(undefined));
  }
  return ResultAsync.fromPromise(
    redis.quit().then(() => undefined),
    (e): AdapterInitError => ({
      type: "redis",
      message: `Redis disconnect failed: ${e instanceof Error ? e.message : String(e)}`,
    }),
  );
}
