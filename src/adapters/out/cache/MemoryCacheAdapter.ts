import { ok, Result } from "neverthrow";
import type { CacheError, CacheRepository } from "../../../application/ports/out/CacheRepository.ts";
import { type Clock, systemClock } from "../../../application/services/admission/Clock.ts";

interface CacheEntry<V> {
  value: V;
  expireAt: number;
}

/**
 * Converts a `*` glob into an anchored regular expression
 */
export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.split("*").map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"));
  return new RegExp(`^${escaped.join(".*")}$`);
}

/**
 * In-process LRU tier. A read moves the entry to the most recently used end;
 * inserting past `maxEntries` evicts from the least recently used end.
 */
export class MemoryCacheAdapter<V> implements CacheRepository<V> {
  readonly tier = "memory";
  private storage = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly maxEntries: number,
    private readonly clock: Clock = systemClock,
  ) {}

  get(key: string): Promise<Result<V | undefined, CacheError>> {
    const entry = this.storage.get(key);

    if (!entry) {
      return Promise.resolve(ok(undefined));
    }

    this.storage.delete(key);
    if (entry.expireAt <= this.clock.now()) {
      return Promise.resolve(ok(undefined));
    }

    this.storage.set(key, entry);
    return Promise.resolve(ok(entry.value));
  }

  set(key: string, value: V, ttlMs: number): Promise<Result<void, CacheError>> {
    this.storage.delete(key);
    this.storage.set(key, {
      value,
      expireAt: this.clock.now() + ttlMs,
    });

    while (this.storage.size > this.maxEntries) {
      const oldest = this.storage.keys().next();
      if (oldest.done) break;
      this.storage.delete(oldest.value);
    }

    return Promise.resolve(ok(undefined));
  }

  remainingTtlMs(key: string): Promise<Result<number | undefined, CacheError>> {
    const entry = this.storage.get(key);
    const remaining = entry ? entry.expireAt - this.clock.now() : 0;
    return Promise.resolve(ok(remaining > 0 ? remaining : undefined));
  }

  invalidate(keyOrPattern: string): Promise<Result<number, CacheError>> {
    if (!keyOrPattern.includes("*")) {
      return Promise.resolve(ok(this.storage.delete(keyOrPattern) ? 1 : 0));
    }

    const matcher = globToRegExp(keyOrPattern);
    let removed = 0;
    for (const key of [...this.storage.keys()]) {
      if (matcher.test(key)) {
        this.storage.delete(key);
        removed += 1;
      }
    }
    return Promise.resolve(ok(removed));
  }

  get size(): number {
    return this.storage.size;
  }
}
