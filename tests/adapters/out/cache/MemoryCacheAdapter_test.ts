import { test } from "node:test";
import assert from "node:assert/strict";
import { globToRegExp, MemoryCacheAdapter } from "../../../../src/adapters/out/cache/MemoryCacheAdapter.ts";
import { ManualClock } from "../../../testUtils.ts";

async function read(cache: MemoryCacheAdapter<string>, key: string) {
  const value = await cache.get(key);
  assert.ok(value.isOk());
  return value.value;
}

test("MemoryCacheAdapter - returns stored values until they expire", async () => {
  const clock = new ManualClock();
  const cache = new MemoryCacheAdapter<string>(10, clock);
  await cache.set("search:a", "alpha", 1000);

  clock.advance(999);
  assert.equal(await read(cache, "search:a"), "alpha");

  clock.advance(1);
  assert.equal(await read(cache, "search:a"), undefined);
  assert.equal(cache.size, 0);
});

test("MemoryCacheAdapter - reports the time left before expiry", async () => {
  const clock = new ManualClock();
  const cache = new MemoryCacheAdapter<string>(10, clock);
  await cache.set("search:a", "alpha", 1000);
  clock.advance(400);

  const left = await cache.remainingTtlMs("search:a");
  assert.ok(left.isOk());
  assert.equal(left.value, 600);

  clock.advance(600);
  const gone = await cache.remainingTtlMs("search:a");
  assert.ok(gone.isOk());
  assert.equal(gone.value, undefined);
});

test("MemoryCacheAdapter - evicts the least recently used entry", async () => {
  const cache = new MemoryCacheAdapter<string>(2, new ManualClock());
  await cache.set("a", "alpha", 60_000);
  await cache.set("b", "bravo", 60_000);
  await read(cache, "a");

  await cache.set("c", "charlie", 60_000);

  assert.equal(cache.size, 2);
  assert.equal(await read(cache, "b"), undefined);
  assert.equal(await read(cache, "a"), "alpha");
  assert.equal(await read(cache, "c"), "charlie");
});

test("MemoryCacheAdapter - invalidates single keys and glob patterns", async () => {
  const cache = new MemoryCacheAdapter<string>(10, new ManualClock());
  await cache.set("search:1", "one", 60_000);
  await cache.set("search:2", "two", 60_000);
  await cache.set("other:1", "three", 60_000);

  const single = await cache.invalidate("search:1");
  assert.ok(single.isOk());
  assert.equal(single.value, 1);

  const pattern = await cache.invalidate("search:*");
  assert.ok(pattern.isOk());
  assert.equal(pattern.value, 1);
  assert.equal(await read(cache, "other:1"), "three");

  const missing = await cache.invalidate("search:1");
  assert.ok(missing.isOk());
  assert.equal(missing.value, 0);
});

test("globToRegExp - only the star is special", () => {
  const matcher = globToRegExp("search:*.v1");

  assert.equal(matcher.test("search:abc.v1"), true);
  assert.equal(matcher.test("search:abcxv1"), false);
  assert.equal(matcher.test("prefix-search:abc.v1"), false);
});
