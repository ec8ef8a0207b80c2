import { test } from "node:test";
import assert from "node:assert/strict";
import Decimal from "decimal.js";
import { AdmissionControl } from "../../../src/application/services/admission/AdmissionControl.ts";
import { PerformanceTracker } from "../../../src/application/services/PerformanceTracker.ts";
import { RoutingService } from "../../../src/application/services/RoutingService.ts";
import { DefaultProviderScorer, ScorerRegistry } from "../../../src/application/services/scoring/ProviderScorer.ts";
import { ProviderRegistry } from "../../../src/adapters/out/search/Registry.ts";
import {
  defaultSettings,
  type HubSettings,
  type ProviderSettings,
  ProviderSettingsSchema,
  providerSettings,
  type RouterSettings,
} from "../../../src/config/settings.ts";
import type { QueryOptions } from "../../../src/domain/models/search.ts";
import { FakeProvider, features, ManualClock, topicResults } from "../../testUtils.ts";

function hubSettings(
  router: Partial<RouterSettings> = {},
  providers: Record<string, ProviderSettings> = {},
): HubSettings {
  const base = defaultSettings();
  const retry = { ...base.router.retry, baseDelayMs: 0, maxDelayMs: 0 };
  return { ...base, router: { ...base.router, retry, ...router }, providers };
}

function setup(adapters: FakeProvider[], settings = hubSettings()) {
  const clock = new ManualClock();
  const registry = new ProviderRegistry();
  const admission = new AdmissionControl(clock);
  for (const adapter of adapters) {
    registry.register(adapter);
    admission.register(adapter.id, providerSettings(settings, adapter.id));
  }
  const performance = new PerformanceTracker(clock);
  const router = new RoutingService(
    registry,
    admission,
    new ScorerRegistry(new DefaultProviderScorer(clock)),
    performance,
    settings,
  );
  return { router, admission, performance, clock };
}

function query(overrides: Partial<QueryOptions> = {}): QueryOptions {
  return { q: "test query", maxResults: 10, requireAllProviders: false, ...overrides };
}

test("RoutingService - parallel dispatch keeps fast results when a slow provider times out", async () => {
  const fast = new FakeProvider("fast", { kind: "results", results: topicResults(0, 2), delayMs: 50 });
  const slow = new FakeProvider("slow", { kind: "results", results: topicResults(2, 2), delayMs: 500 });
  const { router } = setup(
    [fast, slow],
    hubSettings({ baseTimeoutMs: 200, minTimeoutMs: 200, maxTimeoutMs: 200 }),
  );

  const outcome = await router.route(query(), features());

  assert.ok(outcome.isOk());
  assert.equal(outcome.value.strategy, "parallel");
  assert.equal(outcome.value.timeoutMs, 200);
  assert.deepEqual(outcome.value.providersUsed, ["fast"]);
  assert.equal(outcome.value.totalCost.toString(), "0.001");
  assert.deepEqual(outcome.value.resultsByProvider.get("fast")?.map((r) => r.source), ["fast", "fast"]);
  assert.equal(outcome.value.attempts.length, 1);
  assert.deepEqual(outcome.value.attempts[0], {
    provider: "slow",
    reason: {
      type: "provider_error",
      message: "slow did not answer within 200ms",
      error: { type: "timeout", message: "slow did not answer within 200ms", timeoutMs: 200 },
    },
  });
});

test("RoutingService - cascade stops once enough unique results arrive", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 3) });
  const b = new FakeProvider("b", { kind: "results", results: topicResults(3, 4) });
  const c = new FakeProvider("c", { kind: "results", results: topicResults(7, 2) });
  const { router } = setup([c, b, a]);

  const outcome = await router.route(query({ strategy: "cascade" }), features());

  assert.ok(outcome.isOk());
  assert.equal(outcome.value.strategy, "cascade");
  assert.deepEqual(outcome.value.providersUsed, ["a", "b"]);
  assert.equal(outcome.value.totalCost.toString(), "0.002");
  assert.equal(c.calls.length, 0);
});

test("RoutingService - complex queries over more than two candidates cascade automatically", async () => {
  const providers = ["a", "b", "c"].map((id, i) =>
    new FakeProvider(id, { kind: "results", results: topicResults(i * 3, 3) })
  );
  const { router } = setup(providers);

  const outcome = await router.route(query(), features({ complexity: 0.9 }));

  assert.ok(outcome.isOk());
  assert.equal(outcome.value.strategy, "cascade");
  assert.deepEqual(outcome.value.providersUsed, ["a", "b"]);
});

test("RoutingService - the query budget leaves out candidates it cannot cover", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 2) });
  const b = new FakeProvider("b", { kind: "results", results: topicResults(2, 2) });
  const { router } = setup([a, b]);

  const outcome = await router.route(query({ budget: new Decimal("0.0015") }), features());

  assert.ok(outcome.isOk());
  assert.deepEqual(outcome.value.providersUsed, ["a"]);
  assert.equal(b.calls.length, 0);
  const [attempt] = outcome.value.attempts;
  assert.equal(attempt.provider, "b");
  assert.equal(attempt.reason.type, "budget_exceeded");
  assert.ok(attempt.reason.type === "budget_exceeded");
  assert.equal(attempt.reason.limit, "0.0005");
});

test("RoutingService - a budget no candidate fits is a budget error", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 2) });
  const { router } = setup([a]);

  const outcome = await router.route(query({ budget: new Decimal("0.0005") }), features());

  assert.ok(outcome.isErr());
  assert.equal(outcome.error.type, "budget_exceeded");
  assert.equal(a.calls.length, 0);
});

test("RoutingService - every dispatched provider failing is an error", async () => {
  const a = new FakeProvider("a", { kind: "error", error: { type: "network", message: "connection reset" } });
  const b = new FakeProvider("b", { kind: "throws", message: "adapter bug" });
  const { router, performance } = setup([a, b]);

  const outcome = await router.route(query(), features());

  assert.ok(outcome.isErr());
  assert.equal(outcome.error.type, "no_providers_available");
  assert.equal(outcome.error.message, "All 2 dispatched provider(s) failed");
  assert.deepEqual(
    outcome.error.attempts.map((attempt) => [attempt.provider, attempt.reason.message]),
    [["a", "connection reset"], ["b", "adapter bug"]],
  );
  assert.equal(performance.get("a")?.successRate, 0);
});

test("RoutingService - repeated failures open the circuit and later queries report when to retry", async () => {
  const flaky = new FakeProvider("flaky", { kind: "error", error: { type: "network", message: "down" } });
  const { router } = setup(
    [flaky],
    hubSettings({}, { flaky: ProviderSettingsSchema.parse({ circuit: { failureThreshold: 2 } }) }),
  );

  await router.route(query(), features());
  await router.route(query(), features());
  const third = await router.route(query(), features());

  // two logical attempts, each tried three times
  assert.equal(flaky.calls.length, 6);
  assert.ok(third.isErr());
  assert.equal(third.error.type, "providers_unavailable");
  assert.ok(third.error.type === "providers_unavailable");
  assert.equal(third.error.retryAfterMs, 30_000);
});

test("RoutingService - explicit providers skip unknown ids and the score cut", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 2) }, {
    contentTypes: ["news"],
    affinity: { news: 0.1 },
  });
  const { router } = setup([a], hubSettings({ minScore: 0.9 }));

  const outcome = await router.route(query({ providers: ["ghost", "a"] }), features());

  assert.ok(outcome.isOk());
  assert.deepEqual(outcome.value.providersUsed, ["a"]);
  assert.deepEqual(
    outcome.value.attempts.map((attempt) => [attempt.provider, attempt.reason.type]),
    [["ghost", "unknown_provider"]],
  );
});

test("RoutingService - disabled providers are never selected", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 2) });
  const b = new FakeProvider("b", { kind: "results", results: topicResults(2, 2) });
  const { router } = setup([a, b], hubSettings({}, { b: ProviderSettingsSchema.parse({ enabled: false }) }));

  const outcome = await router.route(query(), features());

  assert.ok(outcome.isOk());
  assert.deepEqual(outcome.value.providersUsed, ["a"]);
  assert.equal(b.calls.length, 0);
});

test("RoutingService - routing hints pick providers and strategy", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 2) });
  const b = new FakeProvider("b", { kind: "results", results: topicResults(2, 2) });
  const { router } = setup([a, b]);

  const outcome = await router.route(query({ routingHints: "prefer b, be thorough" }), features());

  assert.ok(outcome.isOk());
  assert.equal(outcome.value.strategy, "cascade");
  assert.equal(outcome.value.requireAllProviders, true);
  assert.deepEqual(outcome.value.providersUsed, ["b"]);
  assert.equal(a.calls.length, 0);
});

test("RoutingService - a reported cost replaces the estimate", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 1), cost: "0.004" });
  const { router, admission, performance } = setup([a]);

  const outcome = await router.route(query({ maxResults: 4 }), features());

  assert.ok(outcome.isOk());
  assert.equal(outcome.value.totalCost.toString(), "0.004");
  assert.equal(admission.status()[0].budget.spentToday, "0.004");
  assert.equal(performance.get("a")?.averageResultQuality, 0.25);
  assert.deepEqual(a.calls, [{ q: "test query", maxResults: 4, contentType: "factual" }]);
});

test("RoutingService - a transient failure is retried inside one admission", async () => {
  const a = new FakeProvider("a", {
    kind: "flaky",
    failures: 1,
    error: { type: "network", message: "connection reset" },
    results: topicResults(0, 2),
  });
  const { router, admission, performance } = setup([a]);

  const outcome = await router.route(query(), features());

  assert.ok(outcome.isOk());
  assert.deepEqual(outcome.value.providersUsed, ["a"]);
  assert.equal(a.calls.length, 2);
  const [status] = admission.status();
  assert.equal(status.circuit.failureCount, 0);
  assert.equal(status.rateLimit.requestsLastMinute, 1);
  assert.equal(status.rateLimit.inFlight, 0);
  assert.equal(performance.get("a")?.totalQueries, 1);
  assert.equal(performance.get("a")?.successRate, 1);
});

test("RoutingService - exhausted retries count as one failure", async () => {
  const a = new FakeProvider("a", { kind: "error", error: { type: "timeout", message: "slow", timeoutMs: 10 } });
  const { router, admission } = setup([a]);

  const outcome = await router.route(query(), features());

  assert.ok(outcome.isErr());
  assert.equal(a.calls.length, 3);
  const [status] = admission.status();
  assert.equal(status.circuit.failureCount, 1);
  assert.equal(status.rateLimit.requestsLastMinute, 1);
});

test("RoutingService - non-transient failures are not retried", async () => {
  const a = new FakeProvider("a", { kind: "error", error: { type: "authorization", message: "bad key" } });
  const { router } = setup([a]);

  await router.route(query(), features());

  assert.equal(a.calls.length, 1);
});

test("RoutingService - an invalid reported cost fails only that provider", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 2) });
  const b = new FakeProvider("b", { kind: "results", results: topicResults(2, 2), cost: "n/a" });
  const { router, admission } = setup([a, b]);

  const outcome = await router.route(query(), features());

  assert.ok(outcome.isOk());
  assert.deepEqual(outcome.value.providersUsed, ["a"]);
  assert.deepEqual(
    outcome.value.attempts.map((attempt) => [attempt.provider, attempt.reason.type, attempt.reason.message]),
    [["b", "provider_error", "b reported an invalid cost: n/a"]],
  );
  const bStatus = admission.status().find((s) => s.provider === "b");
  assert.equal(bStatus?.rateLimit.inFlight, 0);
  assert.equal(bStatus?.budget.reserved, "0");
  assert.equal(bStatus?.circuit.failureCount, 1);
});

test("RoutingService - an invalid cost estimate excludes the provider", async () => {
  const a = new FakeProvider("a", { kind: "results", results: topicResults(0, 2) });
  const b = new FakeProvider("b", { kind: "results", results: topicResults(2, 2) }, { cost: "n/a" });
  const { router } = setup([a, b]);

  const outcome = await router.route(query(), features());

  assert.ok(outcome.isOk());
  assert.deepEqual(outcome.value.providersUsed, ["a"]);
  assert.deepEqual(
    outcome.value.attempts.map((attempt) => [attempt.provider, attempt.reason.message]),
    [["b", "Cost estimate failed: invalid cost: n/a"]],
  );
  assert.equal(b.calls.length, 0);
});

test("RoutingService - resolveHints keeps explicit options over hints", () => {
  const a = new FakeProvider("a", { kind: "results", results: [] });
  const b = new FakeProvider("b", { kind: "results", results: [] });
  const { router } = setup([a, b]);

  const hinted = router.resolveHints(query({ routingHints: "use b for recent news, be thorough" }));
  assert.deepEqual(hinted.providers, ["b"]);
  assert.equal(hinted.contentType, "news");
  assert.equal(hinted.strategy, "cascade");
  assert.equal(hinted.requireAllProviders, true);

  const explicit = router.resolveHints(
    query({ routingHints: "use b, quick", providers: ["a"], contentType: "academic", strategy: "cascade" }),
  );
  assert.deepEqual(explicit.providers, ["a"]);
  assert.equal(explicit.contentType, "academic");
  assert.equal(explicit.strategy, "cascade");
  assert.equal(explicit.requireAllProviders, false);
});
