import { test } from "node:test";
import assert from "node:assert/strict";
import Decimal from "decimal.js";
import { err, ok } from "neverthrow";
import {
  DefaultProviderScorer,
  type ExternalScoreSource,
  type ProviderScorer,
  ScorerRegistry,
  type ScoringCandidate,
} from "../../../../src/application/services/scoring/ProviderScorer.ts";
import type { ProviderPerformance } from "../../../../src/domain/models/routing.ts";
import { features, ManualClock, START } from "../../../testUtils.ts";

const HOUR_MS = 3_600_000;

function candidate(overrides: Partial<ScoringCandidate> = {}): ScoringCandidate {
  return {
    id: "scholar",
    capabilities: {
      contentTypes: ["academic"],
      contentTypeAffinity: { academic: 0.9, news: 0.5 },
      maxResultsPerQuery: 10,
    },
    qualityWeight: 0.8,
    estimatedCost: new Decimal("0.002"),
    ...overrides,
  };
}

function history(overrides: Partial<ProviderPerformance> = {}): ProviderPerformance {
  return {
    provider: "scholar",
    totalQueries: 500,
    successRate: 1,
    averageLatencyMs: 4000,
    averageResultQuality: 1,
    lastUpdatedAt: START,
    ...overrides,
  };
}

test("DefaultProviderScorer - blends affinity, quality weight and neutral health without history", () => {
  const scored = new DefaultProviderScorer(new ManualClock()).score(
    features({ contentType: "academic" }),
    candidate(),
  );

  assert.ok(scored.isOk());
  assert.equal(scored.value.score, 0.79);
  assert.equal(scored.value.confidence, 0.5);
  assert.equal(scored.value.role, "primary");
  assert.equal(scored.value.estimatedLatencyMs, 1000);
  assert.equal(scored.value.estimatedCost.toString(), "0.002");
  assert.equal(scored.value.scorer, "default");
});

test("DefaultProviderScorer - unsupported content types score low and become fallbacks", () => {
  const scored = new DefaultProviderScorer(new ManualClock()).score(
    features({ contentType: "commercial" }),
    candidate(),
  );

  assert.ok(scored.isOk());
  assert.equal(scored.value.score, 0.39);
  assert.equal(scored.value.role, "fallback");
});

test("DefaultProviderScorer - mixed queries use the mean affinity", () => {
  const scored = new DefaultProviderScorer(new ManualClock()).score(
    features({ contentType: "mixed" }),
    candidate(),
  );

  assert.ok(scored.isOk());
  assert.equal(scored.value.score, 0.69);
  assert.equal(scored.value.role, "primary");
});

test("DefaultProviderScorer - recent history raises health and confidence", () => {
  const scored = new DefaultProviderScorer(new ManualClock()).score(
    features({ contentType: "academic" }),
    candidate(),
    history(),
  );

  assert.ok(scored.isOk());
  assert.equal(scored.value.score, 0.86);
  assert.equal(scored.value.confidence, 0.7);
  assert.equal(scored.value.estimatedLatencyMs, 4000);
});

test("DefaultProviderScorer - old history decays toward neutral", () => {
  const clock = new ManualClock();
  clock.advance(24 * HOUR_MS);

  const scored = new DefaultProviderScorer(clock).score(
    features({ contentType: "academic" }),
    candidate(),
    history(),
  );

  assert.ok(scored.isOk());
  assert.ok(Math.abs(scored.value.score - 0.815752) < 1e-6);
});

test("DefaultProviderScorer - external suggestions are weighted by confidence", () => {
  const external: ExternalScoreSource = {
    id: "llm",
    suggest: () => ok({ score: 0.3, confidence: 0.5 }),
  };

  const scored = new DefaultProviderScorer(new ManualClock(), external).score(
    features({ contentType: "academic" }),
    candidate(),
  );

  assert.ok(scored.isOk());
  assert.equal(scored.value.score, 0.545);
  assert.equal(scored.value.confidence, 0.5);
  assert.equal(scored.value.scorer, "default+llm");
});

test("DefaultProviderScorer - a failing external source leaves the default score", () => {
  const external: ExternalScoreSource = {
    id: "llm",
    suggest: () => err({ type: "scorer", scorer: "llm", message: "model unavailable" }),
  };

  const scored = new DefaultProviderScorer(new ManualClock(), external).score(
    features({ contentType: "academic" }),
    candidate(),
  );

  assert.ok(scored.isOk());
  assert.equal(scored.value.score, 0.79);
});

test("ScorerRegistry - the most confident scorer wins and throwing scorers are skipped", () => {
  const confident: ProviderScorer = {
    id: "confident",
    kind: "external",
    score: (_features, c) =>
      ok({
        provider: c.id,
        score: 0.42,
        confidence: 0.9,
        estimatedCost: c.estimatedCost,
        estimatedLatencyMs: 10,
        role: "primary",
        qualityWeight: c.qualityWeight,
        scorer: "confident",
      }),
  };
  const broken: ProviderScorer = {
    id: "broken",
    kind: "external",
    score: () => {
      throw new Error("boom");
    },
  };

  const registry = new ScorerRegistry(new DefaultProviderScorer(new ManualClock()))
    .register(broken)
    .register(confident);
  const scored = registry.score(features({ contentType: "academic" }), candidate());

  assert.ok(scored.isOk());
  assert.equal(scored.value.scorer, "confident");
  assert.equal(scored.value.score, 0.42);
});

test("ScorerRegistry - rank orders by score, then quality weight, then id", () => {
  const registry = new ScorerRegistry(new DefaultProviderScorer(new ManualClock()));
  const ranked = registry.rank(
    features({ contentType: "academic" }),
    [
      candidate({ id: "zeta" }),
      candidate({ id: "alpha" }),
      candidate({ id: "weak", capabilities: { contentTypes: [], contentTypeAffinity: {}, maxResultsPerQuery: 5 } }),
    ],
    () => undefined,
  );

  assert.deepEqual(ranked.map((s) => s.provider), ["alpha", "zeta", "weak"]);
});
