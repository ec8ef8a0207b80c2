import { test } from "node:test";
import assert from "node:assert/strict";
import { mergeResults, type MergeOptions } from "../../../src/domain/services/resultMerger.ts";
import type { SearchResult } from "../../../src/domain/models/search.ts";
import { features, result, START, topicResults } from "../../testUtils.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

const baseOptions: MergeOptions = {
  maxResults: 10,
  fuzzyThreshold: 92,
  contentThreshold: 0.85,
  consensusWeight: 0.5,
  recencyWeight: 0.2,
  recencyHorizonDays: 30,
  qualityWeights: { brave: 1, tavily: 0.5 },
  now: START,
};

const shared = {
  title: "Shared page about tide pools",
  snippet: "Tide pool ecology basics",
};

function byProvider(entries: Record<string, SearchResult[]>): Map<string, SearchResult[]> {
  return new Map(Object.entries(entries));
}

test("mergeResults - consensus across providers outranks a single strong hit", () => {
  const [volcanic] = topicResults(0, 1, 0.6);
  const [medieval] = topicResults(1, 1, 0.9);
  const merged = mergeResults(
    byProvider({
      tavily: [result("https://www.example.com/shared/", { ...shared, score: 0.5 }), medieval],
      brave: [result("https://example.com/shared", { ...shared, score: 0.8 }), volcanic],
    }),
    baseOptions,
  );

  assert.deepEqual(
    merged.map((r) => [r.rank, r.url, r.finalScore, r.consensusCount]),
    [
      [1, "https://example.com/shared", 1.3, 2],
      [2, "https://volcanic-islands.example.org/", 0.6, 1],
      [3, "https://medieval-castles.example.org/", 0.45, 1],
    ],
  );
  assert.deepEqual(merged[0].sources, ["brave", "tavily"]);
  assert.equal(merged[0].source, "brave");
  assert.equal(merged[0].score, 0.8);
});

test("mergeResults - truncates to maxResults after ranking", () => {
  const merged = mergeResults(
    byProvider({ brave: topicResults(0, 5) }),
    { ...baseOptions, maxResults: 2 },
  );

  assert.equal(merged.length, 2);
  assert.deepEqual(merged.map((r) => r.rank), [1, 2]);
});

test("mergeResults - scales scores above 1 by the provider's maximum", () => {
  const [first, second] = topicResults(0, 2);
  const merged = mergeResults(
    byProvider({ other: [{ ...first, score: 10 }, { ...second, score: 5 }] }),
    baseOptions,
  );

  assert.deepEqual(merged.map((r) => r.finalScore), [0.8, 0.4]);
});

test("mergeResults - equal scores fall back to canonical URL order", () => {
  const merged = mergeResults(byProvider({ brave: topicResults(0, 2) }), baseOptions);

  assert.deepEqual(merged.map((r) => r.url), [
    "https://medieval-castles.example.org/",
    "https://volcanic-islands.example.org/",
  ]);
});

test("mergeResults - older news results are penalized", () => {
  const [fresh, stale] = topicResults(0, 2);
  const merged = mergeResults(
    byProvider({
      brave: [
        { ...stale, publishedAt: new Date(START - 15 * DAY_MS).toISOString() },
        { ...fresh, publishedAt: new Date(START).toISOString() },
      ],
    }),
    { ...baseOptions, features: features({ contentType: "news" }) },
  );

  assert.deepEqual(merged.map((r) => [r.url, r.finalScore]), [
    [fresh.url, 0.5],
    [stale.url, 0.4],
  ]);
});

test("mergeResults - skips providers with no results and tags each result with enrichment", () => {
  const merged = mergeResults(byProvider({ empty: [], brave: topicResults(2, 1) }), baseOptions);

  assert.equal(merged.length, 1);
  assert.equal(merged[0].metadata.domain, "jazz-improvisation.example.org");
  assert.equal(merged[0].metadata.organization, "example");
});

test("mergeResults - empty input yields an empty list", () => {
  assert.deepEqual(mergeResults(new Map(), baseOptions), []);
});

test("mergeResults - the same URL with tracking parameters and different snippets is one result", () => {
  const merged = mergeResults(
    byProvider({
      tavily: [result("https://www.example.com/guide/?gclid=abc&id=7#top", {
        title: "Field guide",
        snippet: "Everything about the intertidal zone",
        score: 0.9,
      })],
      brave: [result("https://example.com/guide?utm_source=news&id=7", {
        title: "Rock pool field guide",
        snippet: "A beginner's guide to rock pools",
        score: 0.7,
      })],
    }),
    baseOptions,
  );

  assert.equal(merged.length, 1);
  assert.equal(merged[0].url, "https://example.com/guide?utm_source=news&id=7");
  assert.equal(merged[0].snippet, "A beginner's guide to rock pools");
  assert.deepEqual(merged[0].sources, ["brave", "tavily"]);
  assert.equal(merged[0].consensusCount, 2);
  assert.equal(merged[0].score, 0.9);
  assert.equal(merged[0].finalScore, 1.2);
});

test("mergeResults - output does not depend on provider insertion order", () => {
  const braveResults = [result("https://example.com/shared", { ...shared, score: 0.8 }), ...topicResults(0, 3)];
  const tavilyResults = [result("https://www.example.com/shared/", { ...shared, score: 0.5 }), ...topicResults(3, 2)];

  const forward = mergeResults(new Map([["brave", braveResults], ["tavily", tavilyResults]]), baseOptions);
  const backward = mergeResults(new Map([["tavily", tavilyResults], ["brave", braveResults]]), baseOptions);

  assert.equal(forward.length, 5);
  assert.deepEqual(backward, forward);
});

test("mergeResults - merging merged output again keeps every result", () => {
  const first = mergeResults(
    byProvider({
      brave: [result("https://example.com/shared", { ...shared, score: 0.8 }), ...topicResults(0, 3)],
      tavily: [result("https://www.example.com/shared/", { ...shared, score: 0.5 }), ...topicResults(3, 2)],
    }),
    baseOptions,
  );

  const again = mergeResults(byProvider({ brave: first }), baseOptions);
  const twice = mergeResults(byProvider({ brave: first, tavily: first }), baseOptions);

  assert.equal(first.length, 5);
  assert.equal(again.length, first.length);
  assert.equal(twice.length, first.length);
  assert.deepEqual(again.map((r) => r.url).sort(), first.map((r) => r.url).sort());
});
