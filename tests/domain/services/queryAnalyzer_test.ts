import { test } from "node:test";
import assert from "node:assert/strict";
import { normalizeQueryText, QueryAnalyzer } from "../../../src/domain/services/queryAnalyzer.ts";

const analyzer = new QueryAnalyzer();

test("QueryAnalyzer - scores a multi-part causal question as complex", () => {
  const features = analyzer.analyze(
    "Why does inflation affect housing prices and how should policy makers respond?",
  );

  assert.equal(features.complexity, 0.85);
  assert.equal(features.contentType, "commercial");
  assert.equal(features.wordCount, 12);
  assert.equal(features.containsQuestion, true);
  assert.deepEqual(features.ambiguity, {
    multipleQuestions: false,
    hedging: false,
    crossDomain: true,
    multiIntent: true,
  });
});

test("QueryAnalyzer - detects content types from weighted keywords", () => {
  assert.equal(analyzer.analyze("peer-reviewed studies on sleep and memory").contentType, "academic");
  assert.equal(analyzer.analyze("latest news about the election").contentType, "news");
  assert.equal(analyzer.analyze("buy cheap laptop").contentType, "commercial");
  assert.equal(analyzer.analyze("tutorial for beginners").contentType, "educational");
  assert.equal(analyzer.analyze("capital of France").contentType, "factual");
});

test("QueryAnalyzer - technical query accumulates keyword weights", () => {
  const features = analyzer.analyze("how to fix typescript compile error");

  assert.equal(features.contentType, "technical");
  assert.equal(features.contentTypeScores.technical, 3.2);
  assert.equal(features.contentTypeScores.educational, 1);
});

test("QueryAnalyzer - a tie or no signal at all yields mixed", () => {
  assert.equal(analyzer.analyze("news tutorial").contentType, "mixed");
  assert.equal(analyzer.analyze("hello world").contentType, "mixed");
});

test("QueryAnalyzer - content type hint overrides detection", () => {
  assert.equal(analyzer.analyze("buy cheap laptop", "technical").contentType, "technical");
});

test("QueryAnalyzer - short factual lookup has zero complexity", () => {
  assert.equal(analyzer.analyze("capital of France").complexity, 0);
});

test("QueryAnalyzer - hedging contributes at most 0.1", () => {
  const features = analyzer.analyze("maybe possibly perhaps");

  assert.equal(features.complexity, 0.1);
  assert.equal(features.ambiguity.hedging, true);
});

test("QueryAnalyzer - several question marks raise complexity", () => {
  const features = analyzer.analyze("what is rust? why use it?");

  assert.equal(features.complexity, 0.3);
  assert.equal(features.ambiguity.multipleQuestions, true);
});

test("QueryAnalyzer - complexity is capped at 1", () => {
  const features = analyzer.analyze(
    "maybe compare and analyze the impact of ai regulation on climate policy and healthcare costs " +
      "and also evaluate why it might matter? what else?",
  );

  assert.equal(features.complexity, 1);
});

test("QueryAnalyzer - empty query yields neutral features", () => {
  const features = analyzer.analyze("   ");

  assert.equal(features.contentType, "mixed");
  assert.equal(features.complexity, 0);
  assert.equal(features.timeSensitivity, 0);
  assert.equal(features.factualNature, 0.5);
  assert.deepEqual(features.keywords, []);
});

test("QueryAnalyzer - time sensitivity and factual nature", () => {
  assert.equal(analyzer.analyze("latest news about the election").timeSensitivity, 1);
  assert.equal(analyzer.analyze("recent volcano activity").timeSensitivity, 0.7);
  assert.equal(analyzer.analyze("capital of France").timeSensitivity, 0.3);

  assert.equal(analyzer.analyze("what is rust").factualNature, 0.9);
  assert.equal(analyzer.analyze("best laptop").factualNature, 0.2);
  assert.equal(analyzer.analyze("hello world").factualNature, 0.5);
});

test("QueryAnalyzer - keywords drop stopwords and duplicates", () => {
  const keywords = analyzer.analyze("sleep and memory and sleep").keywords;

  assert.deepEqual(keywords, ["sleep", "memory"]);
});

test("QueryAnalyzer - analysis is deterministic", () => {
  const text = "compare docker and kubernetes deployment tradeoffs";
  assert.deepEqual(analyzer.analyze(text), analyzer.analyze(text));
});

test("normalizeQueryText - trims, lowercases and collapses whitespace", () => {
  assert.equal(normalizeQueryText("  Hello \t  WORLD \n"), "hello world");
});
