import { test } from "node:test";
import assert from "node:assert/strict";
import { BraveSearchAdapter, parseAge } from "../../../../src/adapters/out/search/BraveSearchAdapter.ts";
import { mockFetch, START } from "../../../testUtils.ts";

const params = { q: "tide pools", maxResults: 50, contentType: "factual" } as const;

function dispatch() {
  return { timeoutMs: 1000, signal: new AbortController().signal };
}

test("BraveSearchAdapter - maps web results and derives publication dates", async (t) => {
  const requests = mockFetch(t, () =>
    Response.json({
      web: {
        results: [
          { title: "Tide pools", url: "https://a.example/", description: "Rock pools", page_age: "2024-12-30T10:00:00Z" },
          { title: "Shore life", url: "https://b.example/", age: "3 days ago" },
          { title: "Low tide", url: "https://c.example/", description: "Timing" },
        ],
      },
    }));
  const adapter = new BraveSearchAdapter("test-secret", () => START);

  const response = await adapter.search(params, dispatch());

  assert.ok(response.isOk());
  assert.equal(response.value.cost, "0.005");
  const [first, second, third] = response.value.results;
  assert.deepEqual(first, {
    title: "Tide pools",
    url: "https://a.example/",
    snippet: "Rock pools",
    score: 1,
    source: "brave",
    publishedAt: "2024-12-30T10:00:00.000Z",
    metadata: { position: 1 },
  });
  assert.equal(second.snippet, "");
  assert.equal(second.score, 0.95);
  assert.equal(second.publishedAt, "2024-12-29T00:00:00.000Z");
  assert.equal(third.score, 0.9);
  assert.equal("publishedAt" in third, false);

  assert.equal(requests.length, 1);
  assert.equal(requests[0].url, "https://api.search.brave.com/res/v1/web/search?q=tide+pools&count=20");
  assert.equal(requests[0].headers.get("X-Subscription-Token"), "test-secret");
});

test("BraveSearchAdapter - a response without web results is empty", async (t) => {
  mockFetch(t, () => Response.json({}));

  const response = await new BraveSearchAdapter("test-secret").search(params, dispatch());

  assert.ok(response.isOk());
  assert.deepEqual(response.value.results, []);
});

test("BraveSearchAdapter - maps HTTP failures to provider errors", async (t) => {
  const cases: Array<[Response, unknown]> = [
    [
      new Response(null, { status: 429, headers: { "Retry-After": "7" } }),
      { type: "rateLimit", message: "brave rate limit exceeded", retryAfterMs: 7000 },
    ],
    [
      new Response(null, { status: 429 }),
      { type: "rateLimit", message: "brave rate limit exceeded", retryAfterMs: 60_000 },
    ],
    [
      new Response(null, { status: 401 }),
      { type: "authorization", message: "brave API key authentication error: 401" },
    ],
    [
      new Response(null, { status: 503 }),
      { type: "network", message: "brave API call error: 503" },
    ],
  ];

  for (const [reply, expected] of cases) {
    mockFetch(t, () => reply);
    const response = await new BraveSearchAdapter("test-secret").search(params, dispatch());
    assert.ok(response.isErr());
    assert.deepEqual(response.error, expected);
    t.mock.restoreAll();
  }
});

test("BraveSearchAdapter - rejects bodies of the wrong shape", async (t) => {
  mockFetch(t, () => Response.json({ web: { results: [{ url: 1 }] } }));

  const response = await new BraveSearchAdapter("test-secret").search(params, dispatch());

  assert.ok(response.isErr());
  assert.equal(response.error.type, "network");
  assert.match(response.error.message, /^Unexpected brave API response: /);
});

test("BraveSearchAdapter - network failures and aborts", async (t) => {
  mockFetch(t, () => {
    throw new TypeError("fetch failed");
  });
  const adapter = new BraveSearchAdapter("test-secret");

  const failed = await adapter.search(params, dispatch());
  assert.ok(failed.isErr());
  assert.deepEqual(failed.error, { type: "network", message: "fetch failed" });

  const controller = new AbortController();
  controller.abort();
  const aborted = await adapter.search(params, { timeoutMs: 1000, signal: controller.signal });
  assert.ok(aborted.isErr());
  assert.equal(aborted.error.type, "timeout");
});

test("parseAge - reads relative ages", () => {
  assert.equal(parseAge("2 hours ago"), 7_200_000);
  assert.equal(parseAge("1 week ago"), 604_800_000);
  assert.equal(parseAge("yesterday"), 0);
});
