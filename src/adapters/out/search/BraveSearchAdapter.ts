import { Result } from "neverthrow";
import { z } from "zod";
import type { DispatchOptions, ProviderAdapter } from "../../../application/ports/out/ProviderAdapter.ts";
import type { ProviderCapabilities } from "../../../domain/models/routing.ts";
import type {
  ProviderError,
  ProviderSearchParams,
  ProviderSearchResponse,
  SearchResult,
} from "../../../domain/models/search.ts";
import { fetchJson } from "./httpErrors.ts";

const BraveSearchResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  description: z.string().default(""),
  age: z.string().optional(),
  page_age: z.string().optional(),
});

const BraveSearchResponseSchema = z.object({
  web: z
    .object({
      results: z.array(BraveSearchResultSchema).default([]),
    })
    .optional(),
});

type BraveSearchResult = z.infer<typeof BraveSearchResultSchema>;

const BRAVE_API_ENDPOINT = "https://api.search.brave.com/res/v1/web/search";
const MAX_COUNT = 20;
const COST_PER_QUERY = "0.005";

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const timeUnitMap: Record<string, number> = {
  "minute": MS_PER_MINUTE,
  "hour": MS_PER_HOUR,
  "day": MS_PER_DAY,
  "week": 7 * MS_PER_DAY,
  "month": 30 * MS_PER_DAY,
  "year": 365 * MS_PER_DAY,
};

/**
 * Converts a relative age such as "3 days ago" to milliseconds
 */
export function parseAge(age: string): number {
  const match = age.match(/(\d+)\s*(minute|hour|day|week|month|year)s?/i);
  if (!match) return 0;
  return Number.parseInt(match[1], 10) * (timeUnitMap[match[2].toLowerCase()] ?? 0);
}

export class BraveSearchAdapter implements ProviderAdapter {
  readonly id = "brave";
  readonly name = "Brave Search";

  constructor(
    private readonly apiKey: string,
    private readonly now: () => number = Date.now,
  ) {}

  capabilities(): ProviderCapabilities {
    return {
      contentTypes: ["factual", "news", "technical", "commercial", "educational"],
      contentTypeAffinity: {
        factual: 0.9,
        news: 0.85,
        commercial: 0.8,
        technical: 0.75,
        educational: 0.7,
        academic: 0.5,
      },
      maxResultsPerQuery: MAX_COUNT,
      typicalLatencyMs: 800,
    };
  }

  estimateCost(_params: ProviderSearchParams): string {
    return COST_PER_QUERY;
  }

  async search(
    params: ProviderSearchParams,
    options: DispatchOptions,
  ): Promise<Result<ProviderSearchResponse, ProviderError>> {
    const urlParams = new URLSearchParams({
      q: params.q,
      count: String(Math.min(params.maxResults, MAX_COUNT)),
    });

    return await fetchJson(
      this.id,
      () =>
        fetch(`${BRAVE_API_ENDPOINT}?${urlParams}`, {
          headers: {
            "Accept": "application/json",
            "X-Subscription-Token": this.apiKey,
          },
          signal: options.signal,
        }),
      BraveSearchResponseSchema,
      options.signal,
    ).map((data) => ({
      results: (data.web?.results ?? []).map((result, index) => this.toSearchResult(result, index)),
      cost: COST_PER_QUERY,
    }));
  }

  private toSearchResult(result: BraveSearchResult, index: number): SearchResult {
    const publishedAt = this.publishedAt(result);
    return {
      title: result.title,
      url: result.url,
      snippet: result.description,
      score: Math.max(0.05, 1 - index * 0.05),
      source: this.id,
      ...(publishedAt ? { publishedAt } : {}),
      metadata: { position: index + 1 },
    };
  }

  private publishedAt(result: BraveSearchResult): string | undefined {
    if (result.page_age && !Number.isNaN(Date.parse(result.page_age))) {
      return new Date(result.page_age).toISOString();
    }
    if (result.age) {
      const ageMs = parseAge(result.age);
      return ageMs > 0 ? new Date(this.now() - ageMs).toISOString() : undefined;
    }
    return undefined;
  }
}
