import { Result } from "neverthrow";
import { z } from "zod";
import type { DispatchOptions, ProviderAdapter } from "../../../application/ports/out/ProviderAdapter.ts";
import type { ContentType, ProviderCapabilities } from "../../../domain/models/routing.ts";
import type {
  ProviderError,
  ProviderSearchParams,
  ProviderSearchResponse,
  SearchResult,
} from "../../../domain/models/search.ts";
import { fetchJson } from "./httpErrors.ts";

const TavilySearchResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  content: z.string().default(""),
  raw_content: z.string().nullish(),
  score: z.number().default(0),
  published_date: z.string().nullish(),
});

const TavilySearchResponseSchema = z.object({
  results: z.array(TavilySearchResultSchema).default([]),
});

type TavilySearchResult = z.infer<typeof TavilySearchResultSchema>;

const TAVILY_API_ENDPOINT = "https://api.tavily.com/search";
const MAX_RESULTS = 20;
const BASIC_COST = "0.008";
const ADVANCED_COST = "0.016";
const SNIPPET_LENGTH = 300;

export class TavilySearchAdapter implements ProviderAdapter {
  readonly id = "tavily";
  readonly name = "Tavily Search";

  constructor(private readonly apiKey: string) {}

  capabilities(): ProviderCapabilities {
    return {
      contentTypes: ["factual", "academic", "technical", "educational", "news"],
      contentTypeAffinity: {
        factual: 0.9,
        academic: 0.85,
        technical: 0.85,
        educational: 0.8,
        news: 0.7,
        commercial: 0.5,
      },
      maxResultsPerQuery: MAX_RESULTS,
      typicalLatencyMs: 1500,
    };
  }

  /**
   * Academic and technical queries use the advanced search depth, which costs double
   */
  estimateCost(params: ProviderSearchParams): string {
    return this.searchDepth(params.contentType) === "advanced" ? ADVANCED_COST : BASIC_COST;
  }

  async search(
    params: ProviderSearchParams,
    options: DispatchOptions,
  ): Promise<Result<ProviderSearchResponse, ProviderError>> {
    const body = {
      query: params.q,
      max_results: Math.min(params.maxResults, MAX_RESULTS),
      search_depth: this.searchDepth(params.contentType),
      topic: params.contentType === "news" ? "news" : "general",
      include_answer: false,
      include_raw_content: false,
    };

    return await fetchJson(
      this.id,
      () =>
        fetch(TAVILY_API_ENDPOINT, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "Accept": "application/json",
            "Authorization": `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify(body),
          signal: options.signal,
        }),
      TavilySearchResponseSchema,
      options.signal,
    ).map((data) => ({
      results: data.results.map((result) => this.toSearchResult(result)),
      cost: this.estimateCost(params),
    }));
  }

  private searchDepth(contentType: ContentType): "basic" | "advanced" {
    return contentType === "academic" || contentType === "technical" ? "advanced" : "basic";
  }

  private toSearchResult(result: TavilySearchResult): SearchResult {
    const publishedAt = result.published_date && !Number.isNaN(Date.parse(result.published_date))
      ? new Date(result.published_date).toISOString()
      : undefined;
    return {
      title: result.title,
      url: result.url,
      snippet: result.content.length > SNIPPET_LENGTH
        ? `${result.content.substring(0, SNIPPET_LENGTH)}...`
        : result.content,
      content: result.raw_content ?? result.content,
      score: result.score,
      source: this.id,
      ...(publishedAt ? { publishedAt } : {}),
      metadata: {},
    };
  }
}
