import { err, errAsync, ok, okAsync, Result, ResultAsync } from "neverthrow";
import { z } from "zod";
import type { HubSettings } from "../../config/settings.ts";
import { MoneySchema } from "../../config/settings.ts";
import type { McpError, McpRequest, McpResult, McpSuccessResponse } from "../../domain/models/mcp.ts";
import { CONTENT_TYPES, STRATEGY_NAMES } from "../../domain/models/routing.ts";
import type { ProviderAttempt, QueryOptions, SearchError, SearchQuery, SearchResponse } from "../../domain/models/search.ts";
import { queryFingerprint } from "../../domain/services/fingerprint.ts";
import { mergeResults } from "../../domain/services/resultMerger.ts";
import { info } from "../../config/logger.ts";
import type { SearchUseCase } from "../ports/in/SearchUseCase.ts";
import type { QueryAnalyzerPort } from "../ports/out/QueryAnalyzerPort.ts";
import type { RoutingOutcome, RoutingService } from "./RoutingService.ts";
import type { TieredCacheService } from "./TieredCacheService.ts";

const QuerySchema = z.object({
  q: z.string().trim().min(1, "Search query is required").max(500, "Search query is too long"),
  maxResults: z.number().int().min(1).max(100).default(10),
  contentType: z.enum(CONTENT_TYPES).optional(),
  providers: z.array(z.string().min(1)).optional(),
  budget: MoneySchema.optional(),
  timeoutMs: z.number().int().positive().optional(),
  strategy: z.enum(STRATEGY_NAMES).optional(),
  routingHints: z.string().max(200).optional(),
  requireAllProviders: z.boolean().default(false),
});

export function validateQuery(query: SearchQuery): Result<QueryOptions, SearchError> {
  const parsed = QuerySchema.safeParse(query);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    return err({ type: "invalid_query", message: issues[0] ?? "Invalid query", issues });
  }
  return ok(parsed.data);
}

function describeAttempts(attempts: ReadonlyArray<ProviderAttempt>): Record<string, string> {
  return Object.fromEntries(attempts.map((a) => [a.provider, `${a.reason.type}: ${a.reason.message}`]));
}

/**
 * Implementation of the SearchUseCase port.
 * Validates, serves from cache when possible, otherwise analyzes, routes and merges.
 */
export class SearchService implements SearchUseCase {
  constructor(
    private readonly analyzer: QueryAnalyzerPort,
    private readonly routingService: RoutingService,
    private readonly cache: TieredCacheService,
    private readonly settings: HubSettings,
  ) {}

  search(query: SearchQuery): ResultAsync<SearchResponse, SearchError> {
    const startedAt = Date.now();
    return validateQuery(query).asyncAndThen((validated) => {
      const options = this.routingService.resolveHints(validated);
      const key = queryFingerprint(options, this.settings.cache.prefix);
      return ResultAsync.fromSafePromise(this.cache.get(key)).andThen((cached) => {
        if (cached) {
          info(`[SEARCH] Cache hit for "${options.q}"`);
          return okAsync<SearchResponse, SearchError>(cached);
        }
        return this.execute(options, key, startedAt);
      });
    });
  }

  searchMcp(request: McpRequest): ResultAsync<McpSuccessResponse, McpError> {
    if (!request.query || request.query.trim().length === 0) {
      return errAsync({ type: "validation", message: "Search query is required" });
    }

    const options = request.options ?? {};
    return this.search({
      q: request.query,
      maxResults: options.maxResults,
      contentType: options.contentType,
      providers: options.providers,
      budget: options.budget,
      timeoutMs: options.timeoutMs,
      strategy: options.strategy,
      routingHints: options.routingHints,
    })
      .map((response): McpSuccessResponse => ({
        results: response.results.map((result): McpResult => ({
          title: result.title,
          url: result.url,
          snippet: result.snippet,
          published: result.publishedAt,
          sources: result.sources,
          score: result.finalScore,
        })),
        status: "success",
        providersUsed: response.providersUsed,
        cacheHit: response.cacheHit,
        totalCost: response.totalCost,
        ...(response.results.length === 0 ? { message: "No results found" } : {}),
      }))
      .mapErr((error) => this.toMcpError(error));
  }

  private execute(
    options: QueryOptions,
    key: string,
    startedAt: number,
  ): ResultAsync<SearchResponse, SearchError> {
    const features = this.analyzer.analyze(options.q, options.contentType);

    return this.routingService.route(options, features).andThen((outcome) => {
      const response = this.buildResponse(options, outcome, key, startedAt);
      info(
        `[SEARCH] "${options.q}": ${response.totalResults} result(s) from ` +
          `${response.providersUsed.join(", ")} in ${response.elapsedMs}ms, cost ${response.totalCost}`,
      );

      if (outcome.requireAllProviders && outcome.attempts.length > 0) {
        return errAsync<SearchResponse, SearchError>({
          type: "partial_results",
          message: `${outcome.attempts.length} provider(s) did not contribute results`,
          attempts: outcome.attempts,
          response,
        });
      }

      return ResultAsync.fromSafePromise(this.cache.set(key, response).then(() => response));
    });
  }

  private buildResponse(
    options: QueryOptions,
    outcome: RoutingOutcome,
    fingerprint: string,
    startedAt: number,
  ): SearchResponse {
    const qualityWeights = Object.fromEntries(
      Object.entries(this.settings.providers).map(([id, provider]) => [id, provider.qualityWeight]),
    );
    const results = mergeResults(outcome.resultsByProvider, {
      ...this.settings.merger,
      maxResults: options.maxResults,
      qualityWeights,
      features: outcome.features,
    });

    return {
      query: options.q,
      results,
      providersUsed: outcome.providersUsed,
      totalResults: results.length,
      elapsedMs: Date.now() - startedAt,
      totalCost: outcome.totalCost.toString(),
      cacheHit: false,
      strategy: outcome.strategy,
      fingerprint,
    };
  }

  private toMcpError(error: SearchError): McpError {
    switch (error.type) {
      case "invalid_query":
        return { type: "validation", message: error.message, details: { issues: error.issues } };
      case "budget_exceeded":
        return { type: "budget", message: error.message, details: describeAttempts(error.attempts) };
      case "providers_unavailable":
        return {
          type: "unavailable",
          message: `${error.message}; retry after ${Math.ceil(error.retryAfterMs / 1000)} seconds`,
          details: { retryAfterMs: error.retryAfterMs, ...describeAttempts(error.attempts) },
        };
      case "no_providers_available":
        return { type: "unavailable", message: error.message, details: describeAttempts(error.attempts) };
      case "partial_results":
        return { type: "search", message: error.message, details: describeAttempts(error.attempts) };
    }
  }
}
