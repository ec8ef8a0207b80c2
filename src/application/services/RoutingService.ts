import Decimal from "decimal.js";
import { err, errAsync, ok, Result, ResultAsync } from "neverthrow";
import type { HubSettings } from "../../config/settings.ts";
import { providerSettings } from "../../config/settings.ts";
import type { ExclusionReason } from "../../domain/models/admission.ts";
import type { ProviderScore, QueryFeatures, StrategyName } from "../../domain/models/routing.ts";
import type {
  ProviderAttempt,
  ProviderError,
  ProviderSearchParams,
  ProviderSearchResponse,
  QueryOptions,
  SearchError,
  SearchResult,
} from "../../domain/models/search.ts";
import { parseRoutingHints } from "../../domain/services/routingHints.ts";
import { debug, info, warn } from "../../config/logger.ts";
import type { ProviderAdapter, ProviderDirectory } from "../ports/out/ProviderAdapter.ts";
import type { AdmissionControl } from "./admission/AdmissionControl.ts";
import type { DispatchAttempt } from "./execution/ExecutionStrategy.ts";
import { StrategyRegistry } from "./execution/StrategyRegistry.ts";
import { withRetry } from "./execution/retry.ts";
import { computeTimeout, withTimeout } from "./execution/timeout.ts";
import type { PerformanceTracker } from "./PerformanceTracker.ts";
import type { ScorerRegistry } from "./scoring/ProviderScorer.ts";

export interface RoutingOutcome {
  readonly strategy: StrategyName;
  readonly features: QueryFeatures;
  readonly resultsByProvider: ReadonlyMap<string, ReadonlyArray<SearchResult>>;
  /** Providers that returned results, in dispatch order */
  readonly providersUsed: ReadonlyArray<string>;
  readonly totalCost: Decimal;
  /** Providers excluded or failed along the way */
  readonly attempts: ReadonlyArray<ProviderAttempt>;
  readonly requireAllProviders: boolean;
  readonly timeoutMs: number;
}

interface PricedResponse {
  readonly response: ProviderSearchResponse;
  readonly cost: Decimal;
}

interface Candidate {
  readonly score: ProviderScore;
  readonly adapter: ProviderAdapter;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

const toDecimal = Result.fromThrowable((value: Decimal.Value) => new Decimal(value), errorMessage);

/**
 * A cost reported or estimated by an adapter: finite and not negative
 */
export function parseCost(value: Decimal.Value): Result<Decimal, string> {
  const invalid = `invalid cost: ${String(value)}`;
  return toDecimal(value)
    .mapErr(() => invalid)
    .andThen((cost) => (cost.isFinite() && !cost.isNegative() ? ok(cost) : err(invalid)));
}

/**
 * Unified router: select candidates, filter through admission control, choose a strategy,
 * execute it under a complexity-scaled timeout and collect per-provider results.
 */
export class RoutingService {
  constructor(
    private readonly providers: ProviderDirectory,
    private readonly admission: AdmissionControl,
    private readonly scorers: ScorerRegistry,
    private readonly performance: PerformanceTracker,
    private readonly settings: HubSettings,
    private readonly strategies: StrategyRegistry = new StrategyRegistry(),
  ) {}

  /**
   * Folds free-text routing hints into the options. Explicit options win over hints.
   */
  resolveHints(query: QueryOptions): QueryOptions {
    const hints = parseRoutingHints(query.routingHints, this.providers.list().map((p) => p.id));
    return {
      ...query,
      providers: query.providers && query.providers.length > 0 ? query.providers : hints.providers,
      contentType: query.contentType ?? hints.contentType,
      strategy: query.strategy ?? hints.strategy,
      requireAllProviders: query.requireAllProviders || hints.requireAllProviders === true,
    };
  }

  route(options: QueryOptions, analyzed: QueryFeatures): ResultAsync<RoutingOutcome, SearchError> {
    const query = this.resolveHints(options);
    const features = query.contentType && query.contentType !== analyzed.contentType
      ? { ...analyzed, contentType: query.contentType }
      : analyzed;
    const params: ProviderSearchParams = {
      q: query.q,
      maxResults: query.maxResults,
      contentType: features.contentType,
    };

    const attempts: ProviderAttempt[] = [];
    const ranked = this.selectCandidates(features, params, query.providers, attempts);
    const admitted = this.filterAdmissible(ranked, query.budget, attempts);

    if (admitted.length === 0) {
      const error = this.noCandidatesError(attempts);
      warn(`[ROUTER] ${error.message}`);
      return errAsync(error);
    }

    const strategy = this.chooseStrategy(query, features, admitted.length);
    const timeoutMs = computeTimeout(this.settings.router, features.complexity, query.timeoutMs);
    info(
      `[ROUTER] Query "${query.q.substring(0, 50)}${query.q.length > 50 ? "..." : ""}" ` +
        `(${features.contentType}, complexity=${features.complexity}): ${strategy} over ` +
        `${admitted.map((c) => `${c.score.provider}=${c.score.score.toFixed(2)}`).join(", ")}, timeout ${timeoutMs}ms`,
    );

    const adapters = new Map(admitted.map((c) => [c.score.provider, c.adapter]));
    const execution = this.strategies.get(strategy).execute({
      candidates: admitted.map((c) => c.score),
      adequacy: this.settings.router.adequacy,
      dispatch: (candidate) => {
        const adapter = adapters.get(candidate.provider);
        return adapter
          ? this.dispatch(candidate, adapter, params, timeoutMs)
          : Promise.resolve(this.unknown(candidate.provider));
      },
    });

    return ResultAsync.fromSafePromise(execution).andThen((dispatched) =>
      this.collect(dispatched, attempts, {
        strategy,
        features,
        timeoutMs,
        requireAllProviders: query.requireAllProviders,
      })
    );
  }

  private selectCandidates(
    features: QueryFeatures,
    params: ProviderSearchParams,
    explicit: ReadonlyArray<string> | undefined,
    attempts: ProviderAttempt[],
  ): Candidate[] {
    const pool: ProviderAdapter[] = [];
    if (explicit && explicit.length > 0) {
      for (const id of new Set(explicit)) {
        const adapter = this.providers.get(id);
        if (!adapter) {
          attempts.push(this.unknownAttempt(id));
        } else if (!providerSettings(this.settings, id).enabled) {
          attempts.push({ provider: id, reason: { type: "disabled", message: `Provider ${id} is disabled` } });
        } else {
          pool.push(adapter);
        }
      }
    } else {
      pool.push(...this.providers.list().filter((a) => providerSettings(this.settings, a.id).enabled));
    }

    const byId = new Map(pool.map((adapter) => [adapter.id, adapter]));
    const scorable = pool.flatMap((adapter) => {
      const estimate = Result.fromThrowable(() => adapter.estimateCost(params), errorMessage)()
        .andThen(parseCost);
      if (estimate.isErr()) {
        warn(`[ROUTER] Excluding ${adapter.id}: cost estimate failed (${estimate.error})`);
        attempts.push(this.providerFailure(adapter.id, `Cost estimate failed: ${estimate.error}`));
        return [];
      }
      return [{
        id: adapter.id,
        capabilities: adapter.capabilities(),
        qualityWeight: providerSettings(this.settings, adapter.id).qualityWeight,
        estimatedCost: estimate.value,
      }];
    });
    const ranked = this.scorers.rank(features, scorable, (id) => this.performance.get(id));

    const chosen = explicit && explicit.length > 0
      ? ranked
      : ranked
        .filter((score) => score.score >= this.settings.router.minScore)
        .slice(0, this.settings.router.maxProviders);

    return chosen.flatMap((score) => {
      const adapter = byId.get(score.provider);
      return adapter ? [{ score, adapter }] : [];
    });
  }

  private filterAdmissible(
    candidates: ReadonlyArray<Candidate>,
    budget: Decimal | undefined,
    attempts: ProviderAttempt[],
  ): Candidate[] {
    let remaining = budget;
    const admitted: Candidate[] = [];

    for (const candidate of candidates) {
      const { provider, estimatedCost } = candidate.score;
      if (remaining && estimatedCost.greaterThan(remaining)) {
        attempts.push({
          provider,
          reason: {
            type: "budget_exceeded",
            message: `Estimated cost ${estimatedCost.toString()} exceeds remaining query budget ${remaining.toString()}`,
            period: "query",
            limit: remaining.toString(),
            estimatedCost: estimatedCost.toString(),
          },
        });
        continue;
      }

      const check = this.admission.check(provider, estimatedCost);
      if (check.isErr() && !this.worthWaiting(check.error)) {
        debug(`[ROUTER] Excluding ${provider}: ${check.error.message}`);
        attempts.push({ provider, reason: check.error });
        continue;
      }

      if (remaining) remaining = remaining.minus(estimatedCost);
      admitted.push(candidate);
    }

    return admitted;
  }

  private worthWaiting(reason: ExclusionReason): boolean {
    return reason.type === "rate_limited" && reason.retryAfterMs > 0 &&
      reason.retryAfterMs <= this.settings.router.maxCooldownWaitMs;
  }

  private chooseStrategy(
    query: QueryOptions,
    features: QueryFeatures,
    candidateCount: number,
  ): StrategyName {
    if (query.strategy) return query.strategy;
    if (candidateCount <= 2) return "parallel";
    if (features.complexity >= this.settings.router.cascadeComplexityThreshold) return "cascade";
    if (query.budget) return "cascade";
    return "parallel";
  }

  private async dispatch(
    candidate: ProviderScore,
    adapter: ProviderAdapter,
    params: ProviderSearchParams,
    timeoutMs: number,
  ): Promise<DispatchAttempt> {
    const provider = candidate.provider;
    const admitted = await this.admission.admitWithBackoff(
      provider,
      candidate.estimatedCost,
      this.settings.router.maxCooldownWaitMs,
    );
    if (admitted.isErr()) {
      return { provider, status: "failed", reason: admitted.error };
    }

    const ticket = admitted.value;
    const startedAt = Date.now();
    const outcome = await withTimeout<Result<PricedResponse, ProviderError>>(
      (signal) =>
        withRetry(
          () => this.callAdapter(adapter, params, timeoutMs, signal),
          this.settings.router.retry,
          signal,
          (error, retry, delayMs) =>
            debug(`[ROUTER] ${provider} ${error.type} error, retry ${retry} in ${delayMs}ms: ${error.message}`),
        ).then((result) => result.andThen((response) => this.price(provider, response, ticket.estimatedCost))),
      timeoutMs,
      () =>
        err<PricedResponse, ProviderError>({
          type: "timeout",
          message: `${provider} did not answer within ${timeoutMs}ms`,
          timeoutMs,
        }),
    );
    const latencyMs = Date.now() - startedAt;

    return outcome.match(
      ({ response, cost }): DispatchAttempt => {
        ticket.succeed(cost);
        this.performance.record(provider, {
          success: true,
          latencyMs,
          quality: Math.min(1, response.results.length / Math.max(1, params.maxResults)),
        });
        debug(`[ROUTER] ${provider} returned ${response.results.length} result(s) in ${latencyMs}ms`);
        return {
          provider,
          status: "succeeded",
          results: response.results.map((result) => ({ ...result, source: provider })),
          cost,
          latencyMs,
        };
      },
      (error): DispatchAttempt => {
        ticket.fail(error);
        this.performance.record(provider, { success: false, latencyMs, quality: 0 });
        warn(`[ROUTER] ${provider} failed: ${error.type} - ${error.message}`);
        return {
          provider,
          status: "failed",
          reason: { type: "provider_error", message: error.message, error },
        };
      },
    );
  }

  private price(
    provider: string,
    response: ProviderSearchResponse,
    estimatedCost: Decimal,
  ): Result<PricedResponse, ProviderError> {
    if (response.cost === undefined) {
      return ok({ response, cost: estimatedCost });
    }
    return parseCost(response.cost)
      .map((cost) => ({ response, cost }))
      .mapErr((message): ProviderError => ({ type: "network", message: `${provider} reported an ${message}` }));
  }

  private async callAdapter(
    adapter: ProviderAdapter,
    params: ProviderSearchParams,
    timeoutMs: number,
    signal: AbortSignal,
  ): Promise<Result<ProviderSearchResponse, ProviderError>> {
    return await ResultAsync.fromPromise(
      Promise.resolve().then(() => adapter.search(params, { timeoutMs, signal })),
      (e): ProviderError => ({ type: "network", message: errorMessage(e) }),
    ).andThen((result) => result);
  }

  private collect(
    dispatched: ReadonlyArray<DispatchAttempt>,
    attempts: ProviderAttempt[],
    context: Pick<RoutingOutcome, "strategy" | "features" | "timeoutMs" | "requireAllProviders">,
  ): Result<RoutingOutcome, SearchError> {
    const resultsByProvider = new Map<string, ReadonlyArray<SearchResult>>();
    const providersUsed: string[] = [];
    let totalCost = new Decimal(0);

    for (const attempt of dispatched) {
      if (attempt.status === "succeeded") {
        resultsByProvider.set(attempt.provider, attempt.results);
        providersUsed.push(attempt.provider);
        totalCost = totalCost.plus(attempt.cost);
      } else {
        attempts.push({ provider: attempt.provider, reason: attempt.reason });
      }
    }

    if (providersUsed.length === 0) {
      const error: SearchError = {
        type: "no_providers_available",
        message: `All ${dispatched.length} dispatched provider(s) failed`,
        attempts,
      };
      warn(`[ROUTER] ${error.message}`);
      return err(error);
    }

    return ok({ ...context, resultsByProvider, providersUsed, totalCost, attempts });
  }

  private noCandidatesError(attempts: ReadonlyArray<ProviderAttempt>): SearchError {
    if (attempts.length > 0 && attempts.every((a) => a.reason.type === "budget_exceeded")) {
      return {
        type: "budget_exceeded",
        message: "Every candidate provider would exceed its budget",
        attempts,
      };
    }

    const unavailable = attempts.flatMap((a) =>
      a.reason.type === "rate_limited" || a.reason.type === "circuit_open" ? [a.reason.retryAfterMs] : []
    );
    if (attempts.length > 0 && unavailable.length === attempts.length) {
      return {
        type: "providers_unavailable",
        message: "Every candidate provider is rate-limited or has an open circuit",
        attempts,
        retryAfterMs: Math.min(...unavailable),
      };
    }

    return {
      type: "no_providers_available",
      message: attempts.length > 0
        ? "No candidate provider passed admission control"
        : "No providers are registered for this query",
      attempts,
    };
  }

  private providerFailure(id: string, message: string): ProviderAttempt {
    return {
      provider: id,
      reason: { type: "provider_error", message, error: { type: "network", message } },
    };
  }

  private unknownAttempt(id: string): ProviderAttempt {
    return {
      provider: id,
      reason: { type: "unknown_provider", message: `Provider ${id} is not registered` },
    };
  }

  private unknown(id: string): DispatchAttempt {
    return { provider: id, status: "failed", reason: this.unknownAttempt(id).reason };
  }
}
