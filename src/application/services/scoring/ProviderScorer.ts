import type Decimal from "decimal.js";
import { err, ok, Result } from "neverthrow";
import type {
  ContentType,
  ProviderCapabilities,
  ProviderPerformance,
  ProviderScore,
  QueryFeatures,
} from "../../../domain/models/routing.ts";
import { warn } from "../../../config/logger.ts";
import { type Clock, systemClock } from "../admission/Clock.ts";

export interface ScoringCandidate {
  readonly id: string;
  readonly capabilities: ProviderCapabilities;
  readonly qualityWeight: number;
  readonly estimatedCost: Decimal;
}

export type ScorerError = {
  type: "scorer";
  scorer: string;
  message: string;
};

export type ScorerKind = "default" | "external";

/**
 * Pluggable provider scorer. Several may be registered; the most confident answer wins.
 */
export interface ProviderScorer {
  readonly id: string;
  readonly kind: ScorerKind;
  score(
    features: QueryFeatures,
    candidate: ScoringCandidate,
    history?: ProviderPerformance,
  ): Result<ProviderScore, ScorerError>;
}

export interface ScoreSuggestion {
  readonly score: number;
  readonly confidence: number;
}

/**
 * Secondary opinion on a provider, e.g. from a separate reasoning step
 */
export interface ExternalScoreSource {
  readonly id: string;
  suggest(features: QueryFeatures, candidate: ScoringCandidate): Result<ScoreSuggestion, ScorerError>;
}

const AFFINITY_WEIGHT = 0.5;
const QUALITY_WEIGHT = 0.3;
const HEALTH_WEIGHT = 0.2;
const NEUTRAL = 0.5;
const HEALTH_DECAY_HOURS = 24;
const DEFAULT_LATENCY_MS = 1000;

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Affinity table, configured quality weight and decayed health history,
 * optionally blended with an external suggestion by confidence.
 */
export class DefaultProviderScorer implements ProviderScorer {
  readonly id: string;
  readonly kind = "default";

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly external?: ExternalScoreSource,
  ) {
    this.id = external ? `default+${external.id}` : "default";
  }

  score(
    features: QueryFeatures,
    candidate: ScoringCandidate,
    history?: ProviderPerformance,
  ): Result<ProviderScore, ScorerError> {
    const base = round6(
      AFFINITY_WEIGHT * this.affinity(features.contentType, candidate.capabilities) +
        QUALITY_WEIGHT * candidate.qualityWeight +
        HEALTH_WEIGHT * this.health(history),
    );
    const confidence = this.confidence(history);
    const blended = this.blend(features, candidate, { score: base, confidence });

    return ok({
      provider: candidate.id,
      score: blended.score,
      confidence: blended.confidence,
      estimatedCost: candidate.estimatedCost,
      estimatedLatencyMs: history && history.totalQueries > 0
        ? history.averageLatencyMs
        : candidate.capabilities.typicalLatencyMs ?? DEFAULT_LATENCY_MS,
      role: features.contentType === "mixed" || candidate.capabilities.contentTypes.includes(features.contentType)
        ? "primary"
        : "fallback",
      qualityWeight: candidate.qualityWeight,
      scorer: this.id,
    });
  }

  private affinity(contentType: ContentType, capabilities: ProviderCapabilities): number {
    if (contentType === "mixed") {
      const values = Object.values(capabilities.contentTypeAffinity)
        .filter((value): value is number => value !== undefined);
      return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : NEUTRAL;
    }
    return capabilities.contentTypeAffinity[contentType] ??
      (capabilities.contentTypes.includes(contentType) ? 0.6 : 0.1);
  }

  private health(history?: ProviderPerformance): number {
    if (!history || history.totalQueries === 0) {
      return NEUTRAL;
    }
    const latencyScore = 1 / (1 + Math.exp(-0.001 * (4000 - history.averageLatencyMs)));
    const raw = 0.4 * history.successRate + 0.3 * latencyScore + 0.3 * history.averageResultQuality;
    const ageHours = Math.max(0, this.clock.now() - history.lastUpdatedAt) / 3_600_000;
    return NEUTRAL + (raw - NEUTRAL) * Math.exp(-ageHours / HEALTH_DECAY_HOURS);
  }

  private confidence(history?: ProviderPerformance): number {
    if (!history || history.totalQueries === 0) {
      return NEUTRAL;
    }
    return round6(0.6 * Math.min(history.totalQueries / 1000, 1) + 0.4 * history.successRate);
  }

  private blend(
    features: QueryFeatures,
    candidate: ScoringCandidate,
    own: ScoreSuggestion,
  ): ScoreSuggestion {
    if (!this.external) {
      return own;
    }
    return this.external.suggest(features, candidate).match(
      (suggestion) => {
        const weight = own.confidence + suggestion.confidence;
        if (weight <= 0) return own;
        return {
          score: round6((own.score * own.confidence + suggestion.score * suggestion.confidence) / weight),
          confidence: Math.max(own.confidence, suggestion.confidence),
        };
      },
      (e) => {
        warn(`[SCORER] ${e.scorer} failed for ${candidate.id}: ${e.message}; using default score`);
        return own;
      },
    );
  }
}

/**
 * Ordered scorer list. The default scorer is always first and always answers.
 */
export class ScorerRegistry {
  private readonly scorers: ProviderScorer[];

  constructor(private readonly fallback: ProviderScorer = new DefaultProviderScorer()) {
    this.scorers = [fallback];
  }

  register(scorer: ProviderScorer): this {
    this.scorers.push(scorer);
    return this;
  }

  /**
   * Highest-confidence score among scorers that answered; earlier registration wins ties
   */
  score(
    features: QueryFeatures,
    candidate: ScoringCandidate,
    history?: ProviderPerformance,
  ): Result<ProviderScore, ScorerError> {
    let best: ProviderScore | undefined;
    let lastError: ScorerError | undefined;

    for (const scorer of this.scorers) {
      const result = Result.fromThrowable(
        () => scorer.score(features, candidate, history),
        (e): ScorerError => ({
          type: "scorer",
          scorer: scorer.id,
          message: e instanceof Error ? e.message : String(e),
        }),
      )().andThen((r) => r);

      if (result.isErr()) {
        lastError = result.error;
        warn(`[SCORER] ${result.error.scorer} failed for ${candidate.id}: ${result.error.message}`);
        continue;
      }
      if (!best || result.value.confidence > best.confidence) {
        best = result.value;
      }
    }

    if (best) return ok(best);
    return err(lastError ?? { type: "scorer", scorer: this.fallback.id, message: "No scorer answered" });
  }

  /**
   * Scores every candidate and orders them: score desc, quality weight desc, id asc
   */
  rank(
    features: QueryFeatures,
    candidates: ReadonlyArray<ScoringCandidate>,
    historyOf: (provider: string) => ProviderPerformance | undefined,
  ): ProviderScore[] {
    return candidates
      .flatMap((candidate) =>
        this.score(features, candidate, historyOf(candidate.id)).match(
          (score) => [score],
          () => [],
        )
      )
      .sort((a, b) =>
        b.score - a.score ||
        b.qualityWeight - a.qualityWeight ||
        compareStrings(a.provider, b.provider)
      );
  }
}
