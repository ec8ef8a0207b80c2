import { debug, info } from "../../../config/logger.ts";
import { canonicalizeUrl } from "../../../domain/services/urlNormalizer.ts";
import type {
  AdequacyThreshold,
  DispatchAttempt,
  ExecutionStrategy,
  StrategyContext,
} from "./ExecutionStrategy.ts";

/**
 * Dispatches candidates one at a time, best first, until the accumulated results are adequate
 */
export class CascadeStrategy implements ExecutionStrategy {
  readonly name = "cascade";

  async execute(context: StrategyContext): Promise<DispatchAttempt[]> {
    const attempts: DispatchAttempt[] = [];
    const urls = new Set<string>();
    let topScore = Number.NEGATIVE_INFINITY;

    for (const candidate of context.candidates) {
      const attempt = await context.dispatch(candidate);
      attempts.push(attempt);

      if (attempt.status === "succeeded") {
        for (const result of attempt.results) {
          urls.add(canonicalizeUrl(result.url));
          topScore = Math.max(topScore, result.score);
        }
      }
      debug(`[CASCADE] ${candidate.provider}: ${attempt.status}, ${urls.size} unique result(s) so far`);

      if (this.isAdequate(urls.size, topScore, context.adequacy)) {
        info(`[CASCADE] Adequate after ${attempts.length} provider(s)`);
        break;
      }
    }

    return attempts;
  }

  private isAdequate(uniqueResults: number, topScore: number, adequacy: AdequacyThreshold): boolean {
    return uniqueResults >= adequacy.minResults &&
      (adequacy.minTopScore === undefined || topScore >= adequacy.minTopScore);
  }
}
