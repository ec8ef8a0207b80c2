import type Decimal from "decimal.js";
import type { ProviderScore, StrategyName } from "../../../domain/models/routing.ts";
import type { AttemptFailure, SearchResult } from "../../../domain/models/search.ts";

export type DispatchAttempt =
  | {
    readonly provider: string;
    readonly status: "succeeded";
    readonly results: ReadonlyArray<SearchResult>;
    readonly cost: Decimal;
    readonly latencyMs: number;
  }
  | {
    readonly provider: string;
    readonly status: "failed";
    readonly reason: AttemptFailure;
  };

export interface AdequacyThreshold {
  /** Unique canonical URLs needed before a cascade stops */
  readonly minResults: number;
  /** Best raw result score needed as well, when set */
  readonly minTopScore?: number;
}

export interface StrategyContext {
  /** Admitted candidates, best first */
  readonly candidates: ReadonlyArray<ProviderScore>;
  /** Admits, dispatches under the per-provider timeout and settles one candidate */
  readonly dispatch: (candidate: ProviderScore) => Promise<DispatchAttempt>;
  readonly adequacy: AdequacyThreshold;
}

export interface ExecutionStrategy {
  readonly name: StrategyName;
  execute(context: StrategyContext): Promise<DispatchAttempt[]>;
}
