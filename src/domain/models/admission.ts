export type CircuitState = "closed" | "open" | "half_open";

export type BudgetPeriod = "query" | "daily" | "monthly";

export type RateWindow = "minute" | "hour" | "day" | "concurrency" | "cooldown";

/**
 * Why a provider was left out of a dispatch
 */
export type ExclusionReason =
  | { type: "circuit_open"; message: string; retryAfterMs: number }
  | { type: "rate_limited"; message: string; window: RateWindow; retryAfterMs: number }
  | {
    type: "budget_exceeded";
    message: string;
    period: BudgetPeriod;
    limit: string;
    estimatedCost: string;
  }
  | { type: "unknown_provider"; message: string }
  | { type: "disabled"; message: string };

export interface CircuitSnapshot {
  readonly state: CircuitState;
  readonly failureCount: number;
  readonly failureThreshold: number;
  readonly recoveryTimeoutMs: number;
  readonly lastFailureAt: string | null;
  readonly trialInFlight: boolean;
}

export interface RateLimitSnapshot {
  readonly requestsLastMinute: number;
  readonly requestsLastHour: number;
  readonly requestsLastDay: number;
  readonly inFlight: number;
  readonly remaining: {
    readonly minute: number;
    readonly hour: number;
    readonly day: number;
    readonly concurrent: number;
  };
  readonly cooldownUntil: string | null;
}

export interface BudgetSnapshot {
  readonly enforced: boolean;
  readonly spentToday: string;
  readonly spentThisMonth: string;
  readonly reserved: string;
  readonly remainingToday: string;
  readonly remainingThisMonth: string;
  readonly perQueryLimit: string;
}

export interface ProviderFailureRecord {
  readonly at: string;
  readonly reason: string;
}

/**
 * Read-only per-provider status for health and metrics reporting
 */
export interface ProviderAdmissionStatus {
  readonly provider: string;
  readonly circuit: CircuitSnapshot;
  readonly rateLimit: RateLimitSnapshot;
  readonly budget: BudgetSnapshot;
  readonly lastFailure: ProviderFailureRecord | null;
}
