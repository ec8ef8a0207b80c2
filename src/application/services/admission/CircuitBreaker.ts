import { err, ok, Result } from "neverthrow";
import type { CircuitBreakerSettings } from "../../../config/settings.ts";
import type { CircuitSnapshot, CircuitState, ExclusionReason } from "../../../domain/models/admission.ts";
import { info, warn } from "../../../config/logger.ts";
import type { Clock } from "./Clock.ts";

type CircuitOpen = Extract<ExclusionReason, { type: "circuit_open" }>;

/**
 * Per-provider circuit breaker.
 *
 * closed -> open after `failureThreshold` consecutive failures;
 * open -> half_open once `recoveryTimeoutMs` has elapsed, admitting a single trial;
 * half_open -> closed on the trial's success, back to open on its failure.
 */
export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failureCount = 0;
  private lastFailureAt?: number;
  private openedAt = 0;
  private trialInFlight = false;

  constructor(
    readonly provider: string,
    private readonly settings: CircuitBreakerSettings,
    private readonly clock: Clock,
  ) {}

  /**
   * Whether a dispatch would be let through right now. Does not change state.
   */
  check(): Result<void, CircuitOpen> {
    switch (this.state) {
      case "closed":
        return ok(undefined);
      case "open": {
        const remaining = this.openedAt + this.settings.recoveryTimeoutMs - this.clock.now();
        return remaining <= 0 ? ok(undefined) : err(this.openError(remaining));
      }
      case "half_open":
        return this.trialInFlight ? err(this.openError(0)) : ok(undefined);
    }
  }

  /**
   * Admits a dispatch, moving an expired open circuit to half_open.
   * Yields true when the dispatch holds the half-open trial.
   */
  tryAcquire(): Result<boolean, CircuitOpen> {
    return this.check().map(() => {
      if (this.state === "open") {
        this.state = "half_open";
        info(`[CIRCUIT] ${this.provider}: open -> half_open`);
      }
      if (this.state === "half_open") {
        this.trialInFlight = true;
        return true;
      }
      return false;
    });
  }

  recordSuccess(): void {
    if (this.state === "half_open") {
      info(`[CIRCUIT] ${this.provider}: half_open -> closed`);
    }
    this.state = "closed";
    this.failureCount = 0;
    this.trialInFlight = false;
  }

  recordFailure(): void {
    const now = this.clock.now();
    this.lastFailureAt = now;
    this.failureCount += 1;

    if (this.state === "half_open") {
      this.trip(now, "half_open");
      return;
    }
    if (this.state === "closed" && this.failureCount >= this.settings.failureThreshold) {
      this.trip(now, "closed");
    }
  }

  /**
   * Gives the half-open trial back when an admitted dispatch never ran
   */
  releaseTrial(): void {
    this.trialInFlight = false;
  }

  snapshot(): CircuitSnapshot {
    return {
      state: this.state,
      failureCount: this.failureCount,
      failureThreshold: this.settings.failureThreshold,
      recoveryTimeoutMs: this.settings.recoveryTimeoutMs,
      lastFailureAt: this.lastFailureAt === undefined ? null : new Date(this.lastFailureAt).toISOString(),
      trialInFlight: this.trialInFlight,
    };
  }

  private trip(now: number, from: CircuitState): void {
    this.state = "open";
    this.openedAt = now;
    this.trialInFlight = false;
    warn(`[CIRCUIT] ${this.provider}: ${from} -> open after ${this.failureCount} failure(s)`);
  }

  private openError(retryAfterMs: number): CircuitOpen {
    return {
      type: "circuit_open",
      message: `Circuit for ${this.provider} is ${this.state}`,
      retryAfterMs,
    };
  }
}
