import Decimal from "decimal.js";
import { err, ok, Result } from "neverthrow";
import type { ProviderSettings } from "../../../config/settings.ts";
import type {
  ExclusionReason,
  ProviderAdmissionStatus,
  ProviderFailureRecord,
} from "../../../domain/models/admission.ts";
import type { ProviderError } from "../../../domain/models/search.ts";
import { debug } from "../../../config/logger.ts";
import { type BudgetReservation, BudgetTracker } from "./BudgetTracker.ts";
import { CircuitBreaker } from "./CircuitBreaker.ts";
import { type Clock, systemClock } from "./Clock.ts";
import { type RatePermit, RateLimiter } from "./RateLimiter.ts";

/**
 * Permission for one dispatch. Exactly one of the settle methods takes effect.
 */
export interface AdmissionTicket {
  readonly provider: string;
  readonly estimatedCost: Decimal;
  /** Dispatch returned results; commits spend and closes a half-open circuit */
  succeed(actualCost?: Decimal.Value): void;
  /** Dispatch failed or timed out; counts against the circuit */
  fail(error: ProviderError): void;
  /** Admitted but never dispatched; returns every grant untouched */
  abandon(): void;
}

interface ProviderGates {
  readonly circuit: CircuitBreaker;
  readonly rateLimiter: RateLimiter;
  readonly budget: BudgetTracker;
  lastFailure: ProviderFailureRecord | null;
}

/**
 * Owns all per-provider admission state. The router only asks for permission
 * and reports outcomes through tickets.
 */
export class AdmissionControl {
  private readonly gates = new Map<string, ProviderGates>();

  constructor(private readonly clock: Clock = systemClock) {}

  register(provider: string, settings: ProviderSettings): void {
    this.gates.set(provider, {
      circuit: new CircuitBreaker(provider, settings.circuit, this.clock),
      rateLimiter: new RateLimiter(provider, settings.rateLimit, this.clock),
      budget: new BudgetTracker(provider, settings.budget, this.clock),
      lastFailure: null,
    });
  }

  /**
   * Read-only: would the provider be admitted at this estimated cost right now
   */
  check(provider: string, estimatedCost: Decimal.Value): Result<void, ExclusionReason> {
    return this.gatesFor(provider).andThen((gates) =>
      gates.circuit.check()
        .andThen((): Result<void, ExclusionReason> => gates.rateLimiter.check())
        .andThen((): Result<void, ExclusionReason> => gates.budget.check(estimatedCost))
    );
  }

  /**
   * Claims a slot in all three gates, or none of them
   */
  admit(provider: string, estimatedCost: Decimal.Value): Result<AdmissionTicket, ExclusionReason> {
    return this.gatesFor(provider).andThen((gates) => {
      const preconditions = gates.circuit.check()
        .andThen((): Result<void, ExclusionReason> => gates.budget.check(estimatedCost));
      if (preconditions.isErr()) {
        return err(preconditions.error);
      }

      const permit = gates.rateLimiter.tryAcquire();
      if (permit.isErr()) {
        return err(permit.error);
      }

      // Circuit and budget were checked above and nothing ran in between
      const circuit = gates.circuit.tryAcquire();
      if (circuit.isErr()) {
        permit.value.release();
        return err(circuit.error);
      }
      const reservation = gates.budget.tryReserve(estimatedCost);
      if (reservation.isErr()) {
        permit.value.release();
        if (circuit.value) gates.circuit.releaseTrial();
        return err(reservation.error);
      }

      debug(`[ADMISSION] ${provider}: admitted at estimated cost ${new Decimal(estimatedCost).toString()}`);
      return ok(this.ticket(provider, gates, permit.value, reservation.value, circuit.value));
    });
  }

  /**
   * Like admit, but waits out a rate-limit cooldown once when it ends within `maxWaitMs`
   */
  async admitWithBackoff(
    provider: string,
    estimatedCost: Decimal.Value,
    maxWaitMs: number,
  ): Promise<Result<AdmissionTicket, ExclusionReason>> {
    const first = this.admit(provider, estimatedCost);
    if (
      first.isOk() || first.error.type !== "rate_limited" ||
      first.error.retryAfterMs <= 0 || first.error.retryAfterMs > maxWaitMs
    ) {
      return first;
    }

    debug(`[ADMISSION] ${provider}: waiting ${first.error.retryAfterMs}ms for rate limit cooldown`);
    await this.clock.sleep(first.error.retryAfterMs);
    return this.admit(provider, estimatedCost);
  }

  status(): ProviderAdmissionStatus[] {
    return [...this.gates.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([provider, gates]) => ({
        provider,
        circuit: gates.circuit.snapshot(),
        rateLimit: gates.rateLimiter.snapshot(),
        budget: gates.budget.snapshot(),
        lastFailure: gates.lastFailure,
      }));
  }

  private gatesFor(provider: string): Result<ProviderGates, ExclusionReason> {
    const gates = this.gates.get(provider);
    return gates ? ok(gates) : err({
      type: "unknown_provider",
      message: `Provider ${provider} is not registered`,
    });
  }

  private ticket(
    provider: string,
    gates: ProviderGates,
    permit: RatePermit,
    reservation: BudgetReservation,
    holdsTrial: boolean,
  ): AdmissionTicket {
    let settled = false;
    const settle = (action: () => void) => {
      if (settled) return;
      settled = true;
      permit.release();
      action();
    };

    return {
      provider,
      estimatedCost: reservation.amount,
      succeed: (actualCost) =>
        settle(() => {
          gates.circuit.recordSuccess();
          reservation.commit(actualCost);
        }),
      fail: (error) =>
        settle(() => {
          gates.circuit.recordFailure();
          reservation.release();
          if (error.type === "rateLimit") {
            gates.rateLimiter.penalize(error.retryAfterMs);
          }
          gates.lastFailure = {
            at: new Date(this.clock.now()).toISOString(),
            reason: `${error.type}: ${error.message}`,
          };
        }),
      abandon: () =>
        settle(() => {
          if (holdsTrial) gates.circuit.releaseTrial();
          reservation.release();
        }),
    };
  }
}
