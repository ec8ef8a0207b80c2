import Decimal from "decimal.js";
import { err, ok, Result } from "neverthrow";
import type { BudgetSettings } from "../../../config/settings.ts";
import type { BudgetPeriod, BudgetSnapshot, ExclusionReason } from "../../../domain/models/admission.ts";
import { info, warn } from "../../../config/logger.ts";
import type { Clock } from "./Clock.ts";

type BudgetExceeded = Extract<ExclusionReason, { type: "budget_exceeded" }>;

const DAY_MS = 24 * 60 * 60 * 1000;
const MONTH_MS = 30 * DAY_MS;

/**
 * Reserved spend for one dispatch. Settles once: commit or release.
 */
export interface BudgetReservation {
  readonly amount: Decimal;
  commit(actualCost?: Decimal.Value): void;
  release(): void;
}

/**
 * Daily and monthly spend for one provider.
 * Outstanding reservations count against both limits until settled.
 */
export class BudgetTracker {
  private spentToday = new Decimal(0);
  private spentThisMonth = new Decimal(0);
  private reserved = new Decimal(0);
  private dayStartedAt: number;
  private monthStartedAt: number;

  constructor(
    readonly provider: string,
    private readonly settings: BudgetSettings,
    private readonly clock: Clock,
  ) {
    this.dayStartedAt = clock.now();
    this.monthStartedAt = clock.now();
  }

  check(estimatedCost: Decimal.Value): Result<void, BudgetExceeded> {
    this.rollover();
    const cost = new Decimal(estimatedCost);
    const exceeded = this.exceededPeriod(cost);
    if (!exceeded) {
      return ok(undefined);
    }

    const denial = this.denied(exceeded, cost);
    if (!this.settings.enforce) {
      warn(`[BUDGET] ${this.provider}: ${denial.message} (not enforced)`);
      return ok(undefined);
    }
    return err(denial);
  }

  tryReserve(estimatedCost: Decimal.Value): Result<BudgetReservation, BudgetExceeded> {
    return this.check(estimatedCost).map(() => {
      const amount = new Decimal(estimatedCost);
      this.reserved = this.reserved.plus(amount);
      return this.reservation(amount);
    });
  }

  snapshot(): BudgetSnapshot {
    this.rollover();
    const floor = (value: Decimal) => Decimal.max(0, value).toString();
    return {
      enforced: this.settings.enforce,
      spentToday: this.spentToday.toString(),
      spentThisMonth: this.spentThisMonth.toString(),
      reserved: this.reserved.toString(),
      remainingToday: floor(this.settings.daily.minus(this.spentToday).minus(this.reserved)),
      remainingThisMonth: floor(this.settings.monthly.minus(this.spentThisMonth).minus(this.reserved)),
      perQueryLimit: this.settings.perQuery.toString(),
    };
  }

  private reservation(amount: Decimal): BudgetReservation {
    let settled = false;
    return {
      amount,
      commit: (actualCost) => {
        if (settled) return;
        settled = true;
        this.reserved = Decimal.max(0, this.reserved.minus(amount));
        const spent = actualCost === undefined ? amount : new Decimal(actualCost);
        this.rollover();
        this.spentToday = this.spentToday.plus(spent);
        this.spentThisMonth = this.spentThisMonth.plus(spent);
      },
      release: () => {
        if (settled) return;
        settled = true;
        this.reserved = Decimal.max(0, this.reserved.minus(amount));
      },
    };
  }

  private exceededPeriod(cost: Decimal): BudgetPeriod | undefined {
    if (cost.greaterThan(this.settings.perQuery)) return "query";
    if (this.spentToday.plus(this.reserved).plus(cost).greaterThan(this.settings.daily)) return "daily";
    if (this.spentThisMonth.plus(this.reserved).plus(cost).greaterThan(this.settings.monthly)) {
      return "monthly";
    }
    return undefined;
  }

  private rollover(): void {
    const now = this.clock.now();
    if (now - this.dayStartedAt >= DAY_MS) {
      info(`[BUDGET] ${this.provider}: daily spend reset (was ${this.spentToday.toString()})`);
      this.spentToday = new Decimal(0);
      this.dayStartedAt = now;
    }
    if (now - this.monthStartedAt >= MONTH_MS) {
      info(`[BUDGET] ${this.provider}: monthly spend reset (was ${this.spentThisMonth.toString()})`);
      this.spentThisMonth = new Decimal(0);
      this.monthStartedAt = now;
    }
  }

  private limitFor(period: BudgetPeriod): Decimal {
    switch (period) {
      case "query":
        return this.settings.perQuery;
      case "daily":
        return this.settings.daily;
      case "monthly":
        return this.settings.monthly;
    }
  }

  private denied(period: BudgetPeriod, cost: Decimal): BudgetExceeded {
    const limit = this.limitFor(period);
    return {
      type: "budget_exceeded",
      message: `Estimated cost ${cost.toString()} exceeds ${period} budget ${limit.toString()} for ${this.provider}`,
      period,
      limit: limit.toString(),
      estimatedCost: cost.toString(),
    };
  }
}
