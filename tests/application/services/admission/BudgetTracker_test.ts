import { test } from "node:test";
import assert from "node:assert/strict";
import { BudgetTracker } from "../../../../src/application/services/admission/BudgetTracker.ts";
import { BudgetSettingsSchema } from "../../../../src/config/settings.ts";
import { ManualClock } from "../../../testUtils.ts";

const DAY_MS = 24 * 60 * 60 * 1000;

function tracker(clock = new ManualClock(), enforce = true) {
  const settings = BudgetSettingsSchema.parse({ perQuery: "0.05", daily: "0.10", monthly: "1.00", enforce });
  return new BudgetTracker("brave", settings, clock);
}

test("BudgetTracker - rejects a single query above the per-query limit", () => {
  const check = tracker().check("0.06");

  assert.ok(check.isErr());
  assert.deepEqual(check.error, {
    type: "budget_exceeded",
    message: "Estimated cost 0.06 exceeds query budget 0.05 for brave",
    period: "query",
    limit: "0.05",
    estimatedCost: "0.06",
  });
});

test("BudgetTracker - outstanding reservations count against the daily limit", () => {
  const budget = tracker();

  assert.ok(budget.tryReserve("0.04").isOk());
  assert.ok(budget.tryReserve("0.04").isOk());
  const third = budget.tryReserve("0.04");

  assert.ok(third.isErr());
  assert.equal(third.error.period, "daily");
  assert.equal(third.error.limit, "0.1");
  assert.equal(budget.snapshot().reserved, "0.08");
});

test("BudgetTracker - commit records the actual cost and release returns the reservation", () => {
  const budget = tracker();
  const first = budget.tryReserve("0.04");
  const second = budget.tryReserve("0.04");
  assert.ok(first.isOk() && second.isOk());

  first.value.commit("0.01");
  first.value.commit("0.03");
  second.value.release();

  const snapshot = budget.snapshot();
  assert.equal(snapshot.spentToday, "0.01");
  assert.equal(snapshot.spentThisMonth, "0.01");
  assert.equal(snapshot.reserved, "0");
  assert.equal(snapshot.remainingToday, "0.09");
  assert.equal(snapshot.remainingThisMonth, "0.99");
});

test("BudgetTracker - daily spend resets after a day, monthly spend does not", () => {
  const clock = new ManualClock();
  const budget = tracker(clock);
  const reservation = budget.tryReserve("0.05");
  assert.ok(reservation.isOk());
  reservation.value.commit();

  clock.advance(DAY_MS);

  const snapshot = budget.snapshot();
  assert.equal(snapshot.spentToday, "0");
  assert.equal(snapshot.spentThisMonth, "0.05");
});

test("BudgetTracker - an unenforced budget only warns", () => {
  const budget = tracker(new ManualClock(), false);

  assert.ok(budget.check("1").isOk());
  assert.equal(budget.snapshot().enforced, false);
});
