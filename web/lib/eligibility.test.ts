import test from "node:test";
import assert from "node:assert/strict";
import { classifyEnrollment, outcomeLabel, type EligibilityInput } from "./eligibility";

function input(overrides: Partial<EligibilityInput>): EligibilityInput {
  return {
    priorQuota: 1,
    currentQuota: 1,
    priorSales: 0,
    currentSales: 0,
    priorThreshold: 150000,
    currentThreshold: 150000,
    newLastPeriod: false,
    ...overrides,
  };
}

test("enrollment gone from the current period is Withdrawn", () => {
  assert.deepStrictEqual(classifyEnrollment(input({ priorQuota: 2, currentQuota: 0, priorSales: 999999 })), {
    outcome: "Withdrawn",
    rationale: "Enrolled previous period, absent current period",
  });
});

test("withdrawal wins over the new-last-period rule", () => {
  const d = classifyEnrollment(input({ priorQuota: 1, currentQuota: 0, newLastPeriod: true }));
  assert.strictEqual(d.outcome, "Withdrawn");
});

test("new enrollee of the prior period passes regardless of sales", () => {
  assert.deepStrictEqual(classifyEnrollment(input({ priorQuota: 1, currentQuota: 1, newLastPeriod: true })), {
    outcome: "Pass",
    rationale: "New enrollee last period, evaluated under the extended cycle",
  });
});

test("new enrollee of the current period is not evaluated", () => {
  assert.deepStrictEqual(classifyEnrollment(input({ priorQuota: 0, currentQuota: 3 })), {
    outcome: "NotEvaluated",
    rationale: "New enrollee this period, not yet due for evaluation",
  });
});

test("quota increase passes", () => {
  assert.deepStrictEqual(classifyEnrollment(input({ priorQuota: 1, currentQuota: 3 })), {
    outcome: "Pass",
    rationale: "Quota increase 1→3",
  });
});

test("quota decrease passes when either period met its threshold", () => {
  const d = classifyEnrollment(
    input({ priorQuota: 3, currentQuota: 2, priorSales: 450000, priorThreshold: 450000, currentThreshold: 300000 })
  );
  assert.deepStrictEqual(d, { outcome: "Pass", rationale: "Quota decrease 3→2, one of two periods met threshold" });
});

test("quota decrease fails when neither period met its threshold", () => {
  const d = classifyEnrollment(
    input({ priorQuota: 3, currentQuota: 2, priorSales: 449999, priorThreshold: 450000, currentSales: 1, currentThreshold: 300000 })
  );
  assert.deepStrictEqual(d, { outcome: "Fail", rationale: "Quota decrease 3→2, neither period met threshold" });
});

test("unchanged quota passes with an empty rationale when one period met the threshold", () => {
  assert.deepStrictEqual(classifyEnrollment(input({ currentSales: 150000 })), { outcome: "Pass", rationale: "" });
  assert.deepStrictEqual(classifyEnrollment(input({ priorSales: 150000 })), { outcome: "Pass", rationale: "" });
});

test("unchanged quota fails when both periods fell short", () => {
  assert.deepStrictEqual(classifyEnrollment(input({ priorSales: 149999, currentSales: 100 })), {
    outcome: "Fail",
    rationale: "Insufficient sales both periods",
  });
});

test("zero threshold counts as met", () => {
  const d = classifyEnrollment(input({ priorThreshold: 0, currentThreshold: 0 }));
  assert.strictEqual(d.outcome, "Pass");
});

test("fractional quotas are truncated in rationales", () => {
  assert.strictEqual(classifyEnrollment(input({ priorQuota: 1.5, currentQuota: 2.9 })).rationale, "Quota increase 1→2");
});

test("outcomeLabel", () => {
  assert.strictEqual(outcomeLabel("NotEvaluated"), "Not evaluated");
  assert.strictEqual(outcomeLabel("Fail"), "Fail");
});
