export type Outcome = "Pass" | "Fail" | "NotEvaluated" | "Withdrawn";

export const OUTCOMES: readonly Outcome[] = ["Pass", "Fail", "NotEvaluated", "Withdrawn"];

export type EligibilityInput = Readonly<{
  priorQuota: number;
  currentQuota: number;
  priorSales: number;
  currentSales: number;
  priorThreshold: number;
  currentThreshold: number;
  /** Enrolled in the prior period but absent from the period before it. */
  newLastPeriod: boolean;
}>;

export type EligibilityDecision = Readonly<{
  outcome: Outcome;
  rationale: string;
}>;

function slots(n: number) {
  return String(Math.trunc(n));
}

function eitherPeriodMet(i: EligibilityInput) {
  return i.priorSales >= i.priorThreshold || i.currentSales >= i.currentThreshold;
}

/**
 * Decision table for one reconciled enrollment. Rules are ordered; the first that applies wins.
 *
 * A quota decrease and an unchanged quota share the same pass test (either period meets its
 * threshold); they differ only in the rationale text.
 */
export function classifyEnrollment(i: EligibilityInput): EligibilityDecision {
  const q1 = i.priorQuota;
  const q2 = i.currentQuota;

  if (q1 > 0 && q2 === 0) {
    return { outcome: "Withdrawn", rationale: "Enrolled previous period, absent current period" };
  }
  if (q1 > 0 && i.newLastPeriod) {
    return { outcome: "Pass", rationale: "New enrollee last period, evaluated under the extended cycle" };
  }
  if (q1 === 0 && q2 > 0) {
    return { outcome: "NotEvaluated", rationale: "New enrollee this period, not yet due for evaluation" };
  }
  if (q2 > q1 && q1 > 0) {
    return { outcome: "Pass", rationale: `Quota increase ${slots(q1)}→${slots(q2)}` };
  }
  if (q2 < q1) {
    return eitherPeriodMet(i)
      ? { outcome: "Pass", rationale: `Quota decrease ${slots(q1)}→${slots(q2)}, one of two periods met threshold` }
      : { outcome: "Fail", rationale: `Quota decrease ${slots(q1)}→${slots(q2)}, neither period met threshold` };
  }
  return eitherPeriodMet(i)
    ? { outcome: "Pass", rationale: "" }
    : { outcome: "Fail", rationale: "Insufficient sales both periods" };
}

export function outcomeLabel(o: Outcome): string {
  if (o === "NotEvaluated") return "Not evaluated";
  return o;
}
