import { z } from "zod";
import type { Outcome } from "./eligibility";
import type { AudienceMode } from "./reportProjection";

/**
 * External request validation for report runs (HTTP form fields and CLI flags share it).
 *
 * List fields arrive either repeated or comma-separated; `splitList` flattens both.
 */

export function splitList(values: readonly unknown[]): string[] {
  return values
    .flatMap((v) => String(v ?? "").split(","))
    .map((s) => s.trim())
    .filter(Boolean);
}

const OutcomeTokenSchema = z.enum(["all", "pass", "fail", "not_evaluated", "withdrawn"]);

export const DisplayReportOptionsSchema = z
  .object({
    regions: z.array(z.string().min(1)).min(1, "select at least one region"),
    mode: z.enum(["marketing", "field_sales"]).default("marketing"),
    outcomes: z.array(OutcomeTokenSchema).default([]),
    routes: z.array(z.string().min(1)).default([]),
    config: z.string().optional(),
  })
  .superRefine((v, ctx) => {
    if (v.outcomes.includes("all") && v.outcomes.length > 1) {
      ctx.addIssue({ code: "custom", path: ["outcomes"], message: "\"all\" cannot be combined with other outcomes" });
    }
  });

export type DisplayReportOptions = z.infer<typeof DisplayReportOptionsSchema>;

const OUTCOME_BY_TOKEN: Record<Exclude<z.infer<typeof OutcomeTokenSchema>, "all">, Outcome> = {
  pass: "Pass",
  fail: "Fail",
  not_evaluated: "NotEvaluated",
  withdrawn: "Withdrawn",
};

/** null means every outcome (no token, or "all"). */
export function outcomeFilter(tokens: readonly z.infer<typeof OutcomeTokenSchema>[]): Outcome[] | null {
  const picked: Outcome[] = [];
  for (const t of tokens) {
    if (t === "all") return null;
    picked.push(OUTCOME_BY_TOKEN[t]);
  }
  return picked.length ? picked : null;
}

export function audienceMode(mode: DisplayReportOptions["mode"]): AudienceMode {
  return mode === "field_sales" ? "FieldSales" : "Marketing";
}
