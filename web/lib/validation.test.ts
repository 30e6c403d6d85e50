import test from "node:test";
import assert from "node:assert/strict";
import { DisplayReportOptionsSchema, audienceMode, outcomeFilter, splitList } from "./validation";

test("splitList flattens repeated and comma-separated values", () => {
  assert.deepStrictEqual(splitList(["HCME, MBAC", "MTAY", "", null]), ["HCME", "MBAC", "MTAY"]);
  assert.deepStrictEqual(splitList([]), []);
});

test("options apply defaults", () => {
  const parsed = DisplayReportOptionsSchema.parse({ regions: ["HCME"] });
  assert.deepStrictEqual(parsed, { regions: ["HCME"], mode: "marketing", outcomes: [], routes: [] });
});

test("options require a region", () => {
  const r = DisplayReportOptionsSchema.safeParse({ regions: [] });
  assert.strictEqual(r.success, false);
});

test("options reject unknown modes and outcomes", () => {
  assert.strictEqual(DisplayReportOptionsSchema.safeParse({ regions: ["HCME"], mode: "admin" }).success, false);
  assert.strictEqual(DisplayReportOptionsSchema.safeParse({ regions: ["HCME"], outcomes: ["excluded"] }).success, false);
});

test("\"all\" cannot be combined with another outcome", () => {
  const r = DisplayReportOptionsSchema.safeParse({ regions: ["HCME"], outcomes: ["all", "fail"] });
  assert.strictEqual(r.success, false);
  if (!r.success) {
    assert.deepStrictEqual(r.error.issues[0].path, ["outcomes"]);
  }
});

test("outcomeFilter maps tokens to outcomes", () => {
  assert.strictEqual(outcomeFilter([]), null);
  assert.strictEqual(outcomeFilter(["all"]), null);
  assert.deepStrictEqual(outcomeFilter(["fail", "not_evaluated"]), ["Fail", "NotEvaluated"]);
  assert.deepStrictEqual(outcomeFilter(["withdrawn"]), ["Withdrawn"]);
});

test("audienceMode", () => {
  assert.strictEqual(audienceMode("marketing"), "Marketing");
  assert.strictEqual(audienceMode("field_sales"), "FieldSales");
});

test("withdrawn is an accepted outcome token", () => {
  const parsed = DisplayReportOptionsSchema.parse({ regions: ["HCME"], outcomes: ["withdrawn", "pass"] });
  assert.deepStrictEqual(outcomeFilter(parsed.outcomes), ["Withdrawn", "Pass"]);
});
