import test from "node:test";
import assert from "node:assert/strict";
import { startSpan, endSpan, formatSpanLine, withSpan } from "./perf";

test("startSpan returns handle with startMs and opts", () => {
  const handle = startSpan({
    workflow: "display_report",
    stage: "load_period",
    run_id: "run-1",
  });
  assert.ok(typeof handle.startMs === "number");
  assert.ok(handle.startMs <= Date.now() && handle.startMs >= Date.now() - 1000);
  assert.strictEqual(handle.opts.workflow, "display_report");
  assert.strictEqual(handle.opts.stage, "load_period");
  assert.strictEqual(handle.opts.run_id, "run-1");
});

test("endSpan does not throw", () => {
  const handle = startSpan({ workflow: "display_report", stage: "request_total" });
  assert.doesNotThrow(() => endSpan(handle, { status: "ok" }));
  assert.doesNotThrow(() => endSpan(handle, { status: "error", error_code: "SchemaError" }));
  assert.doesNotThrow(() => endSpan(handle));
});

test("formatSpanLine writes key=value pairs with null for missing fields", () => {
  const handle = startSpan({ workflow: "display_report", stage: "reconcile_program", run_id: "r1", program: "NMCD" });
  const line = formatSpanLine(handle, { status: "ok", row_count: 12 }, 7);
  assert.ok(line.startsWith("PERF workflow=display_report stage=reconcile_program run_id=r1 program=NMCD region=null"));
  assert.ok(line.includes(" duration_ms=7 status=ok error_code=null payload_bytes=null row_count=12 "));
});

test("withSpan returns fn result", () => {
  const result = withSpan({ workflow: "display_report", stage: "project_region" }, () => [1, 2, 3], (r) => r.length);
  assert.deepStrictEqual(result, [1, 2, 3]);
});

test("withSpan rethrows what fn threw", () => {
  assert.throws(
    () =>
      withSpan({ workflow: "display_report", stage: "load_period" }, () => {
        throw new Error("fail");
      }),
    { message: "fail" }
  );
});
