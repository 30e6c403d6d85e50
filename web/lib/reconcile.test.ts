import test from "node:test";
import assert from "node:assert/strict";
import { enrollment } from "./__fixtures__/periodSheet";
import { OUTCOMES } from "./eligibility";
import { enrollmentKey, reconcilePeriods } from "./reconcile";

test("enrollmentKey distinguishes customer and level", () => {
  assert.notStrictEqual(
    enrollmentKey({ customerId: "KH1", levelCode: "M70" }),
    enrollmentKey({ customerId: "KH1", levelCode: "M110" })
  );
  assert.strictEqual(enrollmentKey({ customerId: "a", levelCode: "b" }), enrollmentKey({ customerId: "a", levelCode: "b" }));
});

test("full outer join classifies kept, new and withdrawn enrollments", () => {
  const t1 = [
    enrollment({ customerId: "KH1", quota: 1, sales: 150000, threshold: 150000 }),
    enrollment({ customerId: "KH2", quota: 2, sales: 0, threshold: 300000 }),
  ];
  const t2 = [
    enrollment({ customerId: "KH1", quota: 1, sales: 0, threshold: 150000 }),
    enrollment({ customerId: "KH3", quota: 1, sales: 0, threshold: 150000 }),
  ];
  const { kept, removed } = reconcilePeriods({ t1, t2 });

  assert.deepStrictEqual(
    kept.map((r) => [r.customerId, r.outcome]),
    [
      ["KH1", "Pass"],
      ["KH3", "NotEvaluated"],
    ]
  );
  assert.strictEqual(removed.length, 1);
  assert.strictEqual(removed[0].customerId, "KH2");
  assert.strictEqual(removed[0].outcome, "Withdrawn");
  assert.deepStrictEqual(removed[0].t1, { quota: 2, sales: 0, threshold: 300000 });
  assert.deepStrictEqual(removed[0].t2, { quota: 0, sales: 0, threshold: 0 });
  assert.strictEqual(removed[0].inCurrentPeriod, false);
  assert.strictEqual(kept[1].inCurrentPeriod, true);
  assert.deepStrictEqual(kept[1].t1, { quota: 0, sales: 0, threshold: 0 });
});

test("identity comes from the current period, or the prior one when the key left", () => {
  const t1 = [
    enrollment({ customerId: "KH1", distributorId: "NPP_OLD", region: "HCM" }),
    enrollment({ customerId: "KH2", distributorId: "NPP_GONE", region: "MD" }),
  ];
  const t2 = [enrollment({ customerId: "KH1", distributorId: "NPP_NEW", region: "HCM" })];
  const { kept, removed } = reconcilePeriods({ t1, t2 });
  assert.strictEqual(kept[0].identity.distributorId, "NPP_NEW");
  assert.strictEqual(removed[0].identity.distributorId, "NPP_GONE");
  assert.strictEqual(removed[0].identity.region, "MD");
});

test("the same customer under two levels is two enrollments", () => {
  const t1 = [enrollment({ customerId: "KH1", levelCode: "M70", programCode: "XBM_MN" })];
  const t2 = [
    enrollment({ customerId: "KH1", levelCode: "M70", programCode: "XBM_MN" }),
    enrollment({ customerId: "KH1", levelCode: "M110", programCode: "XBM_MN" }),
  ];
  const { kept } = reconcilePeriods({ t1, t2 });
  assert.deepStrictEqual(
    kept.map((r) => [r.levelCode, r.outcome]),
    [
      ["M70", "Pass"],
      ["M110", "NotEvaluated"],
    ]
  );
});

test("a key repeated within a period yields one row per combination", () => {
  const t1 = [enrollment({ customerId: "KH1", distributorId: "A" })];
  const t2 = [enrollment({ customerId: "KH1", distributorId: "A" }), enrollment({ customerId: "KH1", distributorId: "B" })];
  const { kept } = reconcilePeriods({ t1, t2 });
  assert.deepStrictEqual(
    kept.map((r) => r.identity.distributorId),
    ["A", "B"]
  );
});

test("with three periods, enrollees absent from T0 pass under the extended cycle", () => {
  const t0 = [enrollment({ customerId: "KH1", quota: 1, sales: 10 })];
  const t1 = [enrollment({ customerId: "KH1", quota: 1, sales: 0, threshold: 150000 }), enrollment({ customerId: "KH2", quota: 1, threshold: 150000 })];
  const t2 = [enrollment({ customerId: "KH1", quota: 1, sales: 0, threshold: 150000 }), enrollment({ customerId: "KH2", quota: 1, threshold: 150000 })];
  const { kept } = reconcilePeriods({ t0, t1, t2 });

  assert.strictEqual(kept[0].outcome, "Fail");
  assert.deepStrictEqual(kept[0].t0, { quota: 1, sales: 10, threshold: 0 });
  assert.strictEqual(kept[1].outcome, "Pass");
  assert.strictEqual(kept[1].rationale, "New enrollee last period, evaluated under the extended cycle");
  assert.deepStrictEqual(kept[1].t0, { quota: 0, sales: 0, threshold: 0 });
});

test("with two periods there is no T0 and the extended cycle never applies", () => {
  const t1 = [enrollment({ customerId: "KH1", threshold: 150000 })];
  const t2 = [enrollment({ customerId: "KH1", threshold: 150000 })];
  const { kept } = reconcilePeriods({ t1, t2 });
  assert.strictEqual(kept[0].t0, null);
  assert.strictEqual(kept[0].outcome, "Fail");
  assert.strictEqual(kept[0].rationale, "Insufficient sales both periods");
});

test("unchanged quota of 2 with both periods short fails", () => {
  const t1 = [enrollment({ customerId: "X", quota: 2, sales: 250000, threshold: 300000 })];
  const t2 = [enrollment({ customerId: "X", quota: 2, sales: 100000, threshold: 300000 })];
  const [row] = reconcilePeriods({ t1, t2 }).kept;
  assert.strictEqual(row.outcome, "Fail");
  assert.strictEqual(row.rationale, "Insufficient sales both periods");
});

test("reconciling the same inputs twice gives the same rows", () => {
  const t0 = [enrollment({ customerId: "KH1" })];
  const t1 = [enrollment({ customerId: "KH1", quota: 2, sales: 10, threshold: 300000 }), enrollment({ customerId: "KH2" })];
  const t2 = [enrollment({ customerId: "KH1", quota: 1, sales: 400000, threshold: 150000 }), enrollment({ customerId: "KH3" })];
  const first = reconcilePeriods({ t0, t1, t2 });
  assert.deepStrictEqual(reconcilePeriods({ t0, t1, t2 }), first);
  assert.strictEqual(first.kept.length + first.removed.length, 3);
  for (const r of [...first.kept, ...first.removed]) {
    assert.ok(OUTCOMES.includes(r.outcome));
  }
});
