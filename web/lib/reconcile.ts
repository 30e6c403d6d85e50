import { classifyEnrollment, type Outcome } from "./eligibility";
import type { EnrollmentRecord } from "./periodLoader";

export type PeriodFigures = Readonly<{
  quota: number;
  sales: number;
  threshold: number;
}>;

export type ReconciledIdentity = Readonly<{
  region: string;
  subRegion: string;
  distributorId: string;
  distributorName: string;
  salespersonId: string;
  salespersonName: string;
  customerName: string;
  salesDay: string;
  route: string;
}>;

export type ReconciledRow = Readonly<{
  customerId: string;
  levelCode: string;
  programCode: string;
  /** Identity fields from the current period, or the prior one when the key left. */
  identity: ReconciledIdentity;
  t0: PeriodFigures | null;
  t1: PeriodFigures;
  t2: PeriodFigures;
  /** Joined from a T2 record; route and distributor of the current period exist only then. */
  inCurrentPeriod: boolean;
  outcome: Outcome;
  rationale: string;
}>;

export type ReconcileInput = {
  t0?: readonly EnrollmentRecord[] | null;
  t1: readonly EnrollmentRecord[];
  t2: readonly EnrollmentRecord[];
};

export type ReconcileResult = {
  kept: ReconciledRow[];
  removed: ReconciledRow[];
};

const ZERO: PeriodFigures = Object.freeze({ quota: 0, sales: 0, threshold: 0 });

export function enrollmentKey(r: Pick<EnrollmentRecord, "customerId" | "levelCode">): string {
  return JSON.stringify([r.customerId, r.levelCode]);
}

function figures(r: EnrollmentRecord | undefined): PeriodFigures {
  if (!r) return ZERO;
  return { quota: r.quota, sales: r.sales, threshold: r.threshold };
}

function identityOf(r: EnrollmentRecord): ReconciledIdentity {
  return {
    region: r.region,
    subRegion: r.subRegion,
    distributorId: r.distributorId,
    distributorName: r.distributorName,
    salespersonId: r.salespersonId,
    salespersonName: r.salespersonName,
    customerName: r.customerName,
    salesDay: r.salesDay,
    route: r.route,
  };
}

function groupByKey(records: readonly EnrollmentRecord[]): Map<string, EnrollmentRecord[]> {
  const m = new Map<string, EnrollmentRecord[]>();
  for (const r of records) {
    const k = enrollmentKey(r);
    const list = m.get(k);
    if (list) list.push(r);
    else m.set(k, [r]);
  }
  return m;
}

type JoinedPair = { key: string; r1: EnrollmentRecord | undefined; r2: EnrollmentRecord | undefined };

/**
 * Full outer join on the enrollment key. A key repeated within a period (the same customer
 * under two distributors) yields one pair per combination; dedupe collapses them later.
 * T1 keys come first in T1 order, then keys only found in T2.
 */
function outerJoin(t1: Map<string, EnrollmentRecord[]>, t2: Map<string, EnrollmentRecord[]>): JoinedPair[] {
  const pairs: JoinedPair[] = [];
  for (const [key, left] of t1) {
    const right = t2.get(key);
    for (const r1 of left) {
      if (!right) pairs.push({ key, r1, r2: undefined });
      else for (const r2 of right) pairs.push({ key, r1, r2 });
    }
  }
  for (const [key, right] of t2) {
    if (t1.has(key)) continue;
    for (const r2 of right) pairs.push({ key, r1: undefined, r2 });
  }
  return pairs;
}

/**
 * Outer-join T1 and T2 on (customer id, level code) and classify every joined row.
 * Withdrawn rows go to `removed`; everything else stays in `kept`.
 */
export function reconcilePeriods(input: ReconcileInput): ReconcileResult {
  const byT0 = input.t0 ? groupByKey(input.t0) : null;
  const pairs = outerJoin(groupByKey(input.t1), groupByKey(input.t2));

  const kept: ReconciledRow[] = [];
  const removed: ReconciledRow[] = [];

  for (const { key, r1, r2 } of pairs) {
    const base = r2 ?? r1;
    if (!base) continue;

    const t1 = figures(r1);
    const t2 = figures(r2);
    const decision = classifyEnrollment({
      priorQuota: t1.quota,
      currentQuota: t2.quota,
      priorSales: t1.sales,
      currentSales: t2.sales,
      priorThreshold: t1.threshold,
      currentThreshold: t2.threshold,
      newLastPeriod: byT0 != null && r1 != null && !byT0.has(key),
    });

    const row: ReconciledRow = {
      customerId: base.customerId,
      levelCode: base.levelCode,
      programCode: base.programCode,
      identity: identityOf(base),
      t0: byT0 ? figures(byT0.get(key)?.[0]) : null,
      t1,
      t2,
      inCurrentPeriod: r2 != null,
      outcome: decision.outcome,
      rationale: decision.rationale,
    };
    (decision.outcome === "Withdrawn" ? removed : kept).push(row);
  }

  return { kept, removed };
}
