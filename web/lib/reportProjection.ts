import { programDisplayName, type DisplayConfig } from "./displayConfig";
import { outcomeLabel } from "./eligibility";
import type { ReconciledRow } from "./reconcile";

export type AudienceMode = "Marketing" | "FieldSales";

export type CellValue = string | number;

export type ReportTable = {
  columns: string[];
  rows: CellValue[][];
};

/** Period labels of the reconciled slots, e.g. { t1: "Tháng 10/2025", t2: "Tháng 11/2025" }. */
export type PeriodLabels = {
  t0: string | null;
  t1: string;
  t2: string;
};

type Column = {
  label: string;
  value: (r: ReconciledRow) => CellValue;
};

/** Integer amount with "." as thousands separator: 200000 → "200.000". */
export function formatAmount(n: number): string {
  const v = Math.round(Number.isFinite(n) ? n : 0);
  const digits = String(Math.abs(v)).replace(/\B(?=(\d{3})+(?!\d))/g, ".");
  return v < 0 ? `-${digits}` : digits;
}

export function shortfall(r: ReconciledRow): number {
  return Math.max(0, r.t2.threshold - r.t2.sales);
}

/** Note shown for a row: failing rows carry the current-period shortfall instead of the rationale. */
export function noteFor(r: ReconciledRow): string {
  if (r.outcome === "Fail") return `Short by: ${formatAmount(shortfall(r))}`;
  return r.rationale;
}

function compareText(a: string, b: string) {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareReportRows(a: ReconciledRow, b: ReconciledRow): number {
  return (
    compareText(a.identity.distributorId, b.identity.distributorId) ||
    compareText(a.identity.salespersonId, b.identity.salespersonId) ||
    compareText(a.identity.customerName, b.identity.customerName)
  );
}

function columnsFor(mode: AudienceMode, periods: PeriodLabels, note: (r: ReconciledRow) => string): Column[] {
  const level: Column = { label: "Level", value: (r) => r.levelCode };
  const customer: Column[] = [
    { label: "Customer ID", value: (r) => r.customerId },
    { label: "Customer name", value: (r) => r.identity.customerName },
    { label: "Sales day", value: (r) => r.identity.salesDay },
  ];
  const recent: Column[] = [
    { label: `Quota ${periods.t1}`, value: (r) => r.t1.quota },
    { label: `Quota ${periods.t2}`, value: (r) => r.t2.quota },
    { label: `Sales ${periods.t1}`, value: (r) => r.t1.sales },
    { label: `Sales ${periods.t2}`, value: (r) => r.t2.sales },
    { label: "Minimum threshold", value: (r) => r.t2.threshold },
    { label: "Outcome", value: (r) => outcomeLabel(r.outcome) },
    { label: "Note", value: note },
  ];

  if (mode === "FieldSales") {
    return [
      level,
      { label: "Distributor name", value: (r) => r.identity.distributorName },
      { label: "Salesperson ID", value: (r) => r.identity.salespersonId },
      { label: "Salesperson name", value: (r) => r.identity.salespersonName },
      ...customer,
      ...recent,
    ];
  }

  const t0Label = periods.t0;
  const carried: Column[] =
    t0Label == null
      ? []
      : [
          { label: `Quota ${t0Label}`, value: (r) => r.t0?.quota ?? 0 },
          { label: `Sales ${t0Label}`, value: (r) => r.t0?.sales ?? 0 },
        ];
  return [
    level,
    { label: "Region", value: (r) => r.identity.region },
    { label: "Sub-region", value: (r) => r.identity.subRegion },
    { label: "Distributor ID", value: (r) => r.identity.distributorId },
    { label: "Distributor name", value: (r) => r.identity.distributorName },
    { label: "Salesperson ID", value: (r) => r.identity.salespersonId },
    { label: "Salesperson name", value: (r) => r.identity.salespersonName },
    ...customer,
    ...carried,
    ...recent,
  ];
}

/**
 * Export-ready table with the columns of the given mode, rows sorted by compareReportRows.
 * Pass `shortfallNotes: false` to keep each row's rationale in the Note column.
 */
export function projectRows(
  rows: readonly ReconciledRow[],
  periods: PeriodLabels,
  mode: AudienceMode,
  opts: { shortfallNotes?: boolean } = {}
): ReportTable {
  const note = opts.shortfallNotes === false ? (r: ReconciledRow) => r.rationale : noteFor;
  const columns = columnsFor(mode, periods, note);
  const ordered = [...rows].sort(compareReportRows);
  return {
    columns: columns.map((c) => c.label),
    rows: ordered.map((r) => columns.map((c) => c.value(r))),
  };
}

export type SummaryRow = {
  index: number;
  programCode: string;
  programName: string;
  baseMinimum: number;
  totalSlots: number;
  failedSlots: number;
  failRatio: string;
};

export type WithdrawalSummaryRow = {
  index: number;
  programCode: string;
  programName: string;
  /** Failed slots, whose display is cancelled on the distributor system. */
  cancelledSlots: number;
  /** Enrollments present last period and gone this period. */
  withdrawnCount: number;
};

/** "33.3%" to one decimal; "0%" when there are no slots at all. */
export function formatFailRatio(failed: number, total: number): string {
  if (!(total > 0)) return "0%";
  return `${((failed / total) * 100).toFixed(1)}%`;
}

function currentSlots(rows: readonly ReconciledRow[]) {
  return rows.reduce((acc, r) => acc + r.t2.quota, 0);
}

export function summarizeProgram(
  index: number,
  programCode: string,
  kept: readonly ReconciledRow[],
  config: DisplayConfig
): SummaryRow {
  const totalSlots = currentSlots(kept);
  const failedSlots = currentSlots(kept.filter((r) => r.outcome === "Fail"));
  return {
    index,
    programCode,
    programName: programDisplayName(config, programCode),
    baseMinimum: config.baseMinimums[programCode] ?? 0,
    totalSlots,
    failedSlots,
    failRatio: formatFailRatio(failedSlots, totalSlots),
  };
}

export function summarizeWithdrawals(
  index: number,
  programCode: string,
  kept: readonly ReconciledRow[],
  removed: readonly ReconciledRow[],
  config: DisplayConfig
): WithdrawalSummaryRow {
  return {
    index,
    programCode,
    programName: programDisplayName(config, programCode),
    cancelledSlots: currentSlots(kept.filter((r) => r.outcome === "Fail")),
    withdrawnCount: removed.filter((r) => r.outcome === "Withdrawn").length,
  };
}

export function summaryTable(rows: readonly SummaryRow[]): ReportTable {
  return {
    columns: ["No.", "Program", "Minimum sales per slot per month", "Total display slots", "Failed slots", "Fail ratio"],
    rows: rows.map((r) => [r.index, r.programName, r.baseMinimum, r.totalSlots, r.failedSlots, r.failRatio]),
  };
}

export function withdrawalTable(rows: readonly WithdrawalSummaryRow[]): ReportTable {
  return {
    columns: ["No.", "Program", "Cancelled display slots", "Withdrawn enrollments"],
    rows: rows.map((r) => [r.index, r.programName, r.cancelledSlots, r.withdrawnCount]),
  };
}
