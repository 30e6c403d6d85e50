import { randomUUID } from "node:crypto";
import { programDisplayName, type DisplayConfig } from "./displayConfig";
import { diagnosticFromError, type Diagnostic } from "./displayErrors";
import { dedupeByCustomer, applyRowFilters, type RowFilters } from "./dedupe";
import { loadPeriod } from "./periodLoader";
import { isRecognizedPeriod } from "./periodLabel";
import { withSpan } from "./perf";
import { groupPeriods, selectPeriods, toPeriodFile, type PeriodFile, type PeriodSelection } from "./programGroups";
import { reconcilePeriods, type ReconciledRow } from "./reconcile";
import {
  projectRows,
  summarizeProgram,
  summarizeWithdrawals,
  type AudienceMode,
  type PeriodLabels,
  type ReportTable,
  type SummaryRow,
  type WithdrawalSummaryRow,
} from "./reportProjection";

const WORKFLOW = "display_report";

export type Upload = {
  fileName: string;
  data: Buffer;
};

export type DisplayReportRequest = {
  uploads: readonly Upload[];
  regions: readonly string[];
  mode: AudienceMode;
  filters?: RowFilters;
  /** Reference date for period labels without a year. */
  now?: Date;
  runId?: string;
};

/** One program after reconciliation, dedupe and filtering; not yet narrowed to a region. */
export type ReconciledProgram = {
  programCode: string;
  selection: PeriodSelection;
  periods: PeriodLabels;
  kept: ReconciledRow[];
  removed: ReconciledRow[];
};

export type ProgramReport = {
  programCode: string;
  programName: string;
  periods: PeriodLabels;
  kept: ReconciledRow[];
  removed: ReconciledRow[];
  keptTable: ReportTable;
  removedTable: ReportTable;
};

export type RegionReport = {
  region: string;
  programs: ProgramReport[];
  summary: SummaryRow[];
  /** Marketing mode only. */
  withdrawals: WithdrawalSummaryRow[] | null;
};

export type DisplayReportResult = {
  runId: string;
  regions: RegionReport[];
  diagnostics: Diagnostic[];
};

function logDiagnostic(runId: string, d: Diagnostic) {
  const line = [
    "DIAG",
    `workflow=${WORKFLOW}`,
    `run_id=${runId}`,
    `level=${d.level}`,
    `code=${d.code}`,
    `file_name=${d.fileName ?? "null"}`,
    `program=${d.programCode ?? "null"}`,
    `message=${JSON.stringify(d.message)}`,
  ].join(" ");
  if (d.level === "info") console.log(line);
  else console.warn(line);
}

function periodLabelsOf(s: PeriodSelection): PeriodLabels {
  return {
    t0: s.t0 ? s.t0.period.label : null,
    t1: s.t1.period.label,
    t2: s.t2.period.label,
  };
}

/** Load every upload and tag it with its program; failures become diagnostics. */
export function loadUploads(
  uploads: readonly Upload[],
  config: DisplayConfig,
  ctx: { runId: string; now: Date; diagnostics: Diagnostic[] }
): PeriodFile[] {
  const files: PeriodFile[] = [];
  for (const upload of uploads) {
    try {
      const file = withSpan(
        { workflow: WORKFLOW, stage: "load_period", run_id: ctx.runId, file_name: upload.fileName, payload_bytes: upload.data.byteLength },
        () => toPeriodFile(upload.fileName, loadPeriod(upload.data, config), config, ctx.now),
        (f) => f.period.records.length
      );
      if (!isRecognizedPeriod(file.ordinal)) {
        ctx.diagnostics.push({
          level: "info",
          code: "unrecognized_period",
          message: `Period label "${file.ordinal.label}" is not a recognizable month; it sorts before dated periods`,
          fileName: upload.fileName,
          programCode: file.programCode,
        });
      }
      files.push(file);
    } catch (e) {
      ctx.diagnostics.push(diagnosticFromError(e, { fileName: upload.fileName }));
    }
  }
  return files;
}

/** Reconcile one program's selected periods, then dedupe and apply the caller's filters. */
export function reconcileProgram(selection: PeriodSelection, filters: RowFilters = {}): ReconciledProgram {
  const joined = reconcilePeriods({
    t0: selection.t0?.period.records ?? null,
    t1: selection.t1.period.records,
    t2: selection.t2.period.records,
  });
  const deduped = dedupeByCustomer(joined.kept);
  return {
    programCode: selection.programCode,
    selection,
    periods: periodLabelsOf(selection),
    kept: applyRowFilters(deduped.kept, filters, selection.t2.period.hasRouteColumn),
    removed: [...joined.removed, ...deduped.removed],
  };
}

export function regionRows(rows: readonly ReconciledRow[], region: string, config: DisplayConfig): ReconciledRow[] {
  const scope = config.regions[region];
  if (scope === "ALL") return [...rows];
  const allowed = new Set(scope ?? []);
  return rows.filter((r) => allowed.has(r.identity.region));
}

function buildRegionReport(
  region: string,
  programs: readonly ReconciledProgram[],
  mode: AudienceMode,
  config: DisplayConfig
): RegionReport {
  const reports: ProgramReport[] = [];
  const summary: SummaryRow[] = [];
  const withdrawals: WithdrawalSummaryRow[] = [];

  programs.forEach((p, i) => {
    const kept = regionRows(p.kept, region, config);
    const removed = regionRows(p.removed, region, config);
    reports.push({
      programCode: p.programCode,
      programName: programDisplayName(config, p.programCode),
      periods: p.periods,
      kept,
      removed,
      keptTable: projectRows(kept, p.periods, mode),
      removedTable: projectRows(removed, p.periods, mode, { shortfallNotes: false }),
    });
    summary.push(summarizeProgram(i + 1, p.programCode, kept, config));
    if (mode === "Marketing") withdrawals.push(summarizeWithdrawals(i + 1, p.programCode, kept, removed, config));
  });

  return {
    region,
    programs: reports,
    summary,
    withdrawals: mode === "Marketing" ? withdrawals : null,
  };
}

/**
 * One full run: load uploads, group them per program, reconcile each program once and
 * project the result per requested region. A failing file or program is reported in
 * `diagnostics` and the run continues with the rest.
 */
export function runDisplayReport(req: DisplayReportRequest, config: DisplayConfig): DisplayReportResult {
  const runId = req.runId ?? randomUUID();
  const now = req.now ?? new Date();
  const diagnostics: Diagnostic[] = [];

  const files = loadUploads(req.uploads, config, { runId, now, diagnostics });
  const { groups, replaced } = groupPeriods(files);
  for (const f of replaced) {
    diagnostics.push({
      level: "warning",
      code: "duplicate_period",
      message: `Period "${f.ordinal.label}" was uploaded more than once; the later file is used`,
      fileName: f.fileName,
      programCode: f.programCode,
    });
  }

  const programs: ReconciledProgram[] = [];
  for (const [programCode, ordered] of groups) {
    try {
      const program = withSpan(
        { workflow: WORKFLOW, stage: "reconcile_program", run_id: runId, program: programCode },
        () => reconcileProgram(selectPeriods(programCode, ordered), req.filters),
        (p) => p.kept.length
      );
      programs.push(program);
    } catch (e) {
      diagnostics.push(diagnosticFromError(e, { programCode }));
    }
  }

  const regions: RegionReport[] = [];
  for (const region of req.regions) {
    if (!Object.prototype.hasOwnProperty.call(config.regions, region)) {
      diagnostics.push({ level: "warning", code: "unknown_region", message: `Unknown region ${region}` });
      continue;
    }
    regions.push(
      withSpan(
        { workflow: WORKFLOW, stage: "project_region", run_id: runId, region },
        () => buildRegionReport(region, programs, req.mode, config),
        (r) => r.programs.length
      )
    );
  }

  for (const d of diagnostics) logDiagnostic(runId, d);
  return { runId, regions, diagnostics };
}
