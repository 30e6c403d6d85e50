import * as XLSX from "xlsx";
import type { RegionReport } from "./displayReport";
import { summaryTable, withdrawalTable, type AudienceMode, type ReportTable } from "./reportProjection";

export type WorkbookFile = {
  name: string;
  data: Buffer;
};

const MAX_SHEET_NAME = 31;

/** Excel sheet names: at most 31 chars, none of []:*?/\ and unique within the book. */
export function safeSheetName(raw: string, taken: ReadonlySet<string>): string {
  const base = (raw.replace(/[[\]:*?\/\\]/g, "_").trim() || "Sheet").slice(0, MAX_SHEET_NAME);
  if (!taken.has(base)) return base;
  for (let n = 2; ; n++) {
    const suffix = `~${n}`;
    const candidate = base.slice(0, MAX_SHEET_NAME - suffix.length) + suffix;
    if (!taken.has(candidate)) return candidate;
  }
}

class BookBuilder {
  private readonly wb = XLSX.utils.book_new();
  private readonly names = new Set<string>();

  addTable(name: string, table: ReportTable) {
    const sheetName = safeSheetName(name, this.names);
    this.names.add(sheetName);
    XLSX.utils.book_append_sheet(this.wb, XLSX.utils.aoa_to_sheet([table.columns, ...table.rows]), sheetName);
  }

  get isEmpty() {
    return this.names.size === 0;
  }

  toBuffer(): Buffer {
    return XLSX.write(this.wb, { type: "buffer", bookType: "xlsx" });
  }
}

/**
 * Workbooks for one region. Marketing: results (one sheet per program, plus Summary and
 * Cancelled) and removed records. Field sales: results with Summary only. Books without a
 * single sheet are skipped.
 */
export function buildRegionWorkbooks(report: RegionReport, mode: AudienceMode): WorkbookFile[] {
  const results = new BookBuilder();
  const removed = new BookBuilder();

  for (const p of report.programs) {
    results.addTable(p.programCode, p.keptTable);
    if (mode === "Marketing") removed.addTable(p.programCode, p.removedTable);
  }
  if (report.summary.length) results.addTable("Summary", summaryTable(report.summary));
  if (report.withdrawals?.length) results.addTable("Cancelled", withdrawalTable(report.withdrawals));

  const files: WorkbookFile[] = [];
  if (!results.isEmpty) {
    const suffix = mode === "FieldSales" ? "_FieldSales" : "";
    files.push({ name: `Summary_${report.region}${suffix}.xlsx`, data: results.toBuffer() });
  }
  if (mode === "Marketing" && !removed.isEmpty) {
    files.push({ name: `Removed_${report.region}.xlsx`, data: removed.toBuffer() });
  }
  return files;
}
