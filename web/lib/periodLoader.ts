import * as XLSX from "xlsx";
import { baseMinimumForLevel, canonicalProgramCode, type DisplayConfig } from "./displayConfig";
import { SchemaError } from "./displayErrors";

export type EnrollmentRecord = {
  levelCode: string;
  programCode: string;
  region: string;
  subRegion: string;
  distributorId: string;
  distributorName: string;
  salespersonId: string;
  salespersonName: string;
  customerId: string;
  customerName: string;
  salesDay: string;
  route: string;
  quota: number;
  sales: number;
  threshold: number;
};

export type LoadedPeriod = {
  label: string;
  records: EnrollmentRecord[];
  /** True when the sheet carries a sales-day or route column. */
  hasRouteColumn: boolean;
};

// Source headers as exported by the distributor system (row index 1).
export const SOURCE_COLUMNS = {
  levelCode: "Mức đăng ký",
  region: "Miền",
  subRegion: "Vùng",
  distributorId: "Mã NPP",
  distributorName: "Tên NPP",
  period: "Giai đoạn",
  salespersonId: "Mã NVBH",
  salespersonName: "Tên NVBH",
  customerId: "Mã khách hàng",
  customerName: "Tên khách hàng",
  salesDay: "Thứ bán hàng",
  route: "Tuyến",
  quota: "Số suất đăng kí",
  sales: "Doanh số tích lũy hiện tại",
} as const;

export type SourceField = keyof typeof SOURCE_COLUMNS;

function isSourceField(key: string): key is SourceField {
  return Object.prototype.hasOwnProperty.call(SOURCE_COLUMNS, key);
}

export const SOURCE_FIELDS: readonly SourceField[] = Object.keys(SOURCE_COLUMNS).filter(isSourceField);

const REQUIRED_FIELDS: readonly SourceField[] = ["levelCode", "period", "customerId", "quota", "sales"];

type Cell = string | number | boolean | null;

function normHeader(s: string) {
  return s.normalize("NFC").trim();
}

const FIELD_BY_HEADER: ReadonlyMap<string, SourceField> = new Map(
  SOURCE_FIELDS.map((f) => [normHeader(SOURCE_COLUMNS[f]), f])
);

export function cellText(v: Cell | undefined): string {
  if (v == null) return "";
  return String(v).normalize("NFC").trim();
}

/**
 * Numeric coercion for quota and sales cells. Accepts "1.200.000" and "1,200,000" as
 * thousands-grouped integers; anything that is not a number becomes 0.
 */
export function cellNumber(v: Cell | undefined): number {
  if (v == null || typeof v === "boolean") return 0;
  if (typeof v === "number") return Number.isFinite(v) ? v : 0;
  const s = v.trim().replace(/\s+/g, "");
  if (!s) return 0;
  if (/^[+-]?\d{1,3}([.,]\d{3})+$/.test(s)) return Number(s.replace(/[.,]/g, ""));
  if (!/^[+-]?\d+([.,]\d+)?$/.test(s)) return 0;
  const n = Number(s.replace(",", "."));
  return Number.isFinite(n) ? n : 0;
}

function isCellObject(v: unknown): v is XLSX.CellObject {
  return v != null && typeof v === "object" && "t" in v;
}

/**
 * Date-formatted numeric cells become "m/yyyy" text, decoded from the serial itself so the
 * month does not depend on the process timezone.
 */
function monthLabelsForDateCells(ws: XLSX.WorkSheet) {
  const ref = ws["!ref"];
  if (!ref) return;
  const range = XLSX.utils.decode_range(ref);
  for (let r = range.s.r; r <= range.e.r; r++) {
    for (let c = range.s.c; c <= range.e.c; c++) {
      const addr = XLSX.utils.encode_cell({ r, c });
      const cell: unknown = ws[addr];
      if (!isCellObject(cell) || cell.t !== "n" || typeof cell.v !== "number" || typeof cell.z !== "string") continue;
      if (!XLSX.SSF.is_date(cell.z)) continue;
      const code: { y: number; m: number } | null = XLSX.SSF.parse_date_code(cell.v);
      if (!code) continue;
      ws[addr] = { t: "s", v: `${code.m}/${code.y}` };
    }
  }
}

function readFirstSheet(data: Buffer): Cell[][] {
  let wb: XLSX.WorkBook;
  try {
    wb = XLSX.read(data, { type: "buffer", cellNF: true });
  } catch (e) {
    throw new SchemaError(`Not a readable spreadsheet: ${e instanceof Error ? e.message : String(e)}`);
  }
  const sheetName = wb.SheetNames[0];
  const ws = sheetName ? wb.Sheets[sheetName] : undefined;
  if (!ws) throw new SchemaError("No sheets found in workbook");
  monthLabelsForDateCells(ws);
  // range: 1 skips the title row; row index 1 holds the real header.
  return XLSX.utils.sheet_to_json<Cell[]>(ws, { header: 1, range: 1, defval: null, blankrows: false });
}

function indexColumns(header: Cell[]): Map<SourceField, number> {
  const found = new Map<SourceField, number>();
  header.forEach((cell, idx) => {
    const field = FIELD_BY_HEADER.get(normHeader(cellText(cell)));
    if (field && !found.has(field)) found.set(field, idx);
  });
  return found;
}

/** Parse one uploaded period snapshot into normalized enrollment records. */
export function loadPeriod(data: Buffer, config: DisplayConfig): LoadedPeriod {
  const [header = [], ...rows] = readFirstSheet(data);
  const columns = indexColumns(header);

  const missing = REQUIRED_FIELDS.filter((f) => !columns.has(f)).map((f) => SOURCE_COLUMNS[f]);
  if (missing.length) {
    throw new SchemaError(`Missing required column(s): ${missing.join(", ")}`, missing);
  }

  const get = (row: Cell[], field: SourceField): Cell | undefined => {
    const idx = columns.get(field);
    return idx == null ? undefined : row[idx];
  };

  const records: EnrollmentRecord[] = [];
  let label: string | null = null;
  for (const row of rows) {
    const customerId = cellText(get(row, "customerId"));
    const levelCode = cellText(get(row, "levelCode"));
    if (!customerId && !levelCode) continue;

    if (label == null) label = cellText(get(row, "period"));

    const quota = cellNumber(get(row, "quota"));
    records.push({
      levelCode,
      programCode: canonicalProgramCode(config, levelCode),
      region: cellText(get(row, "region")),
      subRegion: cellText(get(row, "subRegion")),
      distributorId: cellText(get(row, "distributorId")),
      distributorName: cellText(get(row, "distributorName")),
      salespersonId: cellText(get(row, "salespersonId")),
      salespersonName: cellText(get(row, "salespersonName")),
      customerId,
      customerName: cellText(get(row, "customerName")),
      salesDay: cellText(get(row, "salesDay")),
      route: cellText(get(row, "route")),
      quota,
      sales: cellNumber(get(row, "sales")),
      threshold: baseMinimumForLevel(config, levelCode) * quota,
    });
  }

  if (!records.length || label == null) throw new SchemaError("No data rows found in the first sheet");

  return {
    label,
    records,
    hasRouteColumn: columns.has("salesDay") || columns.has("route"),
  };
}

/** Current-period route text used by the route filter: sales day, falling back to route. */
export function routeText(r: Pick<EnrollmentRecord, "salesDay" | "route">): string {
  return r.salesDay || r.route;
}
