import * as XLSX from "xlsx";
import { SOURCE_COLUMNS, SOURCE_FIELDS, type EnrollmentRecord, type SourceField } from "../periodLoader";
import type { ReconciledIdentity, ReconciledRow } from "../reconcile";

export type SheetRow = Partial<Record<SourceField, string | number | null>>;

/**
 * Period export as the distributor system writes it: a title row, the header at row index 1,
 * then data rows.
 */
export function periodSheet(
  rows: SheetRow[],
  opts: { fields?: readonly SourceField[]; title?: string; cells?: Record<string, XLSX.CellObject> } = {}
): Buffer {
  const fields = opts.fields ?? SOURCE_FIELDS;
  const aoa: (string | number | null)[][] = [
    [opts.title ?? "BÁO CÁO TRƯNG BÀY"],
    fields.map((f) => SOURCE_COLUMNS[f]),
    ...rows.map((r) => fields.map((f) => r[f] ?? null)),
  ];
  const ws = XLSX.utils.aoa_to_sheet(aoa);
  // Raw cell overrides by A1 address, e.g. a date-formatted serial.
  for (const [addr, cell] of Object.entries(opts.cells ?? {})) ws[addr] = cell;
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, "Sheet1");
  return XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
}

export function enrollment(overrides: Partial<EnrollmentRecord> = {}): EnrollmentRecord {
  return {
    levelCode: "NMCD",
    programCode: "NMCD",
    region: "HCM",
    subRegion: "HCM1",
    distributorId: "NPP01",
    distributorName: "Distributor One",
    salespersonId: "NV01",
    salespersonName: "Seller One",
    customerId: "KH001",
    customerName: "Store One",
    salesDay: "Monday",
    route: "R1",
    quota: 1,
    sales: 0,
    threshold: 0,
    ...overrides,
  };
}

type ReconciledRowOverrides = Partial<Omit<ReconciledRow, "identity">> & { identity?: Partial<ReconciledIdentity> };

export function reconciledRow(overrides: ReconciledRowOverrides = {}): ReconciledRow {
  const { identity, ...rest } = overrides;
  return {
    customerId: "KH001",
    levelCode: "NMCD",
    programCode: "NMCD",
    t0: null,
    t1: { quota: 1, sales: 0, threshold: 150000 },
    t2: { quota: 1, sales: 0, threshold: 150000 },
    inCurrentPeriod: true,
    outcome: "Pass",
    rationale: "",
    ...rest,
    identity: {
      region: "HCM",
      subRegion: "HCM1",
      distributorId: "NPP01",
      distributorName: "Distributor One",
      salespersonId: "NV01",
      salespersonName: "Seller One",
      customerName: "Store One",
      salesDay: "Monday",
      route: "R1",
      ...identity,
    },
  };
}
