import test from "node:test";
import assert from "node:assert/strict";
import * as XLSX from "xlsx";
import { periodSheet, type SheetRow } from "./__fixtures__/periodSheet";
import { defaultDisplayConfig } from "./displayConfig";
import { runDisplayReport, type RegionReport, type Upload } from "./displayReport";
import { buildRegionWorkbooks, safeSheetName } from "./reportWorkbook";

const config = defaultDisplayConfig();

function upload(fileName: string, period: string, rows: SheetRow[]): Upload {
  return { fileName, data: periodSheet(rows.map((r) => ({ levelCode: "NMCD", region: "HCM", period, ...r }))) };
}

function regionReport(mode: "Marketing" | "FieldSales"): RegionReport {
  const result = runDisplayReport(
    {
      uploads: [
        upload("NMCD_T10.xlsx", "Tháng 10/2025", [
          { customerId: "KH1", quota: 1, sales: 0 },
          { customerId: "KH2", quota: 1, sales: 0 },
        ]),
        upload("NMCD_T11.xlsx", "Tháng 11/2025", [{ customerId: "KH1", quota: 1, sales: 0 }]),
      ],
      regions: ["HCME"],
      mode,
      now: new Date(2025, 11, 1),
    },
    config
  );
  return result.regions[0];
}

function readBook(data: Buffer) {
  return XLSX.read(data, { type: "buffer" });
}

function sheetRows(wb: XLSX.WorkBook, name: string) {
  return XLSX.utils.sheet_to_json<(string | number)[]>(wb.Sheets[name], { header: 1 });
}

test("safeSheetName strips forbidden characters and truncates", () => {
  assert.strictEqual(safeSheetName("A/B:C", new Set()), "A_B_C");
  assert.strictEqual(safeSheetName("x".repeat(40), new Set()).length, 31);
  assert.strictEqual(safeSheetName("  ", new Set()), "Sheet");
});

test("safeSheetName suffixes names already taken", () => {
  assert.strictEqual(safeSheetName("NMCD", new Set(["NMCD"])), "NMCD~2");
  assert.strictEqual(safeSheetName("NMCD", new Set(["NMCD", "NMCD~2"])), "NMCD~3");
  const long = "y".repeat(31);
  assert.strictEqual(safeSheetName(long, new Set([long])), `${"y".repeat(29)}~2`);
});

test("marketing writes a results book and a removed-records book", () => {
  const files = buildRegionWorkbooks(regionReport("Marketing"), "Marketing");
  assert.deepStrictEqual(
    files.map((f) => f.name),
    ["Summary_HCME.xlsx", "Removed_HCME.xlsx"]
  );

  const results = readBook(files[0].data);
  assert.deepStrictEqual(results.SheetNames, ["NMCD", "Summary", "Cancelled"]);
  assert.deepStrictEqual(sheetRows(results, "Cancelled"), [
    ["No.", "Program", "Cancelled display slots", "Withdrawn enrollments"],
    [1, config.programNames.NMCD, 1, 1],
  ]);
  assert.deepStrictEqual(sheetRows(results, "Summary")[1], [1, config.programNames.NMCD, 150000, 1, 1, "100.0%"]);

  const removed = readBook(files[1].data);
  assert.deepStrictEqual(removed.SheetNames, ["NMCD"]);
  const [header, row] = sheetRows(removed, "NMCD");
  assert.strictEqual(row[header.indexOf("Customer ID")], "KH2");
  assert.strictEqual(row[header.indexOf("Outcome")], "Withdrawn");
});

test("field sales writes only the results book with a summary", () => {
  const files = buildRegionWorkbooks(regionReport("FieldSales"), "FieldSales");
  assert.deepStrictEqual(
    files.map((f) => f.name),
    ["Summary_HCME_FieldSales.xlsx"]
  );
  const wb = readBook(files[0].data);
  assert.deepStrictEqual(wb.SheetNames, ["NMCD", "Summary"]);
  const [header, row] = sheetRows(wb, "NMCD");
  assert.strictEqual(header.length, 14);
  assert.strictEqual(row[header.indexOf("Note")], "Short by: 150.000");
});

test("a region without programs produces no files", () => {
  const empty: RegionReport = { region: "MBAC", programs: [], summary: [], withdrawals: [] };
  assert.deepStrictEqual(buildRegionWorkbooks(empty, "Marketing"), []);
});
