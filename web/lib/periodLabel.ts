/**
 * Period labels are free text typed by whoever exported the sheet ("Tháng 11/2025",
 * "11/2025", "2025-11", "Tháng 11"). They are parsed by trying matchers in order.
 *
 * A label no matcher accepts sorts as (0, 0) and then by its text. That is never an error,
 * even though it probably hides a mislabelled file: callers surface it as an info diagnostic.
 */

export type PeriodOrdinal = {
  year: number;
  month: number;
  label: string;
};

type YearMonth = { year: number; month: number };
type PeriodMatcher = (label: string, now: Date) => YearMonth | null;

function validMonth(month: number) {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

function yearMonth(year: number, month: number): YearMonth | null {
  return validMonth(month) ? { year, month } : null;
}

const yearFirst: PeriodMatcher = (label) => {
  const m = label.match(/(?<!\d)(\d{4})\s*[-/.]\s*(\d{1,2})(?!\d)/);
  if (!m) return null;
  return yearMonth(Number(m[1]), Number(m[2]));
};

const monthThenYear: PeriodMatcher = (label) => {
  const m = label.match(/(?<!\d)(\d{1,2})\D+?(\d{4})(?!\d)/);
  if (!m) return null;
  return yearMonth(Number(m[2]), Number(m[1]));
};

const bareMonth: PeriodMatcher = (label, now) => {
  const m = label.match(/^\D*?(\d{1,2})\D*$/);
  if (!m) return null;
  return yearMonth(now.getFullYear(), Number(m[1]));
};

export const PERIOD_MATCHERS: readonly PeriodMatcher[] = [yearFirst, monthThenYear, bareMonth];

export function parsePeriodLabel(raw: unknown, now: Date = new Date()): PeriodOrdinal {
  const label = String(raw ?? "").trim();
  for (const matcher of PERIOD_MATCHERS) {
    const ym = matcher(label, now);
    if (ym) return { ...ym, label };
  }
  return { year: 0, month: 0, label };
}

export function isRecognizedPeriod(p: PeriodOrdinal) {
  return p.year !== 0 || p.month !== 0;
}

export function comparePeriods(a: PeriodOrdinal, b: PeriodOrdinal): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  if (a.label === b.label) return 0;
  return a.label < b.label ? -1 : 1;
}

/** Sortable key, e.g. "2025-11|Tháng 11/2025". */
export function periodSortKey(p: PeriodOrdinal): string {
  return `${String(p.year).padStart(4, "0")}-${String(p.month).padStart(2, "0")}|${p.label}`;
}
