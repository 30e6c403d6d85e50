import type { Outcome } from "./eligibility";
import type { ReconciledRow } from "./reconcile";
import { routeText } from "./periodLoader";

export type DedupeResult = {
  kept: ReconciledRow[];
  removed: ReconciledRow[];
};

export type RowFilters = {
  /** Empty or absent means every outcome. */
  outcomes?: readonly Outcome[] | null;
  /** Case-insensitive substrings matched against the current-period route. */
  routeTokens?: readonly string[] | null;
};

function currentDistributorId(r: ReconciledRow) {
  return r.inCurrentPeriod ? r.identity.distributorId : "";
}

function compareText(a: string, b: string) {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Collapse rows sharing a customer id. Within a customer the row that sorts last by
 * current-period distributor id is kept (a missing id sorts first); the rest move to
 * `removed`, annotated with the duplicate count. Survivors keep their input order.
 */
export function dedupeByCustomer(rows: readonly ReconciledRow[]): DedupeResult {
  const byCustomer = new Map<string, { row: ReconciledRow; idx: number }[]>();
  rows.forEach((row, idx) => {
    const list = byCustomer.get(row.customerId);
    if (list) list.push({ row, idx });
    else byCustomer.set(row.customerId, [{ row, idx }]);
  });

  const survivors = new Set<number>();
  const removed: ReconciledRow[] = [];
  for (const entries of byCustomer.values()) {
    // Array.prototype.sort is stable, so equal distributor ids keep input order.
    const ordered = [...entries].sort((a, b) => compareText(currentDistributorId(a.row), currentDistributorId(b.row)));
    const winner = ordered[ordered.length - 1];
    survivors.add(winner.idx);
    if (ordered.length === 1) continue;

    const keptDistributor = currentDistributorId(winner.row) || "(none)";
    for (const { row } of ordered.slice(0, -1)) {
      removed.push({
        ...row,
        rationale: `Duplicate customer entry (${ordered.length} entries), kept distributor ${keptDistributor}`,
      });
    }
  }

  return {
    kept: rows.filter((_, idx) => survivors.has(idx)),
    removed,
  };
}

export function filterByOutcome(rows: readonly ReconciledRow[], outcomes?: readonly Outcome[] | null): ReconciledRow[] {
  if (!outcomes || !outcomes.length) return [...rows];
  const wanted = new Set(outcomes);
  return rows.filter((r) => wanted.has(r.outcome));
}

/** No-op when the current period carries no route column or no usable token is given. */
export function filterByRoute(
  rows: readonly ReconciledRow[],
  routeTokens: readonly string[] | null | undefined,
  hasRouteColumn: boolean
): ReconciledRow[] {
  const tokens = (routeTokens ?? []).map((t) => t.trim().toLowerCase()).filter(Boolean);
  if (!hasRouteColumn || !tokens.length) return [...rows];
  return rows.filter((r) => {
    if (!r.inCurrentPeriod) return false;
    const route = routeText(r.identity).toLowerCase();
    return tokens.some((t) => route.includes(t));
  });
}

export function applyRowFilters(
  rows: readonly ReconciledRow[],
  filters: RowFilters,
  hasRouteColumn: boolean
): ReconciledRow[] {
  return filterByRoute(filterByOutcome(rows, filters.outcomes), filters.routeTokens, hasRouteColumn);
}
