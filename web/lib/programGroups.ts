import { canonicalProgramCode, isKnownProgram, type DisplayConfig } from "./displayConfig";
import { AmbiguousProgramError, InsufficientPeriodsError, UnresolvedProgramError } from "./displayErrors";
import type { LoadedPeriod } from "./periodLoader";
import { comparePeriods, parsePeriodLabel, periodSortKey, type PeriodOrdinal } from "./periodLabel";

export type PeriodFile = {
  fileName: string;
  programCode: string;
  ordinal: PeriodOrdinal;
  period: LoadedPeriod;
};

/** The 2 or 3 most recent periods of one program, oldest first. */
export type PeriodSelection = {
  programCode: string;
  t0: PeriodFile | null;
  t1: PeriodFile;
  t2: PeriodFile;
};

function uniqueSorted(values: Iterable<string>) {
  return Array.from(new Set(values)).sort();
}

/**
 * Known program codes whose text appears in a file name (case-insensitive). Only the longest
 * hits are kept: "KOS_XXTG_BS_T11.xlsx" is KOS_XXTG_BS, not KOS_XXTG.
 */
function programsInFileName(fileName: string, candidates: readonly string[]): string[] {
  const name = fileName.toUpperCase();
  const hits = candidates.filter((code) => code && name.includes(code.toUpperCase()));
  if (!hits.length) return [];
  const longest = Math.max(...hits.map((h) => h.length));
  return uniqueSorted(hits.filter((h) => h.length === longest));
}

/**
 * Decide which program an uploaded file belongs to. The registration levels in the data win
 * when they resolve to exactly one known program; the file name is the fallback, and the
 * tie-breaker when the data names several.
 */
export function resolveProgramCode(
  fileName: string,
  levelCodes: Iterable<string>,
  config: DisplayConfig
): string {
  const fromContent = uniqueSorted(
    Array.from(levelCodes, (level) => canonicalProgramCode(config, level)).filter((code) => isKnownProgram(config, code))
  );
  if (fromContent.length === 1) return fromContent[0];

  if (fromContent.length > 1) {
    const hits = programsInFileName(fileName, fromContent);
    if (hits.length === 1) return hits[0];
    throw new AmbiguousProgramError(fileName, fromContent);
  }

  const hits = programsInFileName(fileName, Object.keys(config.baseMinimums));
  if (hits.length === 1) return hits[0];
  if (hits.length > 1) throw new AmbiguousProgramError(fileName, hits);
  throw new UnresolvedProgramError(fileName);
}

export function toPeriodFile(
  fileName: string,
  period: LoadedPeriod,
  config: DisplayConfig,
  now: Date = new Date()
): PeriodFile {
  return {
    fileName,
    programCode: resolveProgramCode(
      fileName,
      period.records.map((r) => r.levelCode),
      config
    ),
    ordinal: parsePeriodLabel(period.label, now),
    period,
  };
}

export type GroupedPeriods = {
  groups: Map<string, PeriodFile[]>;
  /** Files dropped because a later upload of the same program carried the same period label. */
  replaced: PeriodFile[];
};

/** Group files per program, each group sorted oldest first. Insertion order of programs is kept. */
export function groupPeriods(files: readonly PeriodFile[]): GroupedPeriods {
  const byProgram = new Map<string, Map<string, PeriodFile>>();
  const replaced: PeriodFile[] = [];
  for (const f of files) {
    let group = byProgram.get(f.programCode);
    if (!group) {
      group = new Map();
      byProgram.set(f.programCode, group);
    }
    const key = periodSortKey(f.ordinal);
    const prev = group.get(key);
    if (prev) replaced.push(prev);
    group.set(key, f);
  }

  const groups = new Map<string, PeriodFile[]>();
  for (const [code, group] of byProgram) {
    groups.set(
      code,
      Array.from(group.values()).sort((a, b) => comparePeriods(a.ordinal, b.ordinal))
    );
  }
  return { groups, replaced };
}

/** Latest is T2, second latest T1; the third latest becomes T0 when there is one. */
export function selectPeriods(programCode: string, ordered: readonly PeriodFile[]): PeriodSelection {
  const n = ordered.length;
  if (n < 2) throw new InsufficientPeriodsError(programCode, n);
  return {
    programCode,
    t0: n >= 3 ? ordered[n - 3] : null,
    t1: ordered[n - 2],
    t2: ordered[n - 1],
  };
}
