export type DisplayErrorCode =
  | "schema_error"
  | "ambiguous_program"
  | "unresolved_program"
  | "insufficient_periods"
  | "unrecognized_period"
  | "program_failed";

export class DisplayReportError extends Error {
  readonly code: DisplayErrorCode;

  constructor(code: DisplayErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Upload is not a readable sheet, or lacks a required column. */
export class SchemaError extends DisplayReportError {
  constructor(message: string, readonly missingColumns: readonly string[] = []) {
    super("schema_error", message);
  }
}

export class AmbiguousProgramError extends DisplayReportError {
  constructor(readonly fileName: string, readonly candidates: readonly string[]) {
    super("ambiguous_program", `File ${fileName} matches several programs: ${candidates.join(", ")}`);
  }
}

export class UnresolvedProgramError extends DisplayReportError {
  constructor(readonly fileName: string) {
    super("unresolved_program", `Cannot determine the program of file ${fileName}`);
  }
}

export class InsufficientPeriodsError extends DisplayReportError {
  constructor(readonly programCode: string, readonly periodCount: number) {
    super("insufficient_periods", `Program ${programCode} has ${periodCount} period(s); at least 2 are needed`);
  }
}

export type DiagnosticLevel = "info" | "warning" | "error";

export type Diagnostic = {
  level: DiagnosticLevel;
  code: DisplayErrorCode | "duplicate_period" | "unknown_region";
  message: string;
  fileName?: string;
  programCode?: string;
};

export function diagnosticFromError(e: unknown, ctx: { fileName?: string; programCode?: string } = {}): Diagnostic {
  if (e instanceof DisplayReportError) {
    return {
      level: e instanceof InsufficientPeriodsError ? "info" : "error",
      code: e.code,
      message: e.message,
      ...ctx,
    };
  }
  return {
    level: "error",
    code: ctx.programCode ? "program_failed" : "schema_error",
    message: e instanceof Error ? e.message : String(e),
    ...ctx,
  };
}
