/**
 * Performance instrumentation: one PERF log line per span.
 * Spans are synchronous; the line is written when the span ends.
 */

const BUILD_SHA = (typeof process !== "undefined" && process.env.BUILD_SHA) || null;

export type StartSpanOptions = {
  workflow: string;
  stage: string;
  run_id?: string | null;
  program?: string | null;
  region?: string | null;
  file_name?: string | null;
  payload_bytes?: number | null;
};

export type EndSpanOptions = {
  status?: "ok" | "error";
  error_code?: string | null;
  row_count?: number | null;
};

export type SpanHandle = {
  startMs: number;
  opts: StartSpanOptions;
};

export function startSpan(opts: StartSpanOptions): SpanHandle {
  return {
    startMs: Date.now(),
    opts: { ...opts },
  };
}

export function formatSpanLine(handle: SpanHandle, endOpts: EndSpanOptions, durationMs: number): string {
  const o = handle.opts;
  return [
    "PERF",
    `workflow=${o.workflow}`,
    `stage=${o.stage}`,
    `run_id=${o.run_id ?? "null"}`,
    `program=${o.program ?? "null"}`,
    `region=${o.region ?? "null"}`,
    `file_name=${o.file_name ?? "null"}`,
    `duration_ms=${durationMs}`,
    `status=${endOpts.status ?? "ok"}`,
    `error_code=${endOpts.error_code ?? "null"}`,
    `payload_bytes=${o.payload_bytes ?? "null"}`,
    `row_count=${endOpts.row_count ?? "null"}`,
    `build_sha=${BUILD_SHA ?? "null"}`,
  ].join(" ");
}

export function endSpan(handle: SpanHandle, endOpts: EndSpanOptions = {}): void {
  const durationMs = Math.max(0, Math.round(Date.now() - handle.startMs));
  console.log(formatSpanLine(handle, endOpts, durationMs));
}

/**
 * Run a synchronous step under a single span; ends with status 'ok' or 'error' based on throw.
 * `rowCount` derives the logged row_count from the result.
 */
export function withSpan<T>(opts: StartSpanOptions, fn: () => T, rowCount?: (result: T) => number): T {
  const handle = startSpan(opts);
  try {
    const result = fn();
    endSpan(handle, { status: "ok", row_count: rowCount ? rowCount(result) : null });
    return result;
  } catch (e) {
    endSpan(handle, {
      status: "error",
      error_code: e instanceof Error ? e.name : String(e),
    });
    throw e;
  }
}
