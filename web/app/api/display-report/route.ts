import { NextResponse } from "next/server";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import { defaultDisplayConfig, mergeConfigOverrides, type DisplayConfig } from "../../../lib/displayConfig";
import { runDisplayReport, type Upload } from "../../../lib/displayReport";
import { startSpan, endSpan } from "../../../lib/perf";
import { buildRegionWorkbooks } from "../../../lib/reportWorkbook";
import { DisplayReportOptionsSchema, audienceMode, outcomeFilter, splitList } from "../../../lib/validation";

export const runtime = "nodejs";

const MAX_FILES = 60;

async function readUploads(form: FormData): Promise<Upload[]> {
  const uploads: Upload[] = [];
  for (const entry of form.getAll("files")) {
    if (typeof entry === "string") continue;
    uploads.push({ fileName: entry.name || `upload-${uploads.length + 1}.xlsx`, data: Buffer.from(await entry.arrayBuffer()) });
  }
  return uploads;
}

export async function POST(req: Request) {
  const callId = randomUUID();
  const span = startSpan({ workflow: "display_report", stage: "request_total", run_id: callId });
  try {
    const contentType = String(req.headers.get("content-type") || "");
    if (!contentType.includes("multipart/form-data")) {
      endSpan(span, { status: "error", error_code: "bad_content_type" });
      return NextResponse.json({ ok: false, error: "Expected multipart/form-data" }, { status: 400 });
    }

    const form = await req.formData();
    const uploads = await readUploads(form);
    if (!uploads.length) {
      endSpan(span, { status: "error", error_code: "missing_files" });
      return NextResponse.json({ ok: false, error: "Missing files" }, { status: 400 });
    }
    if (uploads.length > MAX_FILES) {
      endSpan(span, { status: "error", error_code: "too_many_files" });
      return NextResponse.json({ ok: false, error: `Too many files (max ${MAX_FILES})` }, { status: 400 });
    }

    const configText = form.get("config");
    const parsed = DisplayReportOptionsSchema.safeParse({
      regions: splitList(form.getAll("regions")),
      mode: String(form.get("mode") || "").trim() || undefined,
      outcomes: splitList(form.getAll("outcomes")),
      routes: splitList(form.getAll("routes")),
      config: typeof configText === "string" ? configText : undefined,
    });
    if (!parsed.success) {
      endSpan(span, { status: "error", error_code: "invalid_request" });
      return NextResponse.json(
        { ok: false, error: "Invalid request", issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
        { status: 400 }
      );
    }

    const opts = parsed.data;
    let config: DisplayConfig;
    try {
      config = mergeConfigOverrides(defaultDisplayConfig(), opts.config);
    } catch (e) {
      const message = e instanceof ZodError ? "Config override does not match the expected tables" : "Config override is not valid JSON";
      endSpan(span, { status: "error", error_code: "invalid_config" });
      return NextResponse.json({ ok: false, error: message }, { status: 400 });
    }

    const mode = audienceMode(opts.mode);
    const result = runDisplayReport(
      {
        uploads,
        regions: opts.regions,
        mode,
        filters: { outcomes: outcomeFilter(opts.outcomes), routeTokens: opts.routes },
        runId: callId,
      },
      config
    );
    const files = result.regions.flatMap((r) => buildRegionWorkbooks(r, mode));

    endSpan(span, { status: "ok", row_count: files.length });
    return NextResponse.json({
      ok: true,
      runId: result.runId,
      files: files.map((f) => ({ name: f.name, base64: f.data.toString("base64") })),
      diagnostics: result.diagnostics,
    });
  } catch (e) {
    endSpan(span, { status: "error", error_code: e instanceof Error ? e.name : "unknown" });
    console.error("❌ /api/display-report error:", e instanceof Error ? e.message : e);
    return NextResponse.json({ ok: false, error: e instanceof Error ? e.message : String(e) }, { status: 500 });
  }
}
