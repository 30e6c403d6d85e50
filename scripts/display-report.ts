#!/usr/bin/env tsx
/**
 * Display program checker: reconcile monthly snapshots from disk and write the region workbooks.
 *
 * Run: npm run report -- --region HCME --mode marketing --out ./out data/*.xlsx
 * Optional: DISPLAY_CONFIG_PATH in env (or .env) to use another program table file.
 */

import "dotenv/config";
import { Command } from "commander";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { ZodError } from "zod";
import { loadDisplayConfigFile, resolveDisplayConfig } from "../web/lib/displayConfig";
import { runDisplayReport, type Upload } from "../web/lib/displayReport";
import { buildRegionWorkbooks } from "../web/lib/reportWorkbook";
import { DisplayReportOptionsSchema, audienceMode, outcomeFilter, splitList } from "../web/lib/validation";

const EXIT_INVALID_INPUT = 2;

type CliOptions = {
  region: string[];
  mode: string;
  outcome: string[];
  route: string[];
  config?: string;
  out: string;
};

const program = new Command();

program
  .name("display-report")
  .description("Reconcile display-program snapshots and write per-region result workbooks")
  .argument("<files...>", "Period snapshot workbooks (.xls/.xlsx), at least two per program")
  .requiredOption("--region <key...>", "Region keys from the config (e.g. HCME TOAN_QUOC)")
  .option("--mode <mode>", "marketing | field_sales", "marketing")
  .option("--outcome <outcome...>", "all | pass | fail | not_evaluated | withdrawn", [])
  .option("--route <token...>", "Keep rows whose sales day contains one of these tokens", [])
  .option("--config <path>", "Program table JSON (overrides DISPLAY_CONFIG_PATH)")
  .option("--out <dir>", "Output directory", ".")
  .action(async (files: string[], options: CliOptions) => {
    const parsed = DisplayReportOptionsSchema.safeParse({
      regions: splitList(options.region),
      mode: options.mode,
      outcomes: splitList(options.outcome),
      routes: splitList(options.route),
    });
    if (!parsed.success) {
      for (const issue of parsed.error.issues) console.error(`Invalid option ${issue.path.join(".")}: ${issue.message}`);
      process.exitCode = EXIT_INVALID_INPUT;
      return;
    }

    const config = options.config ? await loadDisplayConfigFile(options.config) : await resolveDisplayConfig();
    const uploads: Upload[] = await Promise.all(
      files.map(async (f) => ({ fileName: basename(f), data: await readFile(resolve(f)) }))
    );

    const mode = audienceMode(parsed.data.mode);
    const result = runDisplayReport(
      {
        uploads,
        regions: parsed.data.regions,
        mode,
        filters: { outcomes: outcomeFilter(parsed.data.outcomes), routeTokens: parsed.data.routes },
      },
      config
    );

    const outDir = resolve(options.out);
    await mkdir(outDir, { recursive: true });
    let written = 0;
    for (const region of result.regions) {
      for (const wb of buildRegionWorkbooks(region, mode)) {
        await writeFile(resolve(outDir, wb.name), wb.data);
        console.log(`✅ ${wb.name}`);
        written++;
      }
    }

    const errors = result.diagnostics.filter((d) => d.level === "error");
    console.log(`Done: ${written} workbook(s), ${errors.length} error(s), run_id=${result.runId}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ZodError || err instanceof SyntaxError) {
    console.error("Invalid config file:", err.message);
    process.exitCode = EXIT_INVALID_INPUT;
    return;
  }
  console.error("❌ display-report failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
