import { readFile } from "node:fs/promises";
import { z } from "zod";
import defaultConfigJson from "../config/display-programs.json";

/**
 * Program tables for the display checker. Built once per process and frozen;
 * every core function takes it as an explicit argument.
 */

const zAmount = z.coerce.number().finite().nonnegative();

export const DisplayConfigSchema = z.object({
  baseMinimums: z.record(z.string().min(1), zAmount),
  programNames: z.record(z.string().min(1), z.string()),
  regions: z.record(z.string().min(1), z.union([z.literal("ALL"), z.array(z.string())])),
  levelAliases: z.record(z.string().min(1), z.string().min(1)),
});

export type DisplayConfig = Readonly<{
  baseMinimums: Readonly<Record<string, number>>;
  programNames: Readonly<Record<string, string>>;
  regions: Readonly<Record<string, "ALL" | readonly string[]>>;
  levelAliases: Readonly<Record<string, string>>;
}>;

const TABLE_KEYS = ["baseMinimums", "programNames", "regions", "levelAliases"] as const;

function freezeConfig(parsed: z.infer<typeof DisplayConfigSchema>): DisplayConfig {
  const regions: Record<string, "ALL" | readonly string[]> = {};
  for (const [k, v] of Object.entries(parsed.regions)) {
    regions[k] = v === "ALL" ? "ALL" : Object.freeze(v.map((s) => s.trim()));
  }
  return Object.freeze({
    baseMinimums: Object.freeze({ ...parsed.baseMinimums }),
    programNames: Object.freeze({ ...parsed.programNames }),
    regions: Object.freeze(regions),
    levelAliases: Object.freeze({ ...parsed.levelAliases }),
  });
}

export function parseDisplayConfig(raw: unknown): DisplayConfig {
  return freezeConfig(DisplayConfigSchema.parse(raw));
}

export function defaultDisplayConfig(): DisplayConfig {
  return parseDisplayConfig(defaultConfigJson);
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v != null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Apply a JSON override text on top of a config. Each top-level table present as an
 * object replaces the base table wholesale; anything else in the override is ignored.
 * Blank text returns the base config. Malformed JSON throws.
 */
export function mergeConfigOverrides(base: DisplayConfig, overridesText: string | null | undefined): DisplayConfig {
  const t = String(overridesText ?? "").trim();
  if (!t) return base;
  const parsed: unknown = JSON.parse(t);
  if (!isPlainObject(parsed)) throw new Error("Config override must be a JSON object");

  const merged: Record<string, unknown> = { ...base };
  for (const key of TABLE_KEYS) {
    const v = parsed[key];
    if (isPlainObject(v)) merged[key] = v;
  }
  return parseDisplayConfig(merged);
}

export async function loadDisplayConfigFile(path: string): Promise<DisplayConfig> {
  const text = await readFile(path, "utf8");
  return parseDisplayConfig(JSON.parse(text));
}

/** Config for a process: DISPLAY_CONFIG_PATH when set, else the bundled defaults. */
export async function resolveDisplayConfig(env: NodeJS.ProcessEnv = process.env): Promise<DisplayConfig> {
  const path = String(env.DISPLAY_CONFIG_PATH || "").trim();
  if (!path) return defaultDisplayConfig();
  return loadDisplayConfigFile(path);
}

/** Canonical program code for a declared registration level. */
export function canonicalProgramCode(config: DisplayConfig, levelCode: string): string {
  const level = String(levelCode || "").trim();
  return config.levelAliases[level] ?? level;
}

/** Base minimum sales per display slot for a level; 0 when the level resolves to no known program. */
export function baseMinimumForLevel(config: DisplayConfig, levelCode: string): number {
  return config.baseMinimums[canonicalProgramCode(config, levelCode)] ?? 0;
}

export function programDisplayName(config: DisplayConfig, programCode: string): string {
  return config.programNames[programCode] ?? programCode;
}

export function isKnownProgram(config: DisplayConfig, programCode: string): boolean {
  return Object.prototype.hasOwnProperty.call(config.baseMinimums, programCode);
}
