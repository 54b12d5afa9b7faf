/**
 * Settings file loading and command-line overrides for the ecolang CLI.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  DEFAULT_SETTINGS,
  clampSettings,
  isValue,
  runSettingsSchema,
  type FullSettings,
  type RunSettings,
  type Value,
} from "@ecolang/core";
import type { ZodError } from "zod";

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface ResolvedConfig {
  // ceilings every run is clamped to
  settings: FullSettings;
  source: "project" | "user" | "default";
  path: string | null;
  skipped: SkippedFile[];
}

/** Bad `--set` or `--input` argument. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid value";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

type LoadResult = { ok: true; settings: RunSettings } | { ok: false; reason: string } | null;

function tryLoadSettingsFile(filePath: string): LoadResult {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
  const parsed = runSettingsSchema.safeParse(data);
  if (!parsed.success) return { ok: false, reason: describeIssue(parsed.error) };
  return { ok: true, settings: parsed.data };
}

/**
 * Load run ceilings from project or user config.
 * Precedence: ./.ecolangrc.json > ~/.ecolang/settings.json > built-in defaults.
 * A file that fails to load is skipped and reported.
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const candidates: Array<[ResolvedConfig["source"], string]> = [
    ["project", path.join(cwd ?? process.cwd(), ".ecolangrc.json")],
    ["user", path.join(homeDir ?? os.homedir(), ".ecolang", "settings.json")],
  ];
  const skipped: SkippedFile[] = [];

  for (const [source, filePath] of candidates) {
    const loaded = tryLoadSettingsFile(filePath);
    if (loaded === null) continue;
    if (!loaded.ok) {
      skipped.push({ path: filePath, reason: loaded.reason });
      continue;
    }
    return {
      settings: { ...DEFAULT_SETTINGS, ...loaded.settings },
      source,
      path: filePath,
      skipped,
    };
  }

  return { settings: { ...DEFAULT_SETTINGS }, source: "default", path: null, skipped };
}

/** JSON when the text is a JSON value EcoLang can hold, the raw text otherwise. */
export function parseLiteral(text: string): Value {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return text;
  }
  return isValue(data) ? data : text;
}

function splitAssignment(pair: string, flag: string): [string, string] {
  const eq = pair.indexOf("=");
  if (eq <= 0) throw new CliUsageError(`${flag} expects name=value, got '${pair}'`);
  return [pair.slice(0, eq).trim(), pair.slice(eq + 1)];
}

export function parseInputs(pairs: readonly string[]): Record<string, Value> {
  const inputs: Record<string, Value> = {};
  for (const pair of pairs) {
    const [name, text] = splitAssignment(pair, "--input");
    inputs[name] = parseLiteral(text);
  }
  return inputs;
}

export function parseOverrides(pairs: readonly string[]): RunSettings {
  const raw: Record<string, Value> = {};
  for (const pair of pairs) {
    const [key, text] = splitAssignment(pair, "--set");
    if (!Object.hasOwn(runSettingsSchema.shape, key)) {
      throw new CliUsageError(`Unknown setting '${key}'`);
    }
    raw[key] = parseLiteral(text);
  }
  const parsed = runSettingsSchema.safeParse(raw);
  if (!parsed.success) throw new CliUsageError(`Invalid --set: ${describeIssue(parsed.error)}`);
  return parsed.data;
}

/** Overrides clamped to the config ceilings; `sandbox` forces the subprocess path. */
export function effectiveSettings(
  config: ResolvedConfig,
  overrides: RunSettings,
  sandbox: boolean
): RunSettings {
  const settings = clampSettings(overrides, config.settings);
  if (sandbox) settings.use_subprocess = true;
  return settings;
}
