/**
 * ecolang run - execute EcoLang programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  BUDGET_CODES,
  execute,
  formatDiagnostic,
  makeError,
  type ErrorCode,
  type RunError,
  type RunSettings,
  type SandboxRunner,
  type TraceEvent,
  type Value,
} from "@ecolang/core";
import { ProcessSandbox } from "@ecolang/sandbox";
import {
  CliUsageError,
  effectiveSettings,
  parseInputs,
  parseOverrides,
  resolveConfig,
} from "./config.js";
import { readSource } from "./source.js";

export interface RunOptions {
  input?: string[];
  set?: string[];
  sandbox?: boolean;
  trace?: string;
  json?: boolean;
  pretty?: boolean;
  eco?: boolean;
  cwd?: string;
  homeDir?: string;
  // replaces the child-process runner
  runner?: SandboxRunner;
}

export function exitCodeFor(code: ErrorCode): number {
  if (code === "SYNTAX_ERROR" || code === "CONFIG_ERROR") return 2;
  if (BUDGET_CODES.has(code)) return 5;
  return 4;
}

/** JSONL trace sink; keeps the first write failure instead of throwing into the run. */
class TraceWriter {
  error: string | null = null;

  constructor(private readonly fd: number) {}

  write = (event: TraceEvent): void => {
    if (this.error !== null) return;
    try {
      fs.writeSync(this.fd, JSON.stringify(event) + "\n");
    } catch (e) {
      this.error = `Error writing trace file: ${e instanceof Error ? e.message : String(e)}`;
    }
  };

  close(): void {
    try {
      fs.closeSync(this.fd);
    } catch (e) {
      this.error ??= `Error closing trace file: ${e instanceof Error ? e.message : String(e)}`;
    }
  }
}

export async function runRun(file: string, opts: RunOptions = {}): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (err: RunError): void => {
    console.error(formatDiagnostic(err, pretty, file));
  };

  const source = readSource(file);
  if (!source.ok) {
    emitCliError(makeError("IO_ERROR", `Error reading file: ${source.message}`));
    return 4;
  }

  let settings: RunSettings;
  let inputs: Record<string, Value>;
  try {
    const config = resolveConfig(opts.cwd, opts.homeDir);
    for (const skipped of config.skipped) {
      console.error(`warning: ignored settings file ${skipped.path}: ${skipped.reason}`);
    }
    settings = effectiveSettings(config, parseOverrides(opts.set ?? []), !!opts.sandbox);
    inputs = parseInputs(opts.input ?? []);
  } catch (e) {
    if (e instanceof CliUsageError) {
      emitCliError(makeError("CONFIG_ERROR", e.message));
      return 2;
    }
    throw e;
  }

  let writer: TraceWriter | null = null;
  if (opts.trace) {
    try {
      writer = new TraceWriter(fs.openSync(opts.trace, "w"));
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError(makeError("IO_ERROR", `Error opening trace file: ${msg}`));
      return 4;
    }
  }

  let code: number;
  try {
    const result = await execute(source.text, inputs, settings, {
      sandbox: settings.use_subprocess ? opts.runner ?? new ProcessSandbox() : undefined,
      trace: writer?.write,
      runId: crypto.randomUUID(),
    });

    if (opts.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      for (const line of result.output) console.log(line);
      for (const warning of result.warnings) console.error(`warning: ${warning}`);
      if (result.error) emitCliError(result.error);
      if (opts.eco && result.eco) {
        const { totalOps, energyJ, co2G } = result.eco;
        console.error(`eco: ${totalOps} ops, ${energyJ.toExponential(2)} J, ${co2G.toExponential(2)} g CO2`);
      }
    }
    code = result.error ? exitCodeFor(result.error.code) : 0;
  } finally {
    writer?.close();
  }

  if (writer?.error) {
    emitCliError(makeError("IO_ERROR", writer.error));
    return 4;
  }
  return code;
}
