/**
 * ecolang check - static validation command
 */
import { parse, validateProgram, formatDiagnostics, formatDiagnostic, makeError } from "@ecolang/core";
import { resolveConfig } from "./config.js";
import { readSource } from "./source.js";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const pretty = !!opts.pretty;
  const source = readSource(file);
  if (!source.ok) {
    console.error(formatDiagnostic(makeError("IO_ERROR", `Error reading file: ${source.message}`), pretty, file));
    return 4;
  }

  const { settings } = resolveConfig(opts.cwd, opts.homeDir);
  const parseResult = parse(source.text, { maxFuncParams: settings.max_func_params });
  if (parseResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty, file));
    return 2;
  }

  if (!parseResult.program) {
    console.error(formatDiagnostic(makeError("INTERNAL", "Parse produced no program."), pretty, file));
    return 2;
  }

  const validationDiags = validateProgram(parseResult.program);
  if (validationDiags.length > 0) {
    console.error(formatDiagnostics(validationDiags, pretty, file));
    return 2;
  }

  console.log(pretty ? "No errors found." : "[]");
  return 0;
}
