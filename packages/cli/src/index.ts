/**
 * @ecolang/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runRun, exitCodeFor } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export type { TraceSummary } from "./cmd-trace.js";
export { runSettings } from "./cmd-settings.js";
export {
  resolveConfig,
  parseInputs,
  parseOverrides,
  parseLiteral,
  effectiveSettings,
  CliUsageError,
} from "./config.js";
export type { ResolvedConfig } from "./config.js";
