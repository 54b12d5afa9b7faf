/**
 * Contract between the runtime and an out-of-process sandbox. The
 * implementation lives in @ecolang/sandbox and is injected through
 * ExecOptions.sandbox.
 */
import type { Value } from "./values.js";

export interface SandboxLimits {
  timeoutMs: number;
}

export type SandboxOutcome =
  // the worker answered; `error` is set when it rejected or failed the program
  | { kind: "completed"; result: Value; error: string | null }
  | { kind: "timeout" }
  // non-zero exit or a reply that is not the expected JSON
  | { kind: "failed"; reason: string; exitCode: number | null; stderr: string }
  | { kind: "spawn_error"; message: string };

export interface SandboxRunner {
  run(code: string, limits: SandboxLimits): Promise<SandboxOutcome>;
}
