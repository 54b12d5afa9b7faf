/**
 * Runs EcoLang sandbox programs in a short-lived child process.
 */
import { spawn } from "node:child_process";
import { fileURLToPath } from "node:url";
import type { SandboxLimits, SandboxOutcome, SandboxRunner } from "@ecolang/core";
import { decodeResponse, encodeRequest } from "./protocol.js";

export interface Command {
  file: string;
  args: string[];
}

export interface ProcessSandboxOptions {
  // CPU seconds for the child (POSIX only)
  cpuSeconds?: number;
  // V8 old-space ceiling passed to the worker
  memoryLimitMb?: number;
  maxReplyBytes?: number;
  // Replaces the worker command; used to point at another program
  command?: Command;
  // Wrap the command in `ulimit`; off on Windows
  applyLimits?: boolean;
}

const DEFAULT_CPU_SECONDS = 2;
const DEFAULT_MEMORY_MB = 200;
const DEFAULT_MAX_REPLY_BYTES = 1_000_000;

/** Node command running worker.ts through tsx, or the built worker.js. */
export function workerCommand(memoryLimitMb: number = DEFAULT_MEMORY_MB): Command {
  const here = import.meta.url;
  const fromSource = here.endsWith(".ts");
  const worker = fileURLToPath(new URL(fromSource ? "./worker.ts" : "./worker.js", here));
  const args = [`--max-old-space-size=${memoryLimitMb}`];
  if (fromSource) args.push("--import", import.meta.resolve("tsx"));
  args.push(worker);
  return { file: process.execPath, args };
}

/** Prefix a command with `ulimit -t` through /bin/sh. */
export function withCpuLimit(command: Command, cpuSeconds: number): Command {
  return {
    file: "/bin/sh",
    args: [
      "-c",
      'ulimit -t "$1"; shift; exec "$@"',
      "ecolang-sandbox",
      String(cpuSeconds),
      command.file,
      ...command.args,
    ],
  };
}

export class ProcessSandbox implements SandboxRunner {
  private readonly command: Command;
  private readonly maxReplyBytes: number;

  constructor(options: ProcessSandboxOptions = {}) {
    const base = options.command ?? workerCommand(options.memoryLimitMb ?? DEFAULT_MEMORY_MB);
    const applyLimits = options.applyLimits ?? process.platform !== "win32";
    this.command = applyLimits
      ? withCpuLimit(base, options.cpuSeconds ?? DEFAULT_CPU_SECONDS)
      : base;
    this.maxReplyBytes = options.maxReplyBytes ?? DEFAULT_MAX_REPLY_BYTES;
  }

  run(code: string, limits: SandboxLimits): Promise<SandboxOutcome> {
    return new Promise((resolve) => {
      let settled = false;
      let stdout = "";
      let stderr = "";

      const child = spawn(this.command.file, this.command.args, {
        env: { PATH: process.env["PATH"] ?? "" },
      });

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish({ kind: "timeout" });
      }, limits.timeoutMs);

      function finish(outcome: SandboxOutcome): void {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      }

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
        if (stdout.length > this.maxReplyBytes) {
          child.kill("SIGKILL");
          finish({ kind: "failed", reason: "Sandbox reply too large", exitCode: null, stderr });
        }
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });
      // the child may exit before reading its input
      child.stdin.on("error", (err: Error) => {
        stderr += `stdin: ${err.message}\n`;
      });

      child.on("error", (err: Error) => {
        finish({ kind: "spawn_error", message: err.message });
      });

      child.on("close", (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (exitCode !== 0) {
          finish({
            kind: "failed",
            reason: `Sandbox exited with ${exitCode ?? signal ?? "unknown status"}`,
            exitCode,
            stderr,
          });
          return;
        }
        const response = decodeResponse(stdout);
        if (!response) {
          finish({ kind: "failed", reason: "Malformed sandbox response", exitCode, stderr });
          return;
        }
        finish({ kind: "completed", result: response.result, error: response.error });
      });

      child.stdin.end(encodeRequest(code));
    });
  }
}
