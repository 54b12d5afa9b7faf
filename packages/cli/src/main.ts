#!/usr/bin/env -S node --import tsx
/**
 * ecolang - EcoLang CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runTrace } from "./cmd-trace.js";
import { runSettings } from "./cmd-settings.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const program = new Command();

program
  .name("ecolang")
  .description("EcoLang: a sandboxed teaching language with energy accounting")
  .version(pkg.version);

program
  .command("check")
  .description("Static validation without execution")
  .argument("<file>", "EcoLang source file to check (or - for stdin)")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("run")
  .description("Run an EcoLang program")
  .argument("<file>", "EcoLang source file to run (or - for stdin)")
  .option("--input <name=value>", "Value returned by 'ask name' (repeatable)", collect, [])
  .option("--set <key=value>", "Override a run setting, clamped to the configured ceiling (repeatable)", collect, [])
  .option("--sandbox", "Run the program in the child-process sandbox", false)
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--json", "Print the whole run result as JSON", false)
  .option("--eco", "Print the energy estimate to stderr", false)
  .option("--pretty", "Human-readable error output", false)
  .action(
    async (
      file: string,
      opts: { input: string[]; set: string[]; sandbox?: boolean; trace?: string; json?: boolean; eco?: boolean; pretty?: boolean }
    ) => {
      const code = await runRun(file, opts);
      process.exit(code);
    }
  );

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("settings")
  .description("Display effective run settings and resolution source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runSettings(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["check", "run", "trace", "settings", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
