/**
 * ecolang trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  line: z.number().optional(),
  data: z.record(z.unknown()).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  skippedLines: number;
  statements: number;
  loops: number;
  functionCalls: number;
  functionsByName: Record<string, number>;
  sandboxRuns: number;
  budgetExceeded: number;
  error: string | null;
  totalOps?: number;
  durationMs?: number;
}

export function summarizeTrace(events: TraceLine[], skippedLines = 0): TraceSummary {
  const summary: TraceSummary = {
    runId: events[0]?.runId ?? "",
    totalEvents: events.length,
    skippedLines,
    statements: 0,
    loops: 0,
    functionCalls: 0,
    functionsByName: {},
    sandboxRuns: 0,
    budgetExceeded: 0,
    error: null,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "stmt_start":
        summary.statements++;
        break;
      case "loop_start":
        summary.loops++;
        break;
      case "fn_call_start": {
        summary.functionCalls++;
        const fn = ev.data?.["fn"];
        const name = typeof fn === "string" ? fn : "unknown";
        summary.functionsByName[name] = (summary.functionsByName[name] ?? 0) + 1;
        break;
      }
      case "sandbox_start":
        summary.sandboxRuns++;
        break;
      case "budget_exceeded":
        summary.budgetExceeded++;
        break;
      case "run_end": {
        const data: Record<string, unknown> = ev.data ?? {};
        const { durationMs, totalOps, error } = data;
        if (typeof durationMs === "number") summary.durationMs = durationMs;
        if (typeof totalOps === "number") summary.totalOps = totalOps;
        if (typeof error === "string") summary.error = error;
        break;
      }
    }
  }
  return summary;
}

export async function runTrace(
  file: string,
  opts: { json?: boolean }
): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let skipped = 0;

  for (const line of lines) {
    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch {
      skipped++;
      continue;
    }
    const parsed = traceLineSchema.safeParse(data);
    if (parsed.success) events.push(parsed.data);
    else skipped++;
  }

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary = summarizeTrace(events, skipped);

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(`Trace Summary`);
    console.log(`  Run ID:           ${summary.runId}`);
    console.log(`  Total events:     ${summary.totalEvents}`);
    if (summary.skippedLines > 0) {
      console.log(`  Skipped lines:    ${summary.skippedLines}`);
    }
    console.log(`  Statements:       ${summary.statements}`);
    console.log(`  Loops:            ${summary.loops}`);
    console.log(`  Function calls:   ${summary.functionCalls}`);
    for (const [name, count] of Object.entries(summary.functionsByName)) {
      console.log(`    ${name}: ${count}`);
    }
    console.log(`  Sandbox runs:     ${summary.sandboxRuns}`);
    console.log(`  Budget exceeded:  ${summary.budgetExceeded}`);
    if (summary.totalOps !== undefined) {
      console.log(`  Total ops:        ${summary.totalOps}`);
    }
    if (summary.durationMs !== undefined) {
      console.log(`  Duration:         ${summary.durationMs}ms`);
    }
    console.log(`  Error:            ${summary.error ?? "(none)"}`);
  }

  return 0;
}
