/**
 * Restricted program runner used inside the sandbox worker.
 *
 * A program is a list of `name = <expr>` lines and bare expressions. Every
 * line is parsed first, then validated with the sandbox profile (no calls),
 * and only then evaluated. The value bound to `result` is returned.
 */
import {
  DANGEROUS_NAMES,
  RESERVED_NAMES,
  SANDBOX_PROFILE,
  evalExpr,
  parseExpression,
  validateExpression,
  type Expr,
  type Scope,
  type Value,
} from "@ecolang/core";
import type { SandboxResponse } from "./protocol.js";

// Statement forms refused outright, keyed by their first word
const FORBIDDEN_STATEMENTS: ReadonlyMap<string, string> = new Map([
  ["import", "Import"],
  ["from", "ImportFrom"],
  ["def", "FunctionDef"],
  ["class", "ClassDef"],
]);

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)\s*=(?!=)(.*)$/;

type ProgramLine =
  | { kind: "forbidden"; node: string }
  | { kind: "expr"; target: string | null; expr: Expr };

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function fail(error: string): SandboxResponse {
  return { result: null, error };
}

export function safeExec(code: string): SandboxResponse {
  const program: ProgramLine[] = [];

  for (const raw of code.split(/\r\n|\r|\n/)) {
    const text = raw.trim();
    if (text === "" || text.startsWith("#")) continue;
    const node = FORBIDDEN_STATEMENTS.get(text.split(/\s+/, 1)[0] ?? "");
    if (node !== undefined) {
      program.push({ kind: "forbidden", node });
      continue;
    }
    const assignment = ASSIGNMENT.exec(text);
    try {
      program.push(
        assignment
          ? { kind: "expr", target: assignment[1] ?? null, expr: parseExpression((assignment[2] ?? "").trim()) }
          : { kind: "expr", target: null, expr: parseExpression(text) }
      );
    } catch (e) {
      return fail(`parse_error: ${messageOf(e)}`);
    }
  }

  for (const line of program) {
    if (line.kind === "forbidden") return fail(`${line.node} not allowed`);
    if (line.target !== null && (DANGEROUS_NAMES.has(line.target) || RESERVED_NAMES.has(line.target))) {
      return fail(SANDBOX_PROFILE.rejectName(line.target));
    }
    try {
      validateExpression(line.expr, SANDBOX_PROFILE);
    } catch (e) {
      return fail(messageOf(e));
    }
  }

  const bindings = new Map<string, Value>();
  const scope: Scope = {
    lookup: (name) => bindings.get(name),
    ecoOps: () => 0,
  };
  try {
    for (const line of program) {
      if (line.kind !== "expr") continue;
      const value = evalExpr(line.expr, scope);
      if (line.target !== null) bindings.set(line.target, value);
    }
  } catch (e) {
    return fail(`error: ${messageOf(e)}`);
  }
  return { result: bindings.get("result") ?? null, error: null };
}
