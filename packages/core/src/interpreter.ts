/**
 * EcoLang statement dispatcher and the public `execute` entry point.
 */
import { randomUUID } from "node:crypto";
import type * as AST from "./ast.js";
import {
  EcoRuntimeError,
  ExpressionError,
  makeError,
  type Position,
  type RunError,
} from "./diagnostics.js";
import {
  HIGH_USE_THRESHOLD,
  HIGH_USE_WARNING,
  OpCounter,
  computeEco,
  pickEcoTip,
  savePowerScale,
  type EcoStats,
  type OpCategory,
} from "./eco.js";
import { evaluate, type EvalStats } from "./evaluator.js";
import { Frame, FrameStack } from "./frames.js";
import { FunctionRegistry } from "./functions.js";
import { Governor, type LoopKind } from "./governor.js";
import type { SandboxRunner } from "./sandbox.js";
import { resolveSettings, type ResolvedSettings } from "./settings.js";
import { parse } from "./statements.js";
import { isTruthy, stringify, type Value } from "./values.js";

// --- Trace ---
export type TraceEventType =
  | "run_start"
  | "run_end"
  | "stmt_start"
  | "stmt_end"
  | "loop_start"
  | "loop_end"
  | "fn_call_start"
  | "fn_call_end"
  | "budget_exceeded"
  | "sandbox_start"
  | "sandbox_end";

export type TraceData = Record<string, Value>;

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  line?: number;
  data?: TraceData;
}

type Emit = (event: TraceEventType, line?: number, data?: TraceData) => void;

// --- Execution context ---
export interface ExecOptions {
  sandbox?: SandboxRunner;
  trace?: (event: TraceEvent) => void;
  runId?: string;
  // milliseconds; Date.now by default
  clock?: () => number;
}

export type Inputs = Readonly<Record<string, Value>>;

export interface RunResult {
  output: string[];
  warnings: string[];
  error: RunError | null;
  eco: EcoStats | null;
}

type Completion = { kind: "normal" } | { kind: "return"; value: Value };

const NORMAL: Completion = { kind: "normal" };

function firstColumn(span: AST.Span): number {
  return span.text.length - span.text.trimStart().length + 1;
}

function positionOf(span: AST.Span): Position {
  return { line: span.line, column: firstColumn(span), lineText: span.text };
}

class Interpreter {
  readonly counter = new OpCounter();
  readonly governor: Governor;
  readonly frames: FrameStack;
  readonly functions: FunctionRegistry;

  constructor(
    settings: Readonly<ResolvedSettings>,
    private readonly inputs: Inputs,
    private readonly emit: Emit,
    clock: () => number
  ) {
    this.governor = new Governor(settings.limits, this.counter, clock, (e) =>
      emit("budget_exceeded", undefined, { budget: e.budget, limit: e.limit, actual: e.actual })
    );
    this.frames = new FrameStack(new Frame(this.counter));
    this.functions = new FunctionRegistry(settings.limits);
  }

  run(program: AST.Program): void {
    this.execBlock(program.statements);
  }

  private get frame(): Frame {
    return this.frames.current;
  }

  private charge(category: OpCategory, times = 1): void {
    this.counter.charge(category, this.frame.opsScale, times);
  }

  private execBlock(stmts: AST.Stmt[]): Completion {
    for (const stmt of stmts) {
      const completion = this.execStmt(stmt);
      if (completion.kind === "return") return completion;
    }
    return NORMAL;
  }

  private execStmt(stmt: AST.Stmt): Completion {
    try {
      this.governor.beforeStatement();
      this.emit("stmt_start", stmt.span.line, { kind: stmt.kind });
      this.charge("other");
      const completion = this.dispatch(stmt);
      this.emit("stmt_end", stmt.span.line, { kind: stmt.kind });
      return completion;
    } catch (e) {
      // innermost statement keeps its position
      if (e instanceof EcoRuntimeError) throw e.positioned(positionOf(stmt.span));
      // raised while rendering a value for output
      if (e instanceof ExpressionError) {
        throw new EcoRuntimeError("RUNTIME_ERROR", e.message, positionOf(stmt.span));
      }
      throw e;
    }
  }

  /** Evaluate an expression slot against the current frame and charge its math ops. */
  private eval(slot: AST.ExprSource, at?: AST.Span): Value {
    const stats: EvalStats = { arithmeticOps: 0 };
    try {
      return evaluate(slot.text, this.frame, stats);
    } catch (e) {
      if (e instanceof ExpressionError) {
        const position: Position = { column: slot.col + (e.column ?? 1) - 1 };
        if (at) Object.assign(position, { line: at.line, lineText: at.text });
        throw new EcoRuntimeError("RUNTIME_ERROR", e.message, position);
      }
      throw e;
    } finally {
      if (stats.arithmeticOps > 0) this.charge("math", stats.arithmeticOps);
    }
  }

  private dispatch(stmt: AST.Stmt): Completion {
    switch (stmt.kind) {
      case "Say": {
        const v = this.eval(stmt.expr);
        this.charge("print");
        this.governor.appendOutput(stringify(v));
        return NORMAL;
      }

      case "Let": {
        const v = this.eval(stmt.expr);
        this.frame.assign(stmt.name, v);
        this.charge("assign");
        return NORMAL;
      }

      case "Const": {
        const v = this.eval(stmt.expr);
        this.frame.defineConst(stmt.name, v);
        this.charge("assign");
        return NORMAL;
      }

      case "Ask": {
        const v = Object.hasOwn(this.inputs, stmt.name) ? this.inputs[stmt.name] : undefined;
        if (v === undefined) {
          throw new EcoRuntimeError(
            "RUNTIME_ERROR",
            `Missing input for '${stmt.name}'`,
            {},
            `Provide '${stmt.name}' in the run inputs.`
          );
        }
        this.frame.assign(stmt.name, v);
        this.charge("io");
        return NORMAL;
      }

      case "Warn": {
        const v = this.eval(stmt.expr);
        this.governor.warn(stringify(v));
        this.charge("other");
        return NORMAL;
      }

      case "EcoTip": {
        this.governor.appendOutput(`ecoTip: ${pickEcoTip(this.counter.total)}`);
        this.charge("other");
        return NORMAL;
      }

      case "SavePower":
        this.frame.opsScale = savePowerScale(stmt.level);
        this.governor.warn(`savePower applied: level ${stmt.level}`);
        return NORMAL;

      case "Func":
        this.functions.define({
          name: stmt.name,
          params: stmt.params,
          body: stmt.body,
          line: stmt.span.line,
        });
        this.governor.warn(`func defined: ${stmt.name}`);
        return NORMAL;

      case "Call":
        return this.execCall(stmt);

      case "Return":
        return { kind: "return", value: stmt.expr ? this.eval(stmt.expr) : null };

      case "If": {
        for (const branch of stmt.branches) {
          if (isTruthy(this.eval(branch.cond, branch.span))) {
            return this.execBlock(branch.body);
          }
        }
        return stmt.orElse ? this.execBlock(stmt.orElse) : NORMAL;
      }

      case "While":
        return this.loop("while", stmt.span, (guard) => {
          let iterations = 0;
          while (isTruthy(this.eval(stmt.cond))) {
            if (!guard(iterations)) break;
            iterations++;
            const c = this.execBlock(stmt.body);
            if (c.kind === "return") return { completion: c, iterations };
          }
          return { completion: NORMAL, iterations };
        });

      case "For":
        return this.execFor(stmt);

      case "Repeat": {
        const raw = this.eval(stmt.count);
        if (typeof raw !== "number") {
          throw new EcoRuntimeError("RUNTIME_ERROR", "Repeat count must be a number");
        }
        const count = this.governor.capRepeat(Math.trunc(raw));
        return this.loop("repeat", stmt.span, (guard) => {
          let iterations = 0;
          while (iterations < count) {
            if (!guard(iterations)) break;
            iterations++;
            const c = this.execBlock(stmt.body);
            if (c.kind === "return") return { completion: c, iterations };
          }
          return { completion: NORMAL, iterations };
        });
      }
    }
  }

  /**
   * Shared loop frame: trace events around the loop, and a guard that runs
   * the governor's iteration checkpoint and charges the loop check.
   */
  private loop(
    kind: LoopKind,
    span: AST.Span,
    body: (guard: (iterations: number) => boolean) => { completion: Completion; iterations: number }
  ): Completion {
    this.emit("loop_start", span.line, { loop: kind });
    let iterations = 0;
    try {
      const result = body((n) => {
        if (!this.governor.allowIteration(kind, n)) return false;
        this.charge("loop_check");
        return true;
      });
      iterations = result.iterations;
      return result.completion;
    } finally {
      this.emit("loop_end", span.line, { loop: kind, iterations });
    }
  }

  private execFor(stmt: AST.ForStmt): Completion {
    const start = this.numeric(this.eval(stmt.start));
    const end = this.numeric(this.eval(stmt.end));
    const step = stmt.step ? this.numeric(this.eval(stmt.step)) : start <= end ? 1 : -1;
    if (step === 0) {
      throw new EcoRuntimeError("RUNTIME_ERROR", "for step cannot be 0");
    }
    return this.loop("for", stmt.span, (guard) => {
      let iterations = 0;
      for (let cur = start; step > 0 ? cur <= end : cur >= end; cur += step) {
        if (!guard(iterations)) break;
        iterations++;
        const snapped = Math.abs(cur - Math.round(cur)) < 1e-9 ? Math.round(cur) : cur;
        this.frame.assign(stmt.variable, snapped);
        const c = this.execBlock(stmt.body);
        if (c.kind === "return") return { completion: c, iterations };
      }
      return { completion: NORMAL, iterations };
    });
  }

  private numeric(v: Value): number {
    if (typeof v !== "number") {
      throw new EcoRuntimeError("RUNTIME_ERROR", "Invalid numeric values in for");
    }
    return v;
  }

  private execCall(stmt: AST.CallStmt): Completion {
    const def = this.functions.lookup(stmt.name, stmt.args.length);
    const args = stmt.args.map((a) => this.eval(a));
    const caller = this.frame;

    const value = this.functions.withCall((): Value => {
      const depth = this.functions.callDepth;
      this.emit("fn_call_start", stmt.span.line, { fn: def.name, depth });
      const callee = new Frame(this.counter, caller.opsScale);
      def.params.forEach((p, i) => callee.assign(p, args[i] ?? null));
      this.frames.push(callee);
      try {
        const c = this.execBlock(def.body);
        return c.kind === "return" ? c.value : null;
      } catch (e) {
        // host stack ran out before max_call_depth
        if (e instanceof RangeError) {
          throw new EcoRuntimeError("RUNTIME_ERROR", "Call depth limit exceeded");
        }
        throw e;
      } finally {
        this.frames.pop();
        this.emit("fn_call_end", stmt.span.line, { fn: def.name, depth });
      }
    });

    this.charge("func_call");
    if (stmt.into !== null) {
      caller.assign(stmt.into, value);
    } else if (value !== null) {
      this.governor.appendOutput(stringify(value));
    }
    return NORMAL;
  }
}

function toRunError(e: unknown): RunError {
  if (e instanceof EcoRuntimeError) return e.toRunError();
  if (e instanceof ExpressionError) return makeError("RUNTIME_ERROR", e.message);
  return makeError("INTERNAL", e instanceof Error ? e.message : String(e));
}

function makeEmitter(runId: string, sink?: (event: TraceEvent) => void): Emit {
  return (event, line, data) => {
    if (!sink) return;
    const ev: TraceEvent = { ts: new Date().toISOString(), runId, event };
    if (line !== undefined) ev.line = line;
    if (data !== undefined) ev.data = data;
    sink(ev);
  };
}

function failure(error: RunError, output: string[] = [], warnings: string[] = []): RunResult {
  return { output, warnings, error, eco: null };
}

async function runInSandbox(
  source: string,
  settings: Readonly<ResolvedSettings>,
  options: ExecOptions,
  emit: Emit
): Promise<RunResult> {
  if (!options.sandbox) {
    return failure(
      makeError("SUBPROCESS_ERROR", "No sandbox runner configured", undefined, "Pass a SandboxRunner in the execute options.")
    );
  }
  emit("sandbox_start", undefined, { timeoutMs: settings.sandboxTimeoutMs });
  const outcome = await options.sandbox.run(source, { timeoutMs: settings.sandboxTimeoutMs });
  emit("sandbox_end", undefined, { outcome: outcome.kind });

  switch (outcome.kind) {
    case "completed":
      if (outcome.error !== null) return failure(makeError("RUNTIME_ERROR", outcome.error));
      try {
        return { output: [stringify(outcome.result)], warnings: [], error: null, eco: null };
      } catch (e) {
        return failure(toRunError(e));
      }
    case "timeout":
      return failure(makeError("TIMEOUT", "Time limit exceeded"));
    case "failed":
      return failure(makeError("SUBPROCESS_FAILED", outcome.stderr.trim() || outcome.reason));
    case "spawn_error":
      return failure(makeError("SUBPROCESS_ERROR", outcome.message));
  }
}

/**
 * Run an EcoLang program. Never throws: every failure comes back as
 * `error` on the result, with the output and warnings produced so far.
 */
export async function execute(
  source: string,
  inputs: Inputs = {},
  settings: unknown = {},
  options: ExecOptions = {}
): Promise<RunResult> {
  const runId = options.runId ?? randomUUID();
  const clock = options.clock ?? Date.now;
  const emit = makeEmitter(runId, options.trace);

  const resolved = resolveSettings(settings);
  if (!resolved.ok) {
    return failure(makeError("CONFIG_ERROR", resolved.message, undefined, "Check the run settings."));
  }
  const config = resolved.settings;
  if (config.useSubprocess) {
    return runInSandbox(source, config, options, emit);
  }

  const startMs = clock();
  emit("run_start", undefined, { maxSteps: config.limits.maxSteps, maxLoop: config.limits.maxLoop });

  const parsed = parse(source, { maxFuncParams: config.limits.maxFuncParams });
  if (!parsed.program) {
    const err = parsed.diagnostics[0] ?? makeError("INTERNAL", "Parser returned no program");
    emit("run_end", undefined, { durationMs: clock() - startMs, error: err.code, message: err.message });
    return failure(err);
  }

  const interp = new Interpreter(config, inputs, emit, clock);
  let error: RunError | null = null;
  try {
    interp.run(parsed.program);
  } catch (e) {
    error = toRunError(e);
  }

  const durationMs = clock() - startMs;
  const output = [...interp.governor.output];
  const warnings = [...interp.governor.warnings];
  const totalOps = interp.counter.total;

  if (error) {
    emit("run_end", undefined, { durationMs, totalOps, error: error.code, message: error.message });
    return failure(error, output, warnings);
  }

  const eco = computeEco(totalOps, durationMs / 1000, config.eco);
  if (totalOps > HIGH_USE_THRESHOLD) warnings.push(HIGH_USE_WARNING);
  emit("run_end", undefined, { durationMs, totalOps });
  return { output, warnings, error: null, eco };
}
