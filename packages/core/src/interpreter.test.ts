/**
 * Tests for EcoLang program execution.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { execute, type ExecOptions, type Inputs, type TraceEvent } from "./interpreter.js";
import type { SandboxLimits, SandboxOutcome, SandboxRunner } from "./sandbox.js";

const fixedClock = (): number => 0;

function run(source: string, settings: unknown = {}, inputs: Inputs = {}, options: ExecOptions = {}) {
  return execute(source, inputs, settings, { clock: fixedClock, ...options });
}

function lines(...src: string[]): string {
  return src.join("\n");
}

class FakeSandbox implements SandboxRunner {
  readonly calls: Array<{ code: string; limits: SandboxLimits }> = [];

  constructor(private readonly outcome: SandboxOutcome) {}

  async run(code: string, limits: SandboxLimits): Promise<SandboxOutcome> {
    this.calls.push({ code, limits });
    return this.outcome;
  }
}

describe("execute", () => {
  describe("statements", () => {
    it("prints expressions and counts ops", async () => {
      const result = await run(lines("let x = 2", "say x * 3"));
      assert.deepEqual(result.output, ["6"]);
      assert.deepEqual(result.warnings, []);
      assert.equal(result.error, null);
      // let: other 5 + assign 5; say: other 5 + math 10 + print 50
      assert.equal(result.eco?.totalOps, 75);
    });

    it("charges the statement before evaluating it", async () => {
      const result = await run("say ecoOps()");
      assert.deepEqual(result.output, ["5"]);
    });

    it("reads inputs with ask", async () => {
      const result = await run(lines("ask name", "say 'hi ' + name"), {}, { name: "Ada" });
      assert.deepEqual(result.output, ["hi Ada"]);
    });

    it("fails when an input is missing", async () => {
      const result = await run("ask name");
      assert.deepEqual(result.error, {
        code: "RUNTIME_ERROR",
        message: "Missing input for 'name'",
        line: 1,
        column: 1,
        lineText: "ask name",
        hint: "Provide 'name' in the run inputs.",
      });
    });

    it("records warnings", async () => {
      const result = await run(lines("warn 'careful'", "say 1"));
      assert.deepEqual(result.warnings, ["careful"]);
      assert.deepEqual(result.output, ["1"]);
    });

    it("protects constants", async () => {
      const result = await run(lines("const k = 1", "let k = 2"));
      assert.equal(result.error?.message, "Cannot reassign const 'k'");
      assert.equal(result.error?.line, 2);
    });
  });

  describe("blocks", () => {
    it("shares variables between repeat bodies and the program", async () => {
      const result = await run(lines("let n = 0", "repeat 3 times", "  let n = n + 1", "end", "say n"));
      assert.deepEqual(result.output, ["3"]);
    });

    it("keeps assignments made inside if", async () => {
      const result = await run(lines("let a = 1", "if a == 1 then", "  let a = 5", "end", "say a"));
      assert.deepEqual(result.output, ["5"]);
    });

    it("takes the first true branch", async () => {
      const result = await run(lines("let x = 1", "if x > 1 then", "  say 'big'", "elif x == 1 then", "  say 'one'", "else", "  say 'small'", "end"));
      assert.deepEqual(result.output, ["one"]);
    });

    it("counts for loops up and down", async () => {
      const up = await run(lines("for i = 1 to 3", "  say i", "end"));
      assert.deepEqual(up.output, ["1", "2", "3"]);
      const down = await run(lines("for i = 3 to 1", "  say i", "end"));
      assert.deepEqual(down.output, ["3", "2", "1"]);
      const stepped = await run(lines("for i = 0 to 10 step 5", "  say i", "end"));
      assert.deepEqual(stepped.output, ["0", "5", "10"]);
    });

    it("rejects a zero for step", async () => {
      const result = await run(lines("for i = 1 to 3 step 0", "end"));
      assert.equal(result.error?.code, "RUNTIME_ERROR");
      assert.equal(result.error?.message, "for step cannot be 0");
    });

    it("requires a numeric repeat count", async () => {
      const result = await run(lines("repeat 'x' times", "end"));
      assert.equal(result.error?.message, "Repeat count must be a number");
    });
  });

  describe("budgets", () => {
    it("runs exactly max_steps statements", async () => {
      const result = await run(lines("say 1", "say 2", "say 3", "say 4"), { max_steps: 3 });
      assert.deepEqual(result.output, ["1", "2", "3"]);
      assert.deepEqual(result.warnings, ["Step limit exceeded"]);
      assert.deepEqual(result.error, {
        code: "STEP_LIMIT",
        message: "Step limit exceeded",
        line: 4,
        column: 1,
        lineText: "say 4",
      });
      assert.equal(result.eco, null);
    });

    it("stops while loops at max_loop and carries on", async () => {
      const result = await run(lines("let i = 0", "while true then", "  let i = i + 1", "end", "say i"), { max_loop: 3 });
      assert.deepEqual(result.output, ["3"]);
      assert.deepEqual(result.warnings, ["While iterations limited to 3"]);
      assert.equal(result.error, null);
    });

    it("caps repeat counts at max_loop", async () => {
      const result = await run(lines("repeat 5 times", "  say 'x'", "end"), { max_loop: 2 });
      assert.deepEqual(result.output, ["x", "x"]);
      assert.deepEqual(result.warnings, ["Repeat count limited to 2"]);
    });

    it("fails once output passes max_output_chars", async () => {
      const result = await run(lines("say 'abc'", "say 'def'"), { max_output_chars: 5 });
      assert.deepEqual(result.output, ["abc"]);
      assert.equal(result.error?.code, "OUTPUT_LIMIT");
      assert.equal(result.error?.line, 2);
    });

    it("stops a list that doubles past the element cap", async () => {
      const result = await run(
        lines("let a = append(array(), 1)", "repeat 20 times", "  let a = a + a", "end", "say len(a)")
      );
      assert.deepEqual(result.output, []);
      assert.deepEqual(result.error, {
        code: "RUNTIME_ERROR",
        message: "List too long; max 10000 elements",
        line: 3,
        column: 11,
        lineText: "  let a = a + a",
      });
    });

    it("fails a say whose text would pass the string cap", async () => {
      const result = await run(
        lines(
          "let s = 'xxxxxxxxxx'",
          "repeat 13 times",
          "  let s = s + s",
          "end",
          "let l = append(append(array(), s), s)",
          "say l"
        )
      );
      assert.deepEqual(result.error, {
        code: "RUNTIME_ERROR",
        message: "String too long; max 100000 characters",
        line: 6,
        column: 1,
        lineText: "say l",
      });
    });

    it("times out against the run clock", async () => {
      let now = 0;
      const ticking = (): number => {
        now += 1000;
        return now;
      };
      const result = await run(lines("say 1", "say 2"), { max_time_s: 1.5 }, {}, { clock: ticking });
      assert.deepEqual(result.output, ["1"]);
      assert.equal(result.error?.code, "TIMEOUT");
      assert.equal(result.error?.line, 2);
    });

    it("warns about high energy use", async () => {
      const result = await run(lines("repeat 20 times", "  say 1", "end"));
      // repeat: other 5; each pass: loop_check 5 + other 5 + print 50
      assert.equal(result.eco?.totalOps, 1205);
      assert.deepEqual(result.warnings, ["High estimated energy use"]);
      assert.deepEqual(result.eco?.tips, ["Consider reducing loop iterations or heavy math operations"]);
    });
  });

  describe("functions", () => {
    it("passes arguments and returns values", async () => {
      const result = await run(
        lines("func add a b", "  return a + b", "end", "call add with 2, 3 into s", "say s", "call add with 1, 1")
      );
      assert.deepEqual(result.output, ["5", "2"]);
      assert.deepEqual(result.warnings, ["func defined: add"]);
    });

    it("isolates the callee's variables", async () => {
      const result = await run(lines("let x = 1", "func f", "  let x = 2", "end", "call f", "say x"));
      assert.deepEqual(result.output, ["1"]);
    });

    it("positions errors at the innermost statement", async () => {
      const result = await run(lines("let y = 1", "func g", "  say y", "end", "call g"));
      assert.deepEqual(result.error, {
        code: "RUNTIME_ERROR",
        message: "Unknown variable 'y'",
        line: 3,
        column: 7,
        lineText: "  say y",
      });
    });

    it("limits call depth", async () => {
      const result = await run(lines("func r", "  call r", "end", "call r"), { max_call_depth: 2 });
      assert.equal(result.error?.message, "Call depth limit exceeded");
      assert.equal(result.error?.line, 2);
      assert.equal(result.error?.column, 3);
    });

    it("stops recursion at the largest allowed depth", async () => {
      const result = await run(lines("func r", "  call r", "end", "call r"), { max_call_depth: 200 });
      assert.equal(result.error?.code, "RUNTIME_ERROR");
      assert.equal(result.error?.message, "Call depth limit exceeded");
      assert.equal(result.error?.line, 2);
    });

    it("refuses call depths the dispatcher cannot reach", async () => {
      const result = await run(lines("func r", "  call r", "end", "call r"), { max_call_depth: 1_000_000 });
      assert.equal(result.error?.code, "CONFIG_ERROR");
      assert.equal(
        result.error?.message,
        "Invalid settings: max_call_depth: max_call_depth must be at most 200"
      );
    });

    it("reports unknown functions with a hint", async () => {
      const result = await run("call missing");
      assert.equal(result.error?.message, "Unknown function 'missing'");
      assert.equal(result.error?.hint, "Define it with 'func' before calling it.");
    });
  });

  describe("eco statements", () => {
    it("picks a tip from the op count", async () => {
      const result = await run("ecoTip");
      assert.deepEqual(result.output, ["ecoTip: Prefer simpler math operations"]);
    });

    it("scales later charges after savePower", async () => {
      const result = await run(lines("savePower 50", "say ecoOps()"));
      // 5 for savePower, then trunc(5 * 0.5) for the say dispatch
      assert.deepEqual(result.output, ["7"]);
      assert.deepEqual(result.warnings, ["savePower applied: level 50"]);
    });
  });

  describe("errors", () => {
    it("places expression errors at their source column", async () => {
      const result = await run("say 1 + nope");
      assert.deepEqual(result.error, {
        code: "RUNTIME_ERROR",
        message: "Unknown variable 'nope'",
        line: 1,
        column: 9,
        lineText: "say 1 + nope",
      });
    });

    it("returns syntax errors without running anything", async () => {
      const result = await run(lines("say 1", "bogus"));
      assert.deepEqual(result.output, []);
      assert.equal(result.error?.code, "SYNTAX_ERROR");
      assert.equal(result.eco, null);
    });

    it("returns invalid settings as CONFIG_ERROR", async () => {
      const result = await run("say 1", { max_steps: "lots" });
      assert.deepEqual(result.error, {
        code: "CONFIG_ERROR",
        message: "Invalid settings: max_steps: max_steps must be a number",
        hint: "Check the run settings.",
      });
    });
  });

  describe("trace", () => {
    it("emits events tagged with the run id", async () => {
      const events: TraceEvent[] = [];
      await run("say 1", {}, {}, { runId: "run-1", trace: (e) => events.push(e) });
      assert.deepEqual(
        events.map((e) => e.event),
        ["run_start", "stmt_start", "stmt_end", "run_end"]
      );
      assert.ok(events.every((e) => e.runId === "run-1"));
      assert.deepEqual(events[1]?.data, { kind: "Say" });
      assert.equal(events[1]?.line, 1);
    });

    it("reports loops and calls", async () => {
      const events: TraceEvent[] = [];
      await run(lines("func f", "end", "repeat 1 times", "  call f", "end"), {}, {}, { trace: (e) => events.push(e) });
      const names = events.map((e) => e.event).filter((n) => n !== "stmt_start" && n !== "stmt_end");
      assert.deepEqual(names, ["run_start", "loop_start", "fn_call_start", "fn_call_end", "loop_end", "run_end"]);
      const loopEnd = events.find((e) => e.event === "loop_end");
      assert.deepEqual(loopEnd?.data, { loop: "repeat", iterations: 1 });
    });
  });

  describe("sandbox", () => {
    it("prints the sandbox result", async () => {
      const sandbox = new FakeSandbox({ kind: "completed", result: [1, "a"], error: null });
      const result = await run("result = 1", { use_subprocess: true, sandbox_timeout_s: 0.5 }, {}, { sandbox });
      assert.deepEqual(result, { output: ['[1, "a"]'], warnings: [], error: null, eco: null });
      assert.deepEqual(sandbox.calls, [{ code: "result = 1", limits: { timeoutMs: 500 } }]);
    });

    it("maps sandbox failures to error codes", async () => {
      const settings = { use_subprocess: true };
      const cases: Array<[SandboxOutcome, string, string]> = [
        [{ kind: "completed", result: null, error: "error: boom" }, "RUNTIME_ERROR", "error: boom"],
        [{ kind: "timeout" }, "TIMEOUT", "Time limit exceeded"],
        [{ kind: "failed", reason: "Sandbox exited with 1", exitCode: 1, stderr: "oops\n" }, "SUBPROCESS_FAILED", "oops"],
        [{ kind: "failed", reason: "Sandbox exited with 1", exitCode: 1, stderr: "" }, "SUBPROCESS_FAILED", "Sandbox exited with 1"],
        [{ kind: "spawn_error", message: "spawn ENOENT" }, "SUBPROCESS_ERROR", "spawn ENOENT"],
      ];
      for (const [outcome, code, message] of cases) {
        const result = await run("x = 1", settings, {}, { sandbox: new FakeSandbox(outcome) });
        assert.equal(result.error?.code, code);
        assert.equal(result.error?.message, message);
      }
    });

    it("fails without a runner", async () => {
      const result = await run("x = 1", { use_subprocess: true });
      assert.equal(result.error?.code, "SUBPROCESS_ERROR");
      assert.equal(result.error?.message, "No sandbox runner configured");
    });
  });
});
