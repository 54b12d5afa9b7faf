/**
 * Tests for the EcoLang expression evaluator.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { evaluate, type EvalStats } from "./evaluator.js";
import { ExpressionError } from "./diagnostics.js";
import type { Scope, Value } from "./values.js";

function scopeOf(vars: Record<string, Value>, ops = 0): Scope {
  return {
    lookup: (name) => (Object.hasOwn(vars, name) ? vars[name] : undefined),
    ecoOps: () => ops,
  };
}

const empty = scopeOf({});

function failure(text: string, scope: Scope = empty): ExpressionError {
  try {
    evaluate(text, scope);
  } catch (e) {
    if (e instanceof ExpressionError) return e;
    throw e;
  }
  assert.fail(`expected '${text}' to fail`);
}

describe("EcoLang Evaluator", () => {
  describe("arithmetic", () => {
    it("follows precedence", () => {
      assert.equal(evaluate("1 + 2 * 3", empty), 7);
      assert.equal(evaluate("(1 + 2) * 3", empty), 9);
      assert.equal(evaluate("-2 ** 2", empty), -4);
      assert.equal(evaluate("2 ** 2 ** 3", empty), 256);
    });

    it("floors integer division and takes the divisor's sign for %", () => {
      assert.equal(evaluate("7 // 2", empty), 3);
      assert.equal(evaluate("-7 // 2", empty), -4);
      assert.equal(evaluate("-7 % 3", empty), 2);
      assert.equal(evaluate("7 % -3", empty), -2);
      assert.equal(evaluate("7 / 2", empty), 3.5);
    });

    it("rejects division and modulo by zero", () => {
      assert.equal(failure("1 / 0").message, "Division by zero");
      assert.equal(failure("1 // 0").message, "Division by zero");
      assert.equal(failure("1 % 0").message, "Modulo by zero");
      assert.equal(failure("0 ** -1").message, "Division by zero");
    });

    it("caps the exponent", () => {
      assert.equal(evaluate("2 ** 8", empty), 256);
      assert.equal(failure("2 ** 9").message, "Exponent too large; max 8");
    });

    it("requires numbers for arithmetic on non-strings", () => {
      const e = failure("true - 1");
      assert.equal(e.message, "Operator '-' requires numbers, got bool and number");
      assert.equal(e.column, 1);
    });

    it("counts the arithmetic operators it runs", () => {
      const stats: EvalStats = { arithmeticOps: 0 };
      evaluate("1 + 2 * 3 - 4", empty, stats);
      assert.equal(stats.arithmeticOps, 3);
    });
  });

  describe("strings", () => {
    it("concatenates when either side is a string", () => {
      assert.equal(evaluate("'n=' + 3", empty), "n=3");
      assert.equal(evaluate("true + '!'", empty), "true!");
    });

    it("refuses strings over the length cap", () => {
      const big = scopeOf({ s: "x".repeat(60_000) });
      assert.equal(failure("s + s", big).message, "String too long; max 100000 characters");
    });

    it("refuses lists over the element cap", () => {
      const err = failure("l + l", scopeOf({ l: Array.from({ length: 6_000 }, () => 0) }));
      assert.equal(err.message, "List too long; max 10000 elements");
      assert.equal(err.column, 1);
    });

    it("counts every element of nested lists", () => {
      const inner = Array.from({ length: 100 }, () => 0);
      const outer = Array.from({ length: 101 }, () => inner);
      // 101 outer elements + 101 * 100 inner
      assert.equal(failure("l + array()", scopeOf({ l: outer })).message, "List too long; max 10000 elements");
    });

    it("refuses lists nested past the depth cap", () => {
      let deep: Value = 0;
      for (let i = 0; i < 100; i++) deep = [deep];
      const err = failure("len(append(array(), d))", scopeOf({ d: deep }));
      assert.equal(err.message, "List nested too deeply; max 100 levels");
      assert.equal(err.column, 5);
    });
  });

  describe("comparison and logic", () => {
    it("compares numbers and strings", () => {
      assert.equal(evaluate("2 >= 2", empty), true);
      assert.equal(evaluate("'apple' < 'banana'", empty), true);
      assert.equal(evaluate("1 == '1'", empty), false);
      assert.equal(evaluate("1 != 2", empty), true);
    });

    it("refuses ordering across types", () => {
      assert.equal(
        failure("1 < 'a'").message,
        "Operator '<' requires two numbers or two strings, got number and string"
      );
    });

    it("short-circuits and returns booleans", () => {
      assert.equal(evaluate("0 or 'x'", empty), true);
      assert.equal(evaluate("false and missing", empty), false);
      assert.equal(evaluate("not ''", empty), true);
    });
  });

  describe("names and calls", () => {
    it("reads variables from the scope", () => {
      assert.equal(evaluate("a * b", scopeOf({ a: 6, b: 7 })), 42);
    });

    it("reports unknown variables at their column", () => {
      const e = failure("1 + nope");
      assert.equal(e.message, "Unknown variable 'nope'");
      assert.equal(e.column, 5);
    });

    it("calls builtins and positions their errors at the call", () => {
      assert.equal(evaluate("len('abc') + 1", empty), 4);
      assert.equal(evaluate("ecoOps()", scopeOf({}, 35)), 35);
      const e = failure("2 + toNumber('x')");
      assert.equal(e.message, "toNumber failed");
      assert.equal(e.column, 5);
    });

    it("rejects unsupported forms before evaluating", () => {
      assert.equal(failure("a.b", scopeOf({ a: 1 })).message, "Unsupported expression element: Attribute");
    });
  });
});
