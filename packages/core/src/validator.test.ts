/**
 * Tests for EcoLang expression and program validation.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { validateExpression, validateProgram, SANDBOX_PROFILE, type ValidationProfile } from "./validator.js";
import { parseExpression } from "./parser.js";
import { parse } from "./statements.js";
import { ExpressionError } from "./diagnostics.js";

function rejection(text: string, profile?: ValidationProfile): ExpressionError {
  try {
    validateExpression(parseExpression(text), profile);
  } catch (e) {
    if (e instanceof ExpressionError) return e;
    throw e;
  }
  assert.fail(`expected '${text}' to be rejected`);
}

describe("EcoLang Validator", () => {
  it("accepts arithmetic, logic and builtin calls", () => {
    validateExpression(parseExpression("len('ab') + 2 * x > 3 and not done"));
  });

  it("rejects attribute access with the node label", () => {
    const e = rejection("a.b");
    assert.equal(e.message, "Unsupported expression element: Attribute");
    assert.equal(e.column, 1);
  });

  it("rejects list displays, comprehensions and lambdas", () => {
    assert.equal(rejection("[1]").message, "Unsupported expression element: List");
    assert.equal(rejection("[x for x in y]").message, "Unsupported expression element: ListComp");
    assert.equal(rejection("lambda: 1").message, "Unsupported expression element: Lambda");
    assert.equal(rejection("x[0]").message, "Unsupported expression element: Subscript");
  });

  it("rejects calls outside the builtin whitelist", () => {
    const e = rejection("1 + print(2)");
    assert.equal(e.message, "Unsupported function call");
    assert.equal(e.column, 5);
  });

  it("rejects dangerous names even when called", () => {
    assert.equal(rejection("eval").message, "Unsupported name in expression: eval");
    assert.equal(rejection("open(1)").message, "Unsupported name in expression: open");
  });

  it("rejects reserved runtime names", () => {
    assert.equal(rejection("_eco_ops + 1").message, "Unsupported name in expression: _eco_ops");
  });

  it("rejects chained comparisons", () => {
    assert.equal(rejection("1 < 2 < 3").message, "Chained comparisons not supported");
  });

  it("uses the sandbox wording and refuses every call there", () => {
    assert.equal(rejection("len('a')", SANDBOX_PROFILE).message, "Call not allowed");
    assert.equal(rejection("a.b", SANDBOX_PROFILE).message, "Attribute not allowed");
    assert.equal(rejection("exec", SANDBOX_PROFILE).message, "name exec not allowed");
  });
});

describe("validateProgram", () => {
  it("reports every bad expression with its source position", () => {
    const parsed = parse(["say 1 +", "repeat 2 times", "  let x = a.b", "end"].join("\n"));
    assert.ok(parsed.program);
    const diags = validateProgram(parsed.program);
    assert.deepEqual(diags, [
      { code: "RUNTIME_ERROR", message: "Syntax error in expression", line: 1, column: 8, lineText: "say 1 +" },
      {
        code: "RUNTIME_ERROR",
        message: "Unsupported expression element: Attribute",
        line: 3,
        column: 11,
        lineText: "  let x = a.b",
      },
    ]);
  });

  it("checks every branch condition of an if", () => {
    const parsed = parse(["if x then", "  say 1", "elif y.z then", "  say 2", "end"].join("\n"));
    assert.ok(parsed.program);
    const [diag] = validateProgram(parsed.program);
    assert.equal(diag?.line, 3);
    assert.equal(diag?.column, 6);
  });

  it("returns nothing for a clean program", () => {
    const parsed = parse("let a = 1\nsay a + 1");
    assert.ok(parsed.program);
    assert.deepEqual(validateProgram(parsed.program), []);
  });
});
