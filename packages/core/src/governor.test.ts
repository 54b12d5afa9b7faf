/**
 * Tests for the resource governor.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { Governor, type BudgetEvent } from "./governor.js";
import { OpCounter } from "./eco.js";
import { EcoRuntimeError } from "./diagnostics.js";
import type { Limits } from "./settings.js";

const LIMITS: Limits = {
  maxSteps: 3,
  maxLoop: 2,
  maxTimeMs: 100,
  maxOutputChars: 10,
  maxCallDepth: 5,
  maxFuncParams: 3,
};

function setup(limits: Partial<Limits> = {}) {
  let now = 0;
  const events: BudgetEvent[] = [];
  const counter = new OpCounter();
  const governor = new Governor({ ...LIMITS, ...limits }, counter, () => now, (e) => events.push(e));
  return {
    governor,
    counter,
    events,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("Governor", () => {
  it("allows exactly maxSteps statements", () => {
    const { governor, events } = setup();
    governor.beforeStatement();
    governor.beforeStatement();
    governor.beforeStatement();
    assert.throws(() => governor.beforeStatement(), (e: unknown) => {
      assert.ok(e instanceof EcoRuntimeError);
      assert.equal(e.code, "STEP_LIMIT");
      return true;
    });
    assert.deepEqual(governor.warnings, ["Step limit exceeded"]);
    assert.deepEqual(events, [{ budget: "steps", limit: 3, actual: 4 }]);
  });

  it("times out once elapsed time passes the limit", () => {
    const { governor, advance } = setup();
    advance(100);
    governor.beforeStatement();
    advance(1);
    assert.throws(() => governor.beforeStatement(), { message: "Time limit exceeded" });
  });

  it("stops while and for loops at the iteration cap without failing", () => {
    const { governor } = setup();
    assert.equal(governor.allowIteration("while", 1), true);
    assert.equal(governor.allowIteration("while", 2), false);
    assert.equal(governor.allowIteration("for", 2), false);
    assert.deepEqual(governor.warnings, ["While iterations limited to 2", "For iterations limited to 2"]);
  });

  it("aborts a loop once the op counter passes maxSteps", () => {
    const { governor, counter, events } = setup();
    counter.charge("other");
    assert.equal(governor.allowIteration("repeat", 0), false);
    assert.deepEqual(governor.warnings, ["Step limit exceeded inside repeat; aborted"]);
    assert.deepEqual(events, [{ budget: "ops", limit: 3, actual: 5 }]);
  });

  it("caps repeat counts", () => {
    const { governor } = setup();
    assert.equal(governor.capRepeat(5), 2);
    assert.equal(governor.capRepeat(-3), 0);
    assert.deepEqual(governor.warnings, ["Repeat count limited to 2"]);
  });

  it("limits the total output length", () => {
    const { governor } = setup();
    governor.appendOutput("hello");
    governor.appendOutput("world");
    assert.throws(() => governor.appendOutput("!"), { message: "Output length limit reached" });
    assert.deepEqual(governor.output, ["hello", "world"]);
  });
});
