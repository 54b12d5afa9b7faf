/**
 * Tests for op accounting and the energy estimate.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { OpCounter, computeEco, pickEcoTip, savePowerScale } from "./eco.js";

describe("OpCounter", () => {
  it("charges the category weight", () => {
    const counter = new OpCounter();
    assert.equal(counter.charge("print"), 50);
    assert.equal(counter.charge("math", 1, 3), 30);
    assert.equal(counter.total, 80);
  });

  it("truncates scaled weights before multiplying", () => {
    const counter = new OpCounter();
    assert.equal(counter.charge("other", 0.9, 2), 8);
    assert.equal(counter.charge("func_call", 0.5), 10);
  });
});

describe("savePowerScale", () => {
  it("lowers the multiplier one percent per level with a floor", () => {
    assert.equal(savePowerScale(0), 1);
    assert.equal(savePowerScale(50), 0.5);
    assert.equal(savePowerScale(200), 0.1);
  });
});

describe("computeEco", () => {
  const params = { energyPerOpJ: 1e-9, idlePowerW: 0.5, co2PerKwhG: 475 };

  it("adds op energy to idle power", () => {
    const eco = computeEco(1000, 2, params);
    assert.equal(eco.totalOps, 1000);
    assert.equal(eco.energyJ, 1000 * 1e-9 + 2 * 0.5);
    assert.equal(eco.energyKWh, eco.energyJ / 3.6e6);
    assert.equal(eco.co2G, eco.energyKWh * 475);
    assert.deepEqual(eco.tips, []);
  });

  it("uses a minimum duration and adds a tip for heavy runs", () => {
    const eco = computeEco(1001, 0, params);
    assert.equal(eco.energyJ, 1001 * 1e-9 + 1e-6 * 0.5);
    assert.deepEqual(eco.tips, ["Consider reducing loop iterations or heavy math operations"]);
  });
});

describe("pickEcoTip", () => {
  it("rotates through the tips by op count", () => {
    assert.equal(pickEcoTip(0), "Turn off unused devices");
    assert.equal(pickEcoTip(5), "Prefer simpler math operations");
    assert.equal(pickEcoTip(7), "Reduce loop counts");
  });
});
