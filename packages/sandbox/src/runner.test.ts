/**
 * Tests for the child-process sandbox runner.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { ProcessSandbox, withCpuLimit, workerCommand } from "./runner.js";

function nodeScript(script: string) {
  return { file: process.execPath, args: ["-e", script] };
}

describe("sandbox commands", () => {
  it("wraps a command in ulimit", () => {
    assert.deepEqual(withCpuLimit({ file: "node", args: ["w.js"] }, 2), {
      file: "/bin/sh",
      args: ["-c", 'ulimit -t "$1"; shift; exec "$@"', "ecolang-sandbox", "2", "node", "w.js"],
    });
  });

  it("runs the worker source through tsx with a memory ceiling", () => {
    const cmd = workerCommand(128);
    assert.equal(cmd.file, process.execPath);
    assert.equal(cmd.args[0], "--max-old-space-size=128");
    assert.equal(cmd.args[1], "--import");
    assert.match(cmd.args[cmd.args.length - 1] ?? "", /worker\.ts$/);
  });
});

describe("ProcessSandbox", () => {
  it("runs a program in the worker", async () => {
    const sandbox = new ProcessSandbox({ cpuSeconds: 20 });
    const outcome = await sandbox.run("x = 6\nresult = x * 7", { timeoutMs: 30_000 });
    assert.deepEqual(outcome, { kind: "completed", result: 42, error: null });
  });

  it("passes worker rejections back as completed with an error", async () => {
    const sandbox = new ProcessSandbox({ cpuSeconds: 20 });
    const outcome = await sandbox.run("import os", { timeoutMs: 30_000 });
    assert.deepEqual(outcome, { kind: "completed", result: null, error: "Import not allowed" });
  });

  it("kills a child that runs past the timeout", async () => {
    const sandbox = new ProcessSandbox({ command: nodeScript("setTimeout(() => {}, 10000)"), applyLimits: false });
    assert.deepEqual(await sandbox.run("", { timeoutMs: 200 }), { kind: "timeout" });
  });

  it("reports a non-zero exit", async () => {
    const sandbox = new ProcessSandbox({
      command: nodeScript("process.stderr.write('bad'); process.exit(3)"),
      applyLimits: false,
    });
    const outcome = await sandbox.run("", { timeoutMs: 10_000 });
    assert.equal(outcome.kind, "failed");
    if (outcome.kind !== "failed") return;
    assert.equal(outcome.reason, "Sandbox exited with 3");
    assert.equal(outcome.exitCode, 3);
    assert.match(outcome.stderr, /^bad/);
  });

  it("reports output that is not a response", async () => {
    const sandbox = new ProcessSandbox({ command: nodeScript("process.stdout.write('hello')"), applyLimits: false });
    const outcome = await sandbox.run("", { timeoutMs: 10_000 });
    assert.equal(outcome.kind, "failed");
    if (outcome.kind !== "failed") return;
    assert.equal(outcome.reason, "Malformed sandbox response");
  });

  it("stops reading an oversized reply", async () => {
    const sandbox = new ProcessSandbox({
      command: nodeScript("process.stdout.write('x'.repeat(100))"),
      applyLimits: false,
      maxReplyBytes: 10,
    });
    const outcome = await sandbox.run("", { timeoutMs: 10_000 });
    assert.equal(outcome.kind, "failed");
    if (outcome.kind !== "failed") return;
    assert.equal(outcome.reason, "Sandbox reply too large");
  });

  it("reports a command that cannot start", async () => {
    const sandbox = new ProcessSandbox({
      command: { file: "/nonexistent/ecolang-worker", args: [] },
      applyLimits: false,
    });
    const outcome = await sandbox.run("", { timeoutMs: 10_000 });
    assert.equal(outcome.kind, "spawn_error");
    if (outcome.kind !== "spawn_error") return;
    assert.match(outcome.message, /ENOENT/);
  });
});
