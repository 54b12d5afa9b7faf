/**
 * Variable frames. The root frame holds program-level bindings; every
 * `call` pushes a fresh frame and pops it on the way out.
 */
import { EcoRuntimeError } from "./diagnostics.js";
import type { OpCounter } from "./eco.js";
import type { Scope, Value } from "./values.js";

export class Frame implements Scope {
  private readonly bindings = new Map<string, Value>();
  private readonly constants = new Set<string>();
  // op-cost multiplier set by savePower
  opsScale: number;

  constructor(private readonly counter: OpCounter, opsScale = 1) {
    this.opsScale = opsScale;
  }

  lookup(name: string): Value | undefined {
    return this.bindings.get(name);
  }

  ecoOps(): number {
    return this.counter.total;
  }

  assign(name: string, value: Value): void {
    if (this.constants.has(name)) {
      throw new EcoRuntimeError("RUNTIME_ERROR", `Cannot reassign const '${name}'`);
    }
    this.bindings.set(name, value);
  }

  defineConst(name: string, value: Value): void {
    if (this.bindings.has(name)) {
      throw new EcoRuntimeError("RUNTIME_ERROR", `'${name}' already defined`);
    }
    this.bindings.set(name, value);
    this.constants.add(name);
  }
}

export class FrameStack {
  private readonly frames: Frame[];

  constructor(root: Frame) {
    this.frames = [root];
  }

  get current(): Frame {
    const top = this.frames[this.frames.length - 1];
    if (!top) throw new EcoRuntimeError("INTERNAL", "Frame stack is empty");
    return top;
  }

  push(frame: Frame): void {
    this.frames.push(frame);
  }

  pop(): Frame {
    if (this.frames.length <= 1) {
      throw new EcoRuntimeError("INTERNAL", "Cannot pop the root frame");
    }
    const top = this.current;
    this.frames.pop();
    return top;
  }
}
