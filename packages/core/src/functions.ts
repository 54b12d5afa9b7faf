/**
 * User function table for one run.
 */
import type * as AST from "./ast.js";
import { EcoRuntimeError } from "./diagnostics.js";
import type { Limits } from "./settings.js";

export interface FunctionDef {
  name: string;
  params: string[];
  body: AST.Stmt[];
  line: number;
}

export class FunctionRegistry {
  private readonly table = new Map<string, FunctionDef>();
  private depth = 0;

  constructor(private readonly limits: Pick<Limits, "maxCallDepth" | "maxFuncParams">) {}

  get callDepth(): number {
    return this.depth;
  }

  /** Register or replace a definition. */
  define(def: FunctionDef): void {
    if (def.params.length > this.limits.maxFuncParams) {
      throw new EcoRuntimeError(
        "SYNTAX_ERROR",
        `Too many params (max ${this.limits.maxFuncParams})`
      );
    }
    this.table.set(def.name, def);
  }

  lookup(name: string, argCount: number): FunctionDef {
    const def = this.table.get(name);
    if (!def) {
      throw new EcoRuntimeError(
        "RUNTIME_ERROR",
        `Unknown function '${name}'`,
        {},
        "Define it with 'func' before calling it."
      );
    }
    if (argCount !== def.params.length) {
      throw new EcoRuntimeError(
        "RUNTIME_ERROR",
        "Argument count mismatch",
        {},
        `'${name}' takes ${def.params.length} argument(s), got ${argCount}.`
      );
    }
    return def;
  }

  /** Run `body` one call level deeper; the level is released on every exit path. */
  withCall<T>(body: () => T): T {
    if (this.depth >= this.limits.maxCallDepth) {
      throw new EcoRuntimeError("RUNTIME_ERROR", "Call depth limit exceeded");
    }
    this.depth++;
    try {
      return body();
    } finally {
      this.depth--;
    }
  }
}
