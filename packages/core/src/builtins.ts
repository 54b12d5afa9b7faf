/**
 * Whitelisted functions callable from EcoLang expressions.
 */
import { ExpressionError } from "./diagnostics.js";
import { MAX_STRING_LENGTH, checkList, stringify, type Scope, type Value } from "./values.js";

export interface Builtin {
  name: string;
  arity: number;
  execute(args: Value[], scope: Scope): Value;
}

const FLOAT_TEXT = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INT_TEXT = /^[+-]?\d+$/;

function sizeOf(name: string, v: Value): number {
  if (typeof v === "string" || Array.isArray(v)) return v.length;
  throw new ExpressionError(`${name} expects a string or array`);
}

export function toNumber(v: Value): number {
  if (typeof v === "number") return Math.trunc(v);
  if (typeof v === "boolean") return v ? 1 : 0;
  if (typeof v === "string") {
    const text = v.trim();
    const pattern = text.includes(".") ? FLOAT_TEXT : INT_TEXT;
    if (pattern.test(text)) {
      const n = Number(text);
      if (Number.isFinite(n)) return n;
    }
  }
  throw new ExpressionError("toNumber failed");
}

const len: Builtin = {
  name: "len",
  arity: 1,
  execute: ([v]) => sizeOf("len", v ?? null),
};

const length: Builtin = {
  name: "length",
  arity: 1,
  execute: ([v]) => sizeOf("length", v ?? null),
};

const toNumberFn: Builtin = {
  name: "toNumber",
  arity: 1,
  execute: ([v]) => toNumber(v ?? null),
};

const toStringFn: Builtin = {
  name: "toString",
  arity: 1,
  execute: ([v]) => {
    const s = stringify(v ?? null);
    if (s.length > MAX_STRING_LENGTH) throw new ExpressionError("String too long");
    return s;
  },
};

const array: Builtin = {
  name: "array",
  arity: 0,
  execute: () => [],
};

const append: Builtin = {
  name: "append",
  arity: 2,
  execute: ([list, item]) => {
    if (!Array.isArray(list)) throw new ExpressionError("append expects an array");
    return checkList([...list, item ?? null]);
  },
};

const at: Builtin = {
  name: "at",
  arity: 2,
  execute: ([target, index]) => {
    if (typeof index !== "number" || !Number.isInteger(index)) {
      throw new ExpressionError("at expects an integer index");
    }
    if (!Array.isArray(target) && typeof target !== "string") {
      throw new ExpressionError("at expects a string or array");
    }
    const i = index < 0 ? target.length + index : index;
    const found = i >= 0 && i < target.length ? target[i] : undefined;
    if (found === undefined) throw new ExpressionError("index out of range");
    return found;
  },
};

const ecoOps: Builtin = {
  name: "ecoOps",
  arity: 0,
  execute: (_args, scope) => scope.ecoOps(),
};

export const BUILTINS: ReadonlyMap<string, Builtin> = new Map(
  [len, length, toNumberFn, toStringFn, array, append, at, ecoOps].map((b) => [b.name, b])
);

export function callBuiltin(name: string, args: Value[], scope: Scope): Value {
  const fn = BUILTINS.get(name);
  if (!fn) throw new ExpressionError("Unsupported function call");
  if (args.length !== fn.arity) {
    const noun = fn.arity === 1 ? "arg" : "args";
    throw new ExpressionError(`${name} expects ${fn.arity} ${noun}`);
  }
  return fn.execute(args, scope);
}
