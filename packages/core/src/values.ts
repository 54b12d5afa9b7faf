/**
 * EcoLang runtime values and the conversions shared by the evaluator,
 * the interpreter and the sandbox.
 */
import { ExpressionError } from "./diagnostics.js";

export type Value = number | string | boolean | null | Value[];

export const MAX_STRING_LENGTH = 100_000;
// nested elements count toward the total
export const MAX_LIST_LENGTH = 10_000;
export const MAX_LIST_DEPTH = 100;

export function isTruthy(v: Value): boolean {
  if (v === null || v === false) return false;
  if (v === 0) return false;
  if (v === "") return false;
  if (Array.isArray(v) && v.length === 0) return false;
  return true;
}

export function typeName(v: Value): string {
  if (v === null) return "none";
  if (Array.isArray(v)) return "list";
  switch (typeof v) {
    case "number":
      return "number";
    case "string":
      return "string";
    default:
      return "bool";
  }
}

function formatNumber(n: number): string {
  if (Object.is(n, -0)) return "0";
  return String(n);
}

function scalarText(v: Exclude<Value, Value[]>): string {
  if (v === null) return "none";
  if (typeof v === "boolean") return v ? "true" : "false";
  if (typeof v === "number") return formatNumber(v);
  return v;
}

function tooLong(): ExpressionError {
  return new ExpressionError(`String too long; max ${MAX_STRING_LENGTH} characters`);
}

/**
 * Text form used by `say`, `warn` and string concatenation. A list whose
 * text would pass MAX_STRING_LENGTH throws before it is built.
 */
export function stringify(v: Value): string {
  if (!Array.isArray(v)) return scalarText(v);

  const parts: string[] = [];
  let length = 0;
  const push = (text: string): void => {
    length += text.length;
    if (length > MAX_STRING_LENGTH) throw tooLong();
    parts.push(text);
  };
  const write = (item: Value, nested: boolean): void => {
    if (!Array.isArray(item)) {
      push(nested && typeof item === "string" ? JSON.stringify(item) : scalarText(item));
      return;
    }
    push("[");
    item.forEach((inner, i) => {
      if (i > 0) push(", ");
      write(inner, true);
    });
    push("]");
  };
  write(v, false);
  return parts.join("");
}

interface ListShape {
  size: number;
  depth: number;
}

const shapes = new WeakMap<Value[], ListShape>();

// Lists are never mutated in place, so a shape stays valid once computed.
function listShape(list: Value[]): ListShape {
  const known = shapes.get(list);
  if (known) return known;
  let size = list.length;
  let depth = 1;
  for (const item of list) {
    if (!Array.isArray(item)) continue;
    const inner = listShape(item);
    size += inner.size;
    depth = Math.max(depth, inner.depth + 1);
  }
  const shape = { size, depth };
  shapes.set(list, shape);
  return shape;
}

/** Rejects a list over the element or nesting cap; a sublist held twice counts twice. */
export function checkList(list: Value[], col?: number): Value[] {
  const { size, depth } = listShape(list);
  if (size > MAX_LIST_LENGTH) {
    throw new ExpressionError(`List too long; max ${MAX_LIST_LENGTH} elements`, col);
  }
  if (depth > MAX_LIST_DEPTH) {
    throw new ExpressionError(`List nested too deeply; max ${MAX_LIST_DEPTH} levels`, col);
  }
  return list;
}

export function deepEqual(a: Value, b: Value): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      const x = a[i];
      const y = b[i];
      if (x === undefined || y === undefined || !deepEqual(x, y)) return false;
    }
    return true;
  }
  return a === b;
}

export function isValue(v: unknown): v is Value {
  if (v === null) return true;
  switch (typeof v) {
    case "number":
      return Number.isFinite(v);
    case "string":
    case "boolean":
      return true;
    default:
      return Array.isArray(v) && v.every(isValue);
  }
}

/** Read-only view of the bindings an expression is evaluated against. */
export interface Scope {
  lookup(name: string): Value | undefined;
  // running op counter of the whole run
  ecoOps(): number;
}
