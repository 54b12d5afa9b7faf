/**
 * EcoLang expression evaluator.
 *
 * `evaluate` parses, validates and then walks the tree. The scope is only
 * read; every primitive is bounded (exponent, string-length and list-size caps).
 */
import type * as AST from "./ast.js";
import { ExpressionError } from "./diagnostics.js";
import { parseExpression } from "./parser.js";
import { validateExpression } from "./validator.js";
import { callBuiltin } from "./builtins.js";
import {
  MAX_STRING_LENGTH,
  checkList,
  deepEqual,
  isTruthy,
  stringify,
  typeName,
  type Scope,
  type Value,
} from "./values.js";

export const MAX_EXPONENT = 8;

export interface EvalStats {
  // arithmetic operators executed; charged as `math` ops
  arithmeticOps: number;
}

export function evaluate(text: string, scope: Scope, stats?: EvalStats): Value {
  try {
    const expr = parseExpression(text);
    validateExpression(expr);
    return evalExpr(expr, scope, stats);
  } catch (e) {
    if (e instanceof ExpressionError) throw e;
    if (e instanceof RangeError) throw new ExpressionError("Expression is too deeply nested", 1);
    throw new ExpressionError(`Evaluation failed: ${String(e)}`, 1);
  }
}

export function evalExpr(expr: AST.Expr, scope: Scope, stats?: EvalStats): Value {
  switch (expr.kind) {
    case "NumberLiteral":
    case "StringLiteral":
    case "BoolLiteral":
      return expr.value;

    case "Identifier": {
      const v = scope.lookup(expr.name);
      if (v === undefined) {
        throw new ExpressionError(`Unknown variable '${expr.name}'`, expr.col);
      }
      return v;
    }

    case "UnaryExpr": {
      const operand = evalExpr(expr.operand, scope, stats);
      if (expr.op === "not") return !isTruthy(operand);
      if (typeof operand !== "number") {
        throw new ExpressionError(
          `Operator '${expr.op}' requires a number, got ${typeName(operand)}`,
          expr.col
        );
      }
      return expr.op === "-" ? -operand : operand;
    }

    case "BinaryExpr": {
      const left = evalExpr(expr.left, scope, stats);
      const right = evalExpr(expr.right, scope, stats);
      if (stats) stats.arithmeticOps++;
      return atColumn(expr.col, () => evalBinaryOp(expr.op, left, right, expr.col));
    }

    case "CompareExpr": {
      const [op] = expr.ops;
      const [rightExpr] = expr.comparators;
      if (op === undefined || rightExpr === undefined || expr.ops.length !== 1) {
        throw new ExpressionError("Chained comparisons not supported", expr.col);
      }
      const left = evalExpr(expr.left, scope, stats);
      const right = evalExpr(rightExpr, scope, stats);
      return evalCompare(op, left, right, expr.col);
    }

    case "LogicalExpr": {
      // short-circuit; the result is always a boolean
      if (expr.op === "and") {
        for (const v of expr.values) {
          if (!isTruthy(evalExpr(v, scope, stats))) return false;
        }
        return true;
      }
      for (const v of expr.values) {
        if (isTruthy(evalExpr(v, scope, stats))) return true;
      }
      return false;
    }

    case "CallExpr": {
      if (expr.callee.kind !== "Identifier") {
        throw new ExpressionError("Unsupported function call", expr.col);
      }
      const { name } = expr.callee;
      const args = expr.args.map((a) => evalExpr(a, scope, stats));
      return atColumn(expr.col, () => callBuiltin(name, args, scope));
    }

    default:
      throw new ExpressionError(`Unsupported expression element: ${expr.kind}`, expr.col);
  }
}

// errors raised without a position take the node's column
function atColumn<T>(col: number, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof ExpressionError && e.column === undefined) {
      throw new ExpressionError(e.message, col);
    }
    throw e;
  }
}

function checkNumber(n: number, col: number): number {
  if (!Number.isFinite(n)) throw new ExpressionError("Numeric overflow", col);
  return n;
}

function checkString(s: string, col: number): string {
  if (s.length > MAX_STRING_LENGTH) {
    throw new ExpressionError(`String too long; max ${MAX_STRING_LENGTH} characters`, col);
  }
  return s;
}

function evalBinaryOp(op: AST.BinaryOp, left: Value, right: Value, col: number): Value {
  if (op === "+") {
    if (typeof left === "string" || typeof right === "string") {
      return checkString(stringify(left) + stringify(right), col);
    }
    if (Array.isArray(left) && Array.isArray(right)) {
      return checkList([...left, ...right], col);
    }
  }

  if (typeof left !== "number" || typeof right !== "number") {
    throw new ExpressionError(
      `Operator '${op}' requires numbers, got ${typeName(left)} and ${typeName(right)}`,
      col
    );
  }

  switch (op) {
    case "+":
      return checkNumber(left + right, col);
    case "-":
      return checkNumber(left - right, col);
    case "*":
      return checkNumber(left * right, col);
    case "/":
      if (right === 0) throw new ExpressionError("Division by zero", col);
      return checkNumber(left / right, col);
    case "//":
      if (right === 0) throw new ExpressionError("Division by zero", col);
      return checkNumber(Math.floor(left / right), col);
    case "%": {
      if (right === 0) throw new ExpressionError("Modulo by zero", col);
      // result takes the sign of the divisor
      const r = left % right;
      return checkNumber(r !== 0 && (r < 0) !== (right < 0) ? r + right : r, col);
    }
    case "**":
      if (Math.abs(right) > MAX_EXPONENT) {
        throw new ExpressionError(`Exponent too large; max ${MAX_EXPONENT}`, col);
      }
      if (left === 0 && right < 0) throw new ExpressionError("Division by zero", col);
      return checkNumber(left ** right, col);
  }
}

function evalCompare(op: AST.CompareOp, left: Value, right: Value, col: number): boolean {
  if (op === "==" || op === "!=") {
    const equal = deepEqual(left, right);
    return op === "==" ? equal : !equal;
  }
  if (typeof left === "number" && typeof right === "number") {
    return orderBy(op, left - right);
  }
  if (typeof left === "string" && typeof right === "string") {
    return orderBy(op, left < right ? -1 : left > right ? 1 : 0);
  }
  throw new ExpressionError(
    `Operator '${op}' requires two numbers or two strings, got ${typeName(left)} and ${typeName(right)}`,
    col
  );
}

function orderBy(op: "<" | "<=" | ">" | ">=", diff: number): boolean {
  switch (op) {
    case "<":
      return diff < 0;
    case "<=":
      return diff <= 0;
    case ">":
      return diff > 0;
    case ">=":
      return diff >= 0;
  }
}
