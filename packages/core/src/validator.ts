/**
 * Static whitelist walk over an expression AST.
 * Runs to completion before anything is evaluated.
 */
import type * as AST from "./ast.js";
import { ExpressionError, makeError, type RunError } from "./diagnostics.js";
import { parseExpression } from "./parser.js";

export const DANGEROUS_NAMES: ReadonlySet<string> = new Set([
  "__import__",
  "eval",
  "exec",
  "open",
  "os",
  "sys",
  "require",
  "process",
  "globalThis",
  "Function",
]);

// Names the runtime keeps for its own signals
export const RESERVED_NAMES: ReadonlySet<string> = new Set(["_ops_scale", "_eco_ops"]);

export const KNOWN_BUILTINS: ReadonlySet<string> = new Set([
  "len",
  "length",
  "toNumber",
  "toString",
  "array",
  "append",
  "at",
  "ecoOps",
]);

export interface ValidationProfile {
  // callable names; an empty set rejects every call
  allowedCalls: ReadonlySet<string>;
  rejectNode(label: string): string;
  rejectCall(): string;
  rejectName(name: string): string;
}

export const EXPRESSION_PROFILE: ValidationProfile = {
  allowedCalls: KNOWN_BUILTINS,
  rejectNode: (label) => `Unsupported expression element: ${label}`,
  rejectCall: () => "Unsupported function call",
  rejectName: (name) => `Unsupported name in expression: ${name}`,
};

// Used by the sandbox worker: no calls at all
export const SANDBOX_PROFILE: ValidationProfile = {
  allowedCalls: new Set(),
  rejectNode: (label) => `${label} not allowed`,
  rejectCall: () => "Call not allowed",
  rejectName: (name) => `name ${name} not allowed`,
};

const NODE_LABELS: Record<AST.Expr["kind"], string> = {
  NumberLiteral: "Number",
  StringLiteral: "String",
  BoolLiteral: "Bool",
  Identifier: "Name",
  UnaryExpr: "UnaryOp",
  BinaryExpr: "BinOp",
  CompareExpr: "Compare",
  LogicalExpr: "BoolOp",
  CallExpr: "Call",
  AttributeExpr: "Attribute",
  SubscriptExpr: "Subscript",
  ListExpr: "List",
  ListCompExpr: "ListComp",
  LambdaExpr: "Lambda",
  YieldExpr: "Yield",
};

export function validateExpression(
  expr: AST.Expr,
  profile: ValidationProfile = EXPRESSION_PROFILE
): void {
  const reject = (message: string, node: AST.Expr): never => {
    throw new ExpressionError(message, node.col);
  };

  const walk = (node: AST.Expr): void => {
    switch (node.kind) {
      case "NumberLiteral":
      case "StringLiteral":
      case "BoolLiteral":
        return;
      case "Identifier":
        if (DANGEROUS_NAMES.has(node.name)) reject(profile.rejectName(node.name), node);
        if (RESERVED_NAMES.has(node.name)) reject(profile.rejectName(node.name), node);
        return;
      case "UnaryExpr":
        walk(node.operand);
        return;
      case "BinaryExpr":
        walk(node.left);
        walk(node.right);
        return;
      case "CompareExpr":
        if (node.ops.length !== 1) reject("Chained comparisons not supported", node);
        walk(node.left);
        node.comparators.forEach(walk);
        return;
      case "LogicalExpr":
        node.values.forEach(walk);
        return;
      case "CallExpr":
        if (
          node.callee.kind !== "Identifier" ||
          !profile.allowedCalls.has(node.callee.name)
        ) {
          if (node.callee.kind === "Identifier" && DANGEROUS_NAMES.has(node.callee.name)) {
            reject(profile.rejectName(node.callee.name), node.callee);
          }
          reject(profile.rejectCall(), node);
        }
        node.args.forEach(walk);
        return;
      default:
        reject(profile.rejectNode(NODE_LABELS[node.kind]), node);
    }
  };

  walk(expr);
}

function slotsOf(stmt: AST.Stmt): Array<[AST.ExprSource, AST.Span]> {
  switch (stmt.kind) {
    case "Say":
    case "Let":
    case "Const":
    case "Warn":
      return [[stmt.expr, stmt.span]];
    case "Return":
      return stmt.expr ? [[stmt.expr, stmt.span]] : [];
    case "Call":
      return stmt.args.map((a): [AST.ExprSource, AST.Span] => [a, stmt.span]);
    case "While":
    case "Repeat":
      return [[stmt.kind === "While" ? stmt.cond : stmt.count, stmt.span]];
    case "For": {
      const slots: Array<[AST.ExprSource, AST.Span]> = [
        [stmt.start, stmt.span],
        [stmt.end, stmt.span],
      ];
      if (stmt.step) slots.push([stmt.step, stmt.span]);
      return slots;
    }
    case "If":
      return stmt.branches.map((b): [AST.ExprSource, AST.Span] => [b.cond, b.span]);
    default:
      return [];
  }
}

function bodiesOf(stmt: AST.Stmt): AST.Stmt[][] {
  switch (stmt.kind) {
    case "Func":
    case "While":
    case "For":
    case "Repeat":
      return [stmt.body];
    case "If":
      return [...stmt.branches.map((b) => b.body), ...(stmt.orElse ? [stmt.orElse] : [])];
    default:
      return [];
  }
}

/**
 * Parse and validate every expression of a program without running it.
 * Reports the errors a run would raise as RUNTIME_ERROR when it reached them.
 */
export function validateProgram(program: AST.Program): RunError[] {
  const diags: RunError[] = [];
  const visit = (stmts: AST.Stmt[]): void => {
    for (const stmt of stmts) {
      for (const [slot, span] of slotsOf(stmt)) {
        try {
          validateExpression(parseExpression(slot.text));
        } catch (e) {
          if (!(e instanceof ExpressionError)) throw e;
          diags.push(
            makeError("RUNTIME_ERROR", e.message, {
              line: span.line,
              column: slot.col + (e.column ?? 1) - 1,
              lineText: span.text,
            })
          );
        }
      }
      bodiesOf(stmt).forEach(visit);
    }
  };
  visit(program.statements);
  return diags;
}
