/**
 * EcoLang AST node definitions.
 *
 * Two layers: expression nodes (produced by the Chevrotain expression parser,
 * positioned by column inside the expression text) and statement nodes
 * (produced by the line parser, positioned by source line).
 */

// --- Expressions ---

// Base node with a 1-based column relative to the start of the expression text
export interface BaseExpr {
  kind: string;
  col: number;
}

export interface NumberLiteral extends BaseExpr {
  kind: "NumberLiteral";
  value: number;
}

export interface StringLiteral extends BaseExpr {
  kind: "StringLiteral";
  value: string;
}

export interface BoolLiteral extends BaseExpr {
  kind: "BoolLiteral";
  value: boolean;
}

export interface Identifier extends BaseExpr {
  kind: "Identifier";
  name: string;
}

export type UnaryOp = "+" | "-" | "not";

export interface UnaryExpr extends BaseExpr {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

export type BinaryOp = "+" | "-" | "*" | "/" | "%" | "//" | "**";

export interface BinaryExpr extends BaseExpr {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

// `a < b < c` parses into one node with two operators; only one is accepted.
export interface CompareExpr extends BaseExpr {
  kind: "CompareExpr";
  left: Expr;
  ops: CompareOp[];
  comparators: Expr[];
}

export interface LogicalExpr extends BaseExpr {
  kind: "LogicalExpr";
  op: "and" | "or";
  values: Expr[];
}

export interface CallExpr extends BaseExpr {
  kind: "CallExpr";
  callee: Expr;
  args: Expr[];
}

// --- Parsed but never evaluated: the validator rejects these ---

export interface AttributeExpr extends BaseExpr {
  kind: "AttributeExpr";
  object: Expr;
  attr: string;
}

export interface SubscriptExpr extends BaseExpr {
  kind: "SubscriptExpr";
  object: Expr;
  index: Expr;
}

export interface ListExpr extends BaseExpr {
  kind: "ListExpr";
  elements: Expr[];
}

export interface ListCompExpr extends BaseExpr {
  kind: "ListCompExpr";
  element: Expr;
  target: string;
  iter: Expr;
}

export interface LambdaExpr extends BaseExpr {
  kind: "LambdaExpr";
  params: string[];
  body: Expr;
}

export interface YieldExpr extends BaseExpr {
  kind: "YieldExpr";
  value: Expr | null;
}

export type Expr =
  | NumberLiteral
  | StringLiteral
  | BoolLiteral
  | Identifier
  | UnaryExpr
  | BinaryExpr
  | CompareExpr
  | LogicalExpr
  | CallExpr
  | AttributeExpr
  | SubscriptExpr
  | ListExpr
  | ListCompExpr
  | LambdaExpr
  | YieldExpr;

// --- Statements ---

export interface Span {
  line: number;
  // source line with trailing whitespace removed
  text: string;
}

// Expression text kept verbatim; parsed when the statement runs
export interface ExprSource {
  text: string;
  // 1-based column of the first character of `text` in the source line
  col: number;
}

export interface BaseStmt {
  kind: string;
  span: Span;
}

export interface SayStmt extends BaseStmt {
  kind: "Say";
  expr: ExprSource;
}

export interface LetStmt extends BaseStmt {
  kind: "Let";
  name: string;
  expr: ExprSource;
}

export interface ConstStmt extends BaseStmt {
  kind: "Const";
  name: string;
  expr: ExprSource;
}

export interface AskStmt extends BaseStmt {
  kind: "Ask";
  name: string;
}

export interface WarnStmt extends BaseStmt {
  kind: "Warn";
  expr: ExprSource;
}

export interface EcoTipStmt extends BaseStmt {
  kind: "EcoTip";
}

export interface SavePowerStmt extends BaseStmt {
  kind: "SavePower";
  level: number;
}

export interface FuncStmt extends BaseStmt {
  kind: "Func";
  name: string;
  params: string[];
  body: Stmt[];
}

export interface CallStmt extends BaseStmt {
  kind: "Call";
  name: string;
  args: ExprSource[];
  into: string | null;
}

export interface ReturnStmt extends BaseStmt {
  kind: "Return";
  expr: ExprSource | null;
}

export interface IfBranch {
  span: Span;
  cond: ExprSource;
  body: Stmt[];
}

export interface IfStmt extends BaseStmt {
  kind: "If";
  // `if` first, then every `elif` in source order
  branches: IfBranch[];
  orElse: Stmt[] | null;
}

export interface WhileStmt extends BaseStmt {
  kind: "While";
  cond: ExprSource;
  body: Stmt[];
}

export interface ForStmt extends BaseStmt {
  kind: "For";
  variable: string;
  start: ExprSource;
  end: ExprSource;
  step: ExprSource | null;
  body: Stmt[];
}

export interface RepeatStmt extends BaseStmt {
  kind: "Repeat";
  count: ExprSource;
  body: Stmt[];
}

export type Stmt =
  | SayStmt
  | LetStmt
  | ConstStmt
  | AskStmt
  | WarnStmt
  | EcoTipStmt
  | SavePowerStmt
  | FuncStmt
  | CallStmt
  | ReturnStmt
  | IfStmt
  | WhileStmt
  | ForStmt
  | RepeatStmt;

export type StmtKind = Stmt["kind"];

// --- Program ---
export interface Program {
  kind: "Program";
  statements: Stmt[];
  lineCount: number;
}
