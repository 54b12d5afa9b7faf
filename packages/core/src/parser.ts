/**
 * EcoLang expression parser using Chevrotain.
 * Produces an expression AST from the text of one statement slot.
 *
 * The grammar is wider than what EcoLang evaluates: attribute access,
 * subscripts, list displays, lambdas and yields are parsed so that the
 * validator can name them when it rejects them.
 */
import { CstParser, type CstElement, type CstNode, type IToken } from "chevrotain";
import {
  allTokens,
  EcoLexer,
  AdditiveOp,
  MultiplicativeOp,
  CompareOp,
  StarStar,
  And,
  Or,
  Not,
  True,
  False,
  Lambda,
  Yield,
  For,
  In,
  FloatLit,
  IntLit,
  StringLit,
  Ident,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Comma,
  Colon,
  Dot,
} from "./lexer.js";
import type * as AST from "./ast.js";
import { ExpressionError } from "./diagnostics.js";

class ExpressionCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  expression = this.RULE("expression", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.lambdaExpr) },
      { ALT: () => this.SUBRULE(this.yieldExpr) },
      { ALT: () => this.SUBRULE(this.orExpr) },
    ]);
  });

  lambdaExpr = this.RULE("lambdaExpr", () => {
    this.CONSUME(Lambda);
    this.MANY_SEP({ SEP: Comma, DEF: () => this.CONSUME(Ident) });
    this.CONSUME(Colon);
    this.SUBRULE(this.expression);
  });

  yieldExpr = this.RULE("yieldExpr", () => {
    this.CONSUME(Yield);
    this.OPTION(() => this.SUBRULE(this.orExpr));
  });

  orExpr = this.RULE("orExpr", () => {
    this.SUBRULE(this.andExpr);
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.andExpr);
    });
  });

  andExpr = this.RULE("andExpr", () => {
    this.SUBRULE(this.notExpr);
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.notExpr);
    });
  });

  notExpr = this.RULE("notExpr", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Not);
          this.SUBRULE(this.notExpr);
        },
      },
      { ALT: () => this.SUBRULE(this.comparison) },
    ]);
  });

  comparison = this.RULE("comparison", () => {
    this.SUBRULE(this.additive);
    this.MANY(() => {
      this.CONSUME(CompareOp);
      this.SUBRULE2(this.additive);
    });
  });

  additive = this.RULE("additive", () => {
    this.SUBRULE(this.multiplicative);
    this.MANY(() => {
      this.CONSUME(AdditiveOp);
      this.SUBRULE2(this.multiplicative);
    });
  });

  multiplicative = this.RULE("multiplicative", () => {
    this.SUBRULE(this.unary);
    this.MANY(() => {
      this.CONSUME(MultiplicativeOp);
      this.SUBRULE2(this.unary);
    });
  });

  unary = this.RULE("unary", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(AdditiveOp);
          this.SUBRULE(this.unary);
        },
      },
      { ALT: () => this.SUBRULE(this.power) },
    ]);
  });

  // ** binds tighter than unary minus on its left and is right-associative
  power = this.RULE("power", () => {
    this.SUBRULE(this.postfix);
    this.OPTION(() => {
      this.CONSUME(StarStar);
      this.SUBRULE(this.unary);
    });
  });

  postfix = this.RULE("postfix", () => {
    this.SUBRULE(this.atom);
    this.MANY(() => this.SUBRULE(this.suffix));
  });

  suffix = this.RULE("suffix", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.callSuffix) },
      { ALT: () => this.SUBRULE(this.attributeSuffix) },
      { ALT: () => this.SUBRULE(this.subscriptSuffix) },
    ]);
  });

  callSuffix = this.RULE("callSuffix", () => {
    this.CONSUME(LParen);
    this.MANY_SEP({ SEP: Comma, DEF: () => this.SUBRULE(this.expression) });
    this.CONSUME(RParen);
  });

  attributeSuffix = this.RULE("attributeSuffix", () => {
    this.CONSUME(Dot);
    this.CONSUME(Ident);
  });

  subscriptSuffix = this.RULE("subscriptSuffix", () => {
    this.CONSUME(LBracket);
    this.SUBRULE(this.expression);
    this.CONSUME(RBracket);
  });

  atom = this.RULE("atom", () => {
    this.OR([
      { ALT: () => this.CONSUME(FloatLit) },
      { ALT: () => this.CONSUME(IntLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Ident) },
      { ALT: () => this.SUBRULE(this.parenExpr) },
      { ALT: () => this.SUBRULE(this.listDisplay) },
    ]);
  });

  parenExpr = this.RULE("parenExpr", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
  });

  listDisplay = this.RULE("listDisplay", () => {
    this.CONSUME(LBracket);
    this.OPTION(() => {
      this.SUBRULE(this.expression);
      this.OPTION2(() => this.SUBRULE(this.compFor));
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.expression);
      });
    });
    this.CONSUME(RBracket);
  });

  compFor = this.RULE("compFor", () => {
    this.CONSUME(For);
    this.CONSUME(Ident);
    this.CONSUME(In);
    this.SUBRULE(this.orExpr);
  });
}

// Singleton parser instance
const cstParser = new ExpressionCstParser();

// --- CST to AST visitor ---

function isNode(e: CstElement): e is CstNode {
  return "children" in e;
}

function nodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter(isNode);
}

function tokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter((e): e is IToken => !isNode(e));
}

function firstNode(cst: CstNode, key: string): CstNode {
  const found = nodes(cst, key)[0];
  if (!found) throw new ExpressionError(`Malformed expression: missing ${key}`);
  return found;
}

function col(token: IToken): number {
  return Number.isFinite(token.startColumn) ? token.startColumn ?? 1 : 1;
}

function visitExpression(cst: CstNode): AST.Expr {
  if (cst.children["lambdaExpr"]) return visitLambda(firstNode(cst, "lambdaExpr"));
  if (cst.children["yieldExpr"]) return visitYield(firstNode(cst, "yieldExpr"));
  return visitOr(firstNode(cst, "orExpr"));
}

function visitLambda(cst: CstNode): AST.LambdaExpr {
  const kw = tokens(cst, "Lambda")[0];
  return {
    kind: "LambdaExpr",
    col: kw ? col(kw) : 1,
    params: tokens(cst, "Ident").map((t) => t.image),
    body: visitExpression(firstNode(cst, "expression")),
  };
}

function visitYield(cst: CstNode): AST.YieldExpr {
  const kw = tokens(cst, "Yield")[0];
  const value = nodes(cst, "orExpr")[0];
  return { kind: "YieldExpr", col: kw ? col(kw) : 1, value: value ? visitOr(value) : null };
}

function visitLogical(
  cst: CstNode,
  childKey: string,
  op: "and" | "or",
  visitChild: (n: CstNode) => AST.Expr
): AST.Expr {
  const values = nodes(cst, childKey).map(visitChild);
  const head = values[0];
  if (!head) throw new ExpressionError(`Malformed expression: missing ${childKey}`);
  if (values.length === 1) return head;
  return { kind: "LogicalExpr", col: head.col, op, values };
}

function visitOr(cst: CstNode): AST.Expr {
  return visitLogical(cst, "andExpr", "or", visitAnd);
}

function visitAnd(cst: CstNode): AST.Expr {
  return visitLogical(cst, "notExpr", "and", visitNot);
}

function visitNot(cst: CstNode): AST.Expr {
  const not = tokens(cst, "Not")[0];
  if (not) {
    return {
      kind: "UnaryExpr",
      col: col(not),
      op: "not",
      operand: visitNot(firstNode(cst, "notExpr")),
    };
  }
  return visitComparison(firstNode(cst, "comparison"));
}

function visitComparison(cst: CstNode): AST.Expr {
  const operands = nodes(cst, "additive").map(visitAdditive);
  const ops = tokens(cst, "CompareOp");
  const [left, ...comparators] = operands;
  if (!left) throw new ExpressionError("Malformed expression: missing operand");
  if (ops.length === 0) return left;
  return {
    kind: "CompareExpr",
    col: left.col,
    left,
    ops: ops.map((t) => toCompareOp(t.image)),
    comparators,
  };
}

// Folds `a op b op c` left to right
function visitBinaryChain(
  cst: CstNode,
  childKey: string,
  opKey: string,
  visitChild: (n: CstNode) => AST.Expr
): AST.Expr {
  const operands = nodes(cst, childKey).map(visitChild);
  const ops = tokens(cst, opKey);
  let acc = operands[0];
  if (!acc) throw new ExpressionError(`Malformed expression: missing ${childKey}`);
  for (let i = 0; i < ops.length; i++) {
    const right = operands[i + 1];
    const opToken = ops[i];
    if (!right || !opToken) break;
    acc = { kind: "BinaryExpr", col: acc.col, op: toBinaryOp(opToken.image), left: acc, right };
  }
  return acc;
}

function visitAdditive(cst: CstNode): AST.Expr {
  return visitBinaryChain(cst, "multiplicative", "AdditiveOp", visitMultiplicative);
}

function visitMultiplicative(cst: CstNode): AST.Expr {
  return visitBinaryChain(cst, "unary", "MultiplicativeOp", visitUnary);
}

function visitUnary(cst: CstNode): AST.Expr {
  const sign = tokens(cst, "AdditiveOp")[0];
  if (sign) {
    return {
      kind: "UnaryExpr",
      col: col(sign),
      op: sign.image === "-" ? "-" : "+",
      operand: visitUnary(firstNode(cst, "unary")),
    };
  }
  return visitPower(firstNode(cst, "power"));
}

function visitPower(cst: CstNode): AST.Expr {
  const base = visitPostfix(firstNode(cst, "postfix"));
  const exponent = nodes(cst, "unary")[0];
  if (!exponent) return base;
  return { kind: "BinaryExpr", col: base.col, op: "**", left: base, right: visitUnary(exponent) };
}

function visitPostfix(cst: CstNode): AST.Expr {
  let acc = visitAtom(firstNode(cst, "atom"));
  for (const suffix of nodes(cst, "suffix")) {
    const call = nodes(suffix, "callSuffix")[0];
    const attribute = nodes(suffix, "attributeSuffix")[0];
    const subscript = nodes(suffix, "subscriptSuffix")[0];
    if (call) {
      acc = {
        kind: "CallExpr",
        col: acc.col,
        callee: acc,
        args: nodes(call, "expression").map(visitExpression),
      };
    } else if (attribute) {
      acc = {
        kind: "AttributeExpr",
        col: acc.col,
        object: acc,
        attr: tokens(attribute, "Ident")[0]?.image ?? "",
      };
    } else if (subscript) {
      acc = {
        kind: "SubscriptExpr",
        col: acc.col,
        object: acc,
        index: visitExpression(firstNode(subscript, "expression")),
      };
    }
  }
  return acc;
}

function visitAtom(cst: CstNode): AST.Expr {
  const children = cst.children;
  if (children["parenExpr"]) {
    return visitExpression(firstNode(firstNode(cst, "parenExpr"), "expression"));
  }
  if (children["listDisplay"]) {
    return visitListDisplay(firstNode(cst, "listDisplay"));
  }
  const float = tokens(cst, "FloatLit")[0] ?? tokens(cst, "IntLit")[0];
  if (float) {
    const value = Number(float.image);
    if (!Number.isFinite(value)) {
      throw new ExpressionError("Number literal out of range", col(float));
    }
    return { kind: "NumberLiteral", col: col(float), value };
  }
  const str = tokens(cst, "StringLit")[0];
  if (str) {
    return { kind: "StringLiteral", col: col(str), value: decodeString(str.image) };
  }
  const t = tokens(cst, "True")[0];
  if (t) return { kind: "BoolLiteral", col: col(t), value: true };
  const f = tokens(cst, "False")[0];
  if (f) return { kind: "BoolLiteral", col: col(f), value: false };
  const id = tokens(cst, "Ident")[0];
  if (id) return { kind: "Identifier", col: col(id), name: id.image };
  throw new ExpressionError("Malformed expression: unknown atom");
}

function visitListDisplay(cst: CstNode): AST.Expr {
  const open = tokens(cst, "LBracket")[0];
  const at = open ? col(open) : 1;
  const elements = nodes(cst, "expression").map(visitExpression);
  const comp = nodes(cst, "compFor")[0];
  if (!comp) return { kind: "ListExpr", col: at, elements };
  const element = elements[0];
  if (!element || elements.length > 1) {
    throw new ExpressionError("Syntax error in expression", at);
  }
  return {
    kind: "ListCompExpr",
    col: at,
    element,
    target: tokens(comp, "Ident")[0]?.image ?? "",
    iter: visitOr(firstNode(comp, "orExpr")),
  };
}

function toCompareOp(image: string): AST.CompareOp {
  switch (image) {
    case "==":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=":
      return image;
    default:
      throw new ExpressionError(`Unknown comparison operator '${image}'`);
  }
}

function toBinaryOp(image: string): AST.BinaryOp {
  switch (image) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "%":
    case "//":
      return image;
    default:
      throw new ExpressionError(`Unknown operator '${image}'`);
  }
}

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

// Strips the quotes; unknown escapes are kept verbatim
export function decodeString(image: string): string {
  const body = image.slice(1, -1);
  return body.replace(/\\(.)/g, (whole: string, ch: string) => ESCAPES[ch] ?? whole);
}

// --- Entry point ---

const CACHE_LIMIT = 512;
const cache = new Map<string, AST.Expr>();

/**
 * Parse one expression. Throws ExpressionError with a column relative to
 * `text` on lexical or syntax errors. Results are cached by text.
 */
export function parseExpression(text: string): AST.Expr {
  const cached = cache.get(text);
  if (cached) return cached;

  const lexResult = EcoLexer.tokenize(text);
  const lexError = lexResult.errors[0];
  if (lexError) {
    throw new ExpressionError("Syntax error in expression", lexError.column ?? 1);
  }
  if (lexResult.tokens.length === 0) {
    throw new ExpressionError("Empty expression", 1);
  }

  let expr: AST.Expr;
  try {
    cstParser.input = lexResult.tokens;
    const cst = cstParser.expression();
    const parseError = cstParser.errors[0];
    if (parseError) {
      const at = parseError.token.startColumn;
      throw new ExpressionError(
        "Syntax error in expression",
        at !== undefined && Number.isFinite(at) ? at : text.length + 1
      );
    }
    expr = visitExpression(cst);
  } catch (e) {
    if (e instanceof ExpressionError) throw e;
    if (e instanceof RangeError) throw new ExpressionError("Expression is too deeply nested", 1);
    throw new ExpressionError(`Syntax error in expression: ${String(e)}`, 1);
  }

  if (cache.size >= CACHE_LIMIT) cache.clear();
  cache.set(text, expr);
  return expr;
}
