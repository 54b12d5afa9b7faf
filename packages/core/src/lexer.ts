/**
 * EcoLang expression lexer using Chevrotain.
 *
 * Statements are recognised line by line in statements.ts; this lexer only
 * sees the expression text of a statement (or a sandbox program line).
 */
import { createToken, Lexer } from "chevrotain";

// Identifiers are declared first so keywords can name them as longer_alt
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

// Keywords
export const And = createToken({ name: "And", pattern: /and/, longer_alt: Ident });
export const Or = createToken({ name: "Or", pattern: /or/, longer_alt: Ident });
export const Not = createToken({ name: "Not", pattern: /not/, longer_alt: Ident });
export const True = createToken({ name: "True", pattern: /true|True/, longer_alt: Ident });
export const False = createToken({ name: "False", pattern: /false|False/, longer_alt: Ident });
export const Lambda = createToken({ name: "Lambda", pattern: /lambda/, longer_alt: Ident });
export const Yield = createToken({ name: "Yield", pattern: /yield/, longer_alt: Ident });
export const For = createToken({ name: "For", pattern: /for/, longer_alt: Ident });
export const In = createToken({ name: "In", pattern: /in/, longer_alt: Ident });

export const KEYWORDS: ReadonlySet<string> = new Set([
  "and", "or", "not", "true", "false", "True", "False", "lambda", "yield", "for", "in",
]);

// Literals (no leading sign: unary minus is an operator)
export const FloatLit = createToken({
  name: "FloatLit",
  pattern: /(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?|\d+[eE][+-]?\d+/,
});
export const IntLit = createToken({ name: "IntLit", pattern: /\d+/ });
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\\n]|\\.)*"|'(?:[^'\\\n]|\\.)*'/,
});

// Operator categories; the parser consumes the category and the visitor
// reads the concrete image
export const AdditiveOp = createToken({ name: "AdditiveOp", pattern: Lexer.NA });
export const MultiplicativeOp = createToken({ name: "MultiplicativeOp", pattern: Lexer.NA });
export const CompareOp = createToken({ name: "CompareOp", pattern: Lexer.NA });

export const StarStar = createToken({ name: "StarStar", pattern: /\*\*/ });
export const SlashSlash = createToken({
  name: "SlashSlash",
  pattern: /\/\//,
  categories: [MultiplicativeOp],
});
export const Plus = createToken({ name: "Plus", pattern: /\+/, categories: [AdditiveOp] });
export const Minus = createToken({ name: "Minus", pattern: /-/, categories: [AdditiveOp] });
export const Star = createToken({ name: "Star", pattern: /\*/, categories: [MultiplicativeOp] });
export const Slash = createToken({ name: "Slash", pattern: /\//, categories: [MultiplicativeOp] });
export const Percent = createToken({ name: "Percent", pattern: /%/, categories: [MultiplicativeOp] });

// Comparison operators (multi-char before single-char)
export const EqEq = createToken({ name: "EqEq", pattern: /==/, categories: [CompareOp] });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/, categories: [CompareOp] });
export const LtEq = createToken({ name: "LtEq", pattern: /<=/, categories: [CompareOp] });
export const GtEq = createToken({ name: "GtEq", pattern: />=/, categories: [CompareOp] });
export const Lt = createToken({ name: "Lt", pattern: /</, categories: [CompareOp] });
export const Gt = createToken({ name: "Gt", pattern: />/, categories: [CompareOp] });

// Punctuation
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const Colon = createToken({ name: "Colon", pattern: /:/ });
export const Dot = createToken({ name: "Dot", pattern: /\./ });

export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  line_breaks: true,
  group: Lexer.SKIPPED,
});

// Token order matters: longer/more specific tokens first
export const allTokens = [
  WhiteSpace,
  Newline,
  // Multi-char operators first (order critical)
  StarStar,   // ** before *
  SlashSlash, // // before /
  EqEq,
  BangEq,
  LtEq,
  GtEq,
  // Keywords (before Ident)
  And,
  Or,
  Not,
  True,
  False,
  Lambda,
  Yield,
  For,
  In,
  // Literals: float before int, so "1.5" is not split
  FloatLit,
  IntLit,
  StringLit,
  Ident,
  // Single-char operators and punctuation
  Lt,
  Gt,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Comma,
  Colon,
  Dot,
  // Categories are never matched directly
  AdditiveOp,
  MultiplicativeOp,
  CompareOp,
];

export const EcoLexer = new Lexer(allTokens);
