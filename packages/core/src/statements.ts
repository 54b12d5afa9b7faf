/**
 * EcoLang statement parser.
 *
 * One pass over the source lines builds the statement tree; block bodies
 * are found with a depth counter over nested openers and `end`. Expression
 * slots keep their text and column and are parsed when they run.
 */
import type * as AST from "./ast.js";
import { EcoRuntimeError, type RunError } from "./diagnostics.js";
import { KEYWORDS } from "./lexer.js";
import { RESERVED_NAMES } from "./validator.js";
import { DEFAULT_SETTINGS } from "./settings.js";

export interface ParseOptions {
  maxFuncParams?: number;
}

export interface ParseResult {
  program?: AST.Program;
  diagnostics: RunError[];
}

interface SourceLine {
  line: number;
  // without trailing whitespace
  raw: string;
  trimmed: string;
  indent: number;
}

interface BlockContext {
  inFunction: boolean;
}

const OPENERS: ReadonlySet<string> = new Set(["if", "while", "for", "repeat", "func"]);
const IDENT = /^[A-Za-z_][A-Za-z0-9_]*$/;
const NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function splitLines(source: string): SourceLine[] {
  return source.split(/\r\n|\r|\n/).map((text, i) => {
    const raw = text.trimEnd();
    const trimmed = raw.trimStart();
    return { line: i + 1, raw, trimmed, indent: raw.length - trimmed.length };
  });
}

function isSkippable(l: SourceLine): boolean {
  return l.trimmed === "" || l.trimmed.startsWith("#");
}

function firstWord(text: string): string {
  return text.split(/\s+/, 1)[0] ?? "";
}

function span(l: SourceLine): AST.Span {
  return { line: l.line, text: l.raw };
}

function syntaxError(l: SourceLine, message: string, column?: number, hint?: string): EcoRuntimeError {
  return new EcoRuntimeError(
    "SYNTAX_ERROR",
    message,
    { line: l.line, column: column ?? l.indent + 1, lineText: l.raw },
    hint
  );
}

/** Expression slot for `trimmed.slice(start, end)`, surrounding blanks removed. */
function slot(l: SourceLine, start: number, end: number = l.trimmed.length): AST.ExprSource {
  const piece = l.trimmed.slice(start, end);
  const lead = piece.length - piece.trimStart().length;
  return { text: piece.trim(), col: l.indent + start + lead + 1 };
}

// Mask of characters outside string literals and at bracket depth 0
function topLevelMask(text: string): boolean[] {
  const mask: boolean[] = [];
  let depth = 0;
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote !== null) {
      mask.push(false);
      if (ch === "\\") {
        mask.push(false);
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      mask.push(false);
      continue;
    }
    if (ch === "(" || ch === "[") depth++;
    mask.push(depth === 0);
    if (ch === ")" || ch === "]") depth = Math.max(0, depth - 1);
  }
  return mask;
}

function isBlank(ch: string): boolean {
  return ch === "" || /\s/.test(ch);
}

/** Index of `word` standing alone at top level, searching from `from`, or -1. */
export function indexOfWord(text: string, word: string, from = 0): number {
  const mask = topLevelMask(text);
  for (let i = from; i + word.length <= text.length; i++) {
    if (
      mask[i] &&
      text.startsWith(word, i) &&
      isBlank(text.charAt(i - 1)) &&
      isBlank(text.charAt(i + word.length))
    ) {
      return i;
    }
  }
  return -1;
}

/** Index of `word` when it ends `text` as a separate top-level word, or -1. */
function trailingWord(text: string, word: string): number {
  const i = text.length - word.length;
  if (i < 0 || !text.endsWith(word) || !isBlank(text.charAt(i - 1))) return -1;
  return topLevelMask(text)[i] ? i : -1;
}

/** [start, end) ranges of `text` between top-level commas. */
export function splitTopLevelCommas(text: string): Array<[number, number]> {
  const mask = topLevelMask(text);
  const ranges: Array<[number, number]> = [];
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    if (mask[i] && text.charAt(i) === ",") {
      ranges.push([start, i]);
      start = i + 1;
    }
  }
  ranges.push([start, text.length]);
  return ranges;
}

class StatementParser {
  constructor(private readonly maxFuncParams: number) {}

  parseBlock(lines: SourceLine[], ctx: BlockContext): AST.Stmt[] {
    const out: AST.Stmt[] = [];
    for (let i = 0; i < lines.length; i++) {
      const l = lines[i];
      if (!l || isSkippable(l)) continue;
      const kw = firstWord(l.trimmed);
      if (OPENERS.has(kw)) {
        const { stmt, endIdx } = this.parseCompound(kw, lines, i, ctx);
        out.push(stmt);
        i = endIdx;
        continue;
      }
      out.push(this.parseSimple(kw, l, ctx));
    }
    return out;
  }

  // --- Block extraction ---

  private extractBlock(lines: SourceLine[], openIdx: number, kw: string): { body: SourceLine[]; endIdx: number } {
    let depth = 0;
    for (let i = openIdx + 1; i < lines.length; i++) {
      const l = lines[i];
      if (!l || isSkippable(l)) continue;
      if (OPENERS.has(firstWord(l.trimmed))) {
        depth++;
      } else if (l.trimmed === "end") {
        if (depth === 0) return { body: lines.slice(openIdx + 1, i), endIdx: i };
        depth--;
      }
    }
    const opener = lines[openIdx];
    if (!opener) throw new EcoRuntimeError("SYNTAX_ERROR", "Missing end for block");
    throw syntaxError(opener, "Missing end for block", undefined, `Add a matching 'end' for this '${kw}'.`);
  }

  private parseCompound(
    kw: string,
    lines: SourceLine[],
    idx: number,
    ctx: BlockContext
  ): { stmt: AST.Stmt; endIdx: number } {
    const l = lines[idx];
    if (!l) throw new EcoRuntimeError("INTERNAL", "Line index out of range");
    const restStart = this.restStart(l, kw);

    switch (kw) {
      case "if": {
        const cond = this.conditionThen(l, restStart, "if");
        const { body, endIdx } = this.extractBlock(lines, idx, kw);
        return { stmt: this.parseIf(l, cond, body, ctx), endIdx };
      }
      case "while": {
        const cond = this.conditionThen(l, restStart, "while");
        const { body, endIdx } = this.extractBlock(lines, idx, kw);
        return {
          stmt: { kind: "While", span: span(l), cond, body: this.parseBlock(body, ctx) },
          endIdx,
        };
      }
      case "for": {
        const header = this.forHeader(l, restStart);
        const { body, endIdx } = this.extractBlock(lines, idx, kw);
        return {
          stmt: { kind: "For", span: span(l), ...header, body: this.parseBlock(body, ctx) },
          endIdx,
        };
      }
      case "repeat": {
        const count = this.repeatCount(l, restStart);
        const { body, endIdx } = this.extractBlock(lines, idx, kw);
        return {
          stmt: { kind: "Repeat", span: span(l), count, body: this.parseBlock(body, ctx) },
          endIdx,
        };
      }
      default: {
        const { name, params } = this.funcHeader(l, restStart, ctx);
        const { body, endIdx } = this.extractBlock(lines, idx, kw);
        return {
          stmt: {
            kind: "Func",
            span: span(l),
            name,
            params,
            body: this.parseBlock(body, { inFunction: true }),
          },
          endIdx,
        };
      }
    }
  }

  // Offset in `trimmed` where the text after the keyword begins
  private restStart(l: SourceLine, kw: string): number {
    const after = l.trimmed.slice(kw.length);
    return kw.length + (after.length - after.trimStart().length);
  }

  private conditionThen(l: SourceLine, restStart: number, kw: "if" | "elif" | "while"): AST.ExprSource {
    const rest = l.trimmed.slice(restStart);
    const thenIdx = trailingWord(rest, "then");
    if (thenIdx < 0) {
      throw syntaxError(
        l,
        `Expected 'then' after ${kw} condition`,
        l.indent + l.trimmed.length + 1,
        `Write: ${kw} <condition> then`
      );
    }
    const cond = slot(l, restStart, restStart + thenIdx);
    if (cond.text === "") {
      throw syntaxError(l, `Expected a condition after '${kw}'`, cond.col);
    }
    return cond;
  }

  private parseIf(l: SourceLine, cond: AST.ExprSource, body: SourceLine[], ctx: BlockContext): AST.IfStmt {
    interface Segment {
      at: SourceLine;
      cond: AST.ExprSource | null;
      lines: SourceLine[];
    }
    const segments: Segment[] = [];
    let current: Segment = { at: l, cond, lines: [] };
    let depth = 0;

    for (const bl of body) {
      if (isSkippable(bl)) continue;
      const w = firstWord(bl.trimmed);
      if (depth === 0 && (w === "elif" || w === "else")) {
        if (current.cond === null) {
          throw syntaxError(bl, `'${w}' after 'else'`, undefined, "'else' must be the last branch of an 'if'.");
        }
        segments.push(current);
        if (w === "else") {
          if (bl.trimmed !== "else") {
            throw syntaxError(bl, "Unexpected text after 'else'", undefined, "Use 'elif <condition> then' for another branch.");
          }
          current = { at: bl, cond: null, lines: [] };
        } else {
          current = { at: bl, cond: this.conditionThen(bl, this.restStart(bl, w), "elif"), lines: [] };
        }
        continue;
      }
      if (OPENERS.has(w)) depth++;
      else if (bl.trimmed === "end") depth--;
      current.lines.push(bl);
    }
    segments.push(current);

    const branches: AST.IfBranch[] = [];
    let orElse: AST.Stmt[] | null = null;
    for (const seg of segments) {
      const stmts = this.parseBlock(seg.lines, ctx);
      if (seg.cond === null) orElse = stmts;
      else branches.push({ span: span(seg.at), cond: seg.cond, body: stmts });
    }
    return { kind: "If", span: span(l), branches, orElse };
  }

  private forHeader(
    l: SourceLine,
    restStart: number
  ): { variable: string; start: AST.ExprSource; end: AST.ExprSource; step: AST.ExprSource | null } {
    const usage = "Use: for name = start to end [step s]";
    const rest = l.trimmed.slice(restStart);
    const eq = rest.indexOf("=");
    if (eq < 0) throw syntaxError(l, "Invalid for syntax", undefined, usage);
    const variable = rest.slice(0, eq).trim();
    this.checkName(l, variable, "for");

    const toIdx = indexOfWord(rest, "to", eq + 1);
    if (toIdx < 0) throw syntaxError(l, "Invalid for syntax", undefined, usage);
    const stepIdx = indexOfWord(rest, "step", toIdx + 2);

    const start = slot(l, restStart + eq + 1, restStart + toIdx);
    const end = slot(l, restStart + toIdx + 2, stepIdx < 0 ? undefined : restStart + stepIdx);
    const step = stepIdx < 0 ? null : slot(l, restStart + stepIdx + 4);
    if (start.text === "" || end.text === "" || (step !== null && step.text === "")) {
      throw syntaxError(l, "Invalid for syntax", undefined, usage);
    }
    return { variable, start, end, step };
  }

  private repeatCount(l: SourceLine, restStart: number): AST.ExprSource {
    const rest = l.trimmed.slice(restStart);
    const timesIdx = trailingWord(rest, "times");
    if (timesIdx < 0) {
      throw syntaxError(
        l,
        "Expected 'times' at end of repeat",
        l.indent + l.trimmed.length + 1,
        "Write: repeat <count> times"
      );
    }
    const count = slot(l, restStart, restStart + timesIdx);
    if (count.text === "") throw syntaxError(l, "Expected a count before 'times'", count.col);
    return count;
  }

  private funcHeader(l: SourceLine, restStart: number, ctx: BlockContext): { name: string; params: string[] } {
    if (ctx.inFunction) {
      throw syntaxError(l, "Functions cannot be defined inside another function");
    }
    const words = l.trimmed.slice(restStart).split(/\s+/).filter((w) => w !== "");
    const [name, ...params] = words;
    if (name === undefined) {
      throw syntaxError(l, "Expected a function name after 'func'", undefined, "Write: func <name> [params...]");
    }
    this.checkName(l, name, "function");
    const seen = new Set<string>();
    for (const p of params) {
      this.checkName(l, p, "parameter");
      if (seen.has(p)) throw syntaxError(l, `Duplicate parameter '${p}'`);
      seen.add(p);
    }
    if (params.length > this.maxFuncParams) {
      throw syntaxError(l, `Too many params (max ${this.maxFuncParams})`);
    }
    return { name, params };
  }

  private checkName(l: SourceLine, name: string, what: string): void {
    if (RESERVED_NAMES.has(name)) {
      throw syntaxError(l, `'${name}' is a reserved name`);
    }
    if (!IDENT.test(name) || KEYWORDS.has(name)) {
      throw syntaxError(l, `Invalid ${what} name '${name}'`);
    }
  }

  // --- Single-line statements ---

  private parseSimple(kw: string, l: SourceLine, ctx: BlockContext): AST.Stmt {
    const restStart = this.restStart(l, kw);
    const rest = l.trimmed.slice(restStart);

    switch (kw) {
      case "say":
      case "warn": {
        if (rest === "") throw syntaxError(l, `Expected an expression after '${kw}'`);
        const expr = slot(l, restStart);
        return kw === "say"
          ? { kind: "Say", span: span(l), expr }
          : { kind: "Warn", span: span(l), expr };
      }

      case "let":
      case "const": {
        const eq = rest.indexOf("=");
        if (eq < 0) {
          throw syntaxError(l, `Expected '=' in ${kw}`, undefined, `Write: ${kw} name = value`);
        }
        const name = rest.slice(0, eq).trim();
        this.checkName(l, name, "variable");
        const expr = slot(l, restStart + eq + 1);
        if (expr.text === "") throw syntaxError(l, "Expected an expression after '='", expr.col);
        return kw === "let"
          ? { kind: "Let", span: span(l), name, expr }
          : { kind: "Const", span: span(l), name, expr };
      }

      case "ask": {
        if (rest === "") throw syntaxError(l, "Expected a variable name after 'ask'");
        this.checkName(l, rest, "variable");
        return { kind: "Ask", span: span(l), name: rest };
      }

      case "ecoTip":
        if (rest !== "") throw syntaxError(l, "'ecoTip' takes no arguments");
        return { kind: "EcoTip", span: span(l) };

      case "savePower": {
        if (!NUMBER.test(rest)) {
          throw syntaxError(l, "savePower expects a number", undefined, "Write: savePower <level>");
        }
        return { kind: "SavePower", span: span(l), level: Number(rest) };
      }

      case "call":
        return this.parseCall(l, restStart);

      case "return": {
        if (!ctx.inFunction) {
          throw syntaxError(l, "'return' outside of function", undefined, "Use 'return' inside a 'func' block.");
        }
        return { kind: "Return", span: span(l), expr: rest === "" ? null : slot(l, restStart) };
      }

      case "else":
      case "elif":
        throw syntaxError(l, `'${kw}' without matching 'if'`);

      case "end":
        throw syntaxError(l, "Unexpected 'end'", undefined, "Remove it or open a block before it.");

      default:
        throw syntaxError(l, `Unknown statement: ${l.trimmed}`, undefined, "Check the command name or syntax.");
    }
  }

  private parseCall(l: SourceLine, restStart: number): AST.CallStmt {
    const usage = "Write: call <name> [with a, b] [into var]";
    const rest = l.trimmed.slice(restStart);
    const name = firstWord(rest);
    if (name === "") throw syntaxError(l, "Expected a function name after 'call'", undefined, usage);
    if (!IDENT.test(name)) throw syntaxError(l, `Invalid function name '${name}'`, undefined, usage);

    const withIdx = indexOfWord(rest, "with", name.length);
    const intoIdx = indexOfWord(rest, "into", name.length);
    const clauseIdx = withIdx >= 0 ? withIdx : intoIdx >= 0 ? intoIdx : rest.length;
    if (rest.slice(name.length, clauseIdx).trim() !== "") {
      throw syntaxError(l, "Expected 'with' or 'into' after function name", undefined, usage);
    }
    if (withIdx >= 0 && intoIdx >= 0 && intoIdx < withIdx) {
      throw syntaxError(l, "'into' must follow the arguments", undefined, usage);
    }

    const args: AST.ExprSource[] = [];
    if (withIdx >= 0) {
      const argsStart = withIdx + 4;
      const argsEnd = intoIdx >= 0 ? intoIdx : rest.length;
      const argsText = rest.slice(argsStart, argsEnd);
      if (argsText.trim() === "") throw syntaxError(l, "Expected arguments after 'with'", undefined, usage);
      for (const [s, e] of splitTopLevelCommas(argsText)) {
        const arg = slot(l, restStart + argsStart + s, restStart + argsStart + e);
        if (arg.text === "") throw syntaxError(l, "Empty argument in call", arg.col, usage);
        args.push(arg);
      }
    }

    let into: string | null = null;
    if (intoIdx >= 0) {
      into = rest.slice(intoIdx + 4).trim();
      if (into === "") throw syntaxError(l, "Expected a variable name after 'into'", undefined, usage);
      this.checkName(l, into, "variable");
    }
    return { kind: "Call", span: span(l), name, args, into };
  }
}

/**
 * Parse EcoLang source into a statement tree. Stops at the first syntax
 * error, which is returned as a diagnostic.
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const lines = splitLines(source);
  const parser = new StatementParser(options.maxFuncParams ?? DEFAULT_SETTINGS.max_func_params);
  try {
    const statements = parser.parseBlock(lines, { inFunction: false });
    return {
      program: { kind: "Program", statements, lineCount: lines.length },
      diagnostics: [],
    };
  } catch (e) {
    if (e instanceof EcoRuntimeError) return { diagnostics: [e.toRunError()] };
    throw e;
  }
}
