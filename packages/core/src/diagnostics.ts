/**
 * EcoLang error records and their rendering.
 */

export type ErrorCode =
  | "SYNTAX_ERROR"
  | "RUNTIME_ERROR"
  | "TIMEOUT"
  | "STEP_LIMIT"
  | "OUTPUT_LIMIT"
  | "SUBPROCESS_ERROR"
  | "SUBPROCESS_FAILED"
  | "CONFIG_ERROR"
  // host-side file access; execute() never returns it
  | "IO_ERROR"
  | "INTERNAL";

export const BUDGET_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "TIMEOUT",
  "STEP_LIMIT",
  "OUTPUT_LIMIT",
]);

export interface Position {
  line?: number;
  column?: number;
  lineText?: string;
}

export interface RunError extends Position {
  code: ErrorCode;
  message: string;
  hint?: string;
}

export function makeError(
  code: ErrorCode,
  message: string,
  position?: Position,
  hint?: string
): RunError {
  const err: RunError = position ? withPosition({ code, message }, position) : { code, message };
  if (hint !== undefined) err.hint = hint;
  return err;
}

/**
 * Fill in line, column and source text the error does not carry yet.
 * Fields already present are kept, so the innermost statement wins.
 */
export function withPosition(err: RunError, position: Position): RunError {
  const out: RunError = { ...err };
  if (out.line === undefined && position.line !== undefined) out.line = position.line;
  if (out.column === undefined && position.column !== undefined) out.column = position.column;
  if (out.lineText === undefined && position.lineText !== undefined) {
    out.lineText = position.lineText;
  }
  return out;
}

/**
 * Runtime failure carrying an error code; converted to a RunError at the
 * execute() boundary.
 */
export class EcoRuntimeError extends Error {
  readonly code: ErrorCode;
  position: Position;
  readonly hint?: string;

  constructor(code: ErrorCode, message: string, position: Position = {}, hint?: string) {
    super(message);
    this.name = "EcoRuntimeError";
    this.code = code;
    this.position = position;
    this.hint = hint;
  }

  positioned(position: Position): this {
    const { line, column, lineText } = withPosition(this.toRunError(), position);
    this.position = {};
    if (line !== undefined) this.position.line = line;
    if (column !== undefined) this.position.column = column;
    if (lineText !== undefined) this.position.lineText = lineText;
    return this;
  }

  toRunError(): RunError {
    return makeError(this.code, this.message, this.position, this.hint);
  }
}

export function formatDiagnostic(d: RunError, pretty: boolean, file = "<input>"): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.line !== undefined ? `${file}:${d.line}:${d.column ?? 1}` : file;
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
  if (d.lineText !== undefined) {
    out += `\n   | ${d.lineText}`;
  }
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: RunError[], pretty: boolean, file?: string): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true, file)).join("\n\n");
}

/**
 * Failure while parsing, validating or evaluating one expression. The
 * column is relative to the expression text; statements translate it into
 * a RUNTIME_ERROR at the source position.
 */
export class ExpressionError extends Error {
  readonly column?: number;

  constructor(message: string, column?: number) {
    super(message);
    this.name = "ExpressionError";
    this.column = column;
  }
}
