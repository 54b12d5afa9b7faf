/**
 * @ecolang/core - EcoLang runtime core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { parse } from "./statements.js";
export type { ParseResult, ParseOptions } from "./statements.js";
export { parseExpression } from "./parser.js";
export {
  validateExpression,
  validateProgram,
  EXPRESSION_PROFILE,
  SANDBOX_PROFILE,
  KNOWN_BUILTINS,
  DANGEROUS_NAMES,
  RESERVED_NAMES,
} from "./validator.js";
export type { ValidationProfile } from "./validator.js";
export { evaluate, evalExpr, MAX_EXPONENT } from "./evaluator.js";
export type { EvalStats } from "./evaluator.js";
export {
  isTruthy,
  stringify,
  deepEqual,
  isValue,
  typeName,
  checkList,
  MAX_STRING_LENGTH,
  MAX_LIST_LENGTH,
  MAX_LIST_DEPTH,
} from "./values.js";
export type { Value, Scope } from "./values.js";
export { execute } from "./interpreter.js";
export type {
  ExecOptions,
  Inputs,
  RunResult,
  TraceEvent,
  TraceEventType,
  TraceData,
} from "./interpreter.js";
export { OP_COSTS, ECO_TIPS, computeEco } from "./eco.js";
export type { EcoStats, OpCategory } from "./eco.js";
export {
  runSettingsSchema,
  resolveSettings,
  clampSettings,
  DEFAULT_SETTINGS,
  CLAMPED_KEYS,
  MAX_CALL_DEPTH,
} from "./settings.js";
export type { RunSettings, FullSettings, ResolvedSettings, Limits, EcoParams } from "./settings.js";
export type { SandboxRunner, SandboxOutcome, SandboxLimits } from "./sandbox.js";
