/**
 * @ecolang/sandbox - out-of-process runner for EcoLang sandbox programs
 */
export { ProcessSandbox, workerCommand, withCpuLimit } from "./runner.js";
export type { Command, ProcessSandboxOptions } from "./runner.js";
export { safeExec } from "./safe-exec.js";
export {
  valueSchema,
  sandboxRequestSchema,
  sandboxResponseSchema,
  encodeRequest,
  encodeResponse,
  decodeResponse,
} from "./protocol.js";
export type { SandboxRequest, SandboxResponse } from "./protocol.js";
