/**
 * Line-delimited JSON protocol between the runtime and the sandbox worker.
 */
import { z } from "zod";
import type { Value } from "@ecolang/core";

export const valueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([z.number().finite(), z.string(), z.boolean(), z.null(), z.array(valueSchema)])
);

export const sandboxRequestSchema = z.object({
  code: z.string({ required_error: "sandbox request requires a 'code' field" }),
});

export const sandboxResponseSchema = z.object({
  result: valueSchema,
  error: z.string().nullable(),
});

export type SandboxRequest = z.infer<typeof sandboxRequestSchema>;

export interface SandboxResponse {
  result: Value;
  error: string | null;
}

export function encodeRequest(code: string): string {
  const request: SandboxRequest = { code };
  return JSON.stringify(request) + "\n";
}

export function encodeResponse(response: SandboxResponse): string {
  return JSON.stringify(response) + "\n";
}

/** Decode the last non-empty stdout line; null when it is not a valid response. */
export function decodeResponse(stdout: string): SandboxResponse | null {
  const line = stdout
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l !== "")
    .pop();
  if (line === undefined) return null;
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = sandboxResponseSchema.safeParse(data);
  return parsed.success ? { result: parsed.data.result, error: parsed.data.error } : null;
}
