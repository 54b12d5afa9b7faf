/**
 * Sandbox worker process: reads one request from stdin, answers on stdout.
 * Exits 1 when the request itself is malformed.
 */
import { encodeResponse, sandboxRequestSchema } from "./protocol.js";
import { safeExec } from "./safe-exec.js";

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    process.stdin.setEncoding("utf-8");
    process.stdin.on("data", (chunk: string) => {
      data += chunk;
    });
    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

async function main(): Promise<number> {
  const raw = await readStdin();
  let payload: unknown = null;
  try {
    payload = JSON.parse(raw);
  } catch (e) {
    process.stderr.write(`bad_payload: ${e instanceof Error ? e.message : String(e)}\n`);
  }
  const request = sandboxRequestSchema.safeParse(payload);
  if (!request.success) {
    process.stdout.write(encodeResponse({ result: null, error: "bad_payload" }));
    return 1;
  }
  process.stdout.write(encodeResponse(safeExec(request.data.code)));
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    process.stderr.write(`${e instanceof Error ? e.message : String(e)}\n`);
    process.exitCode = 1;
  }
);
