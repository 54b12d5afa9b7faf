import * as fs from "node:fs";

export type SourceResult = { ok: true; text: string } | { ok: false; message: string };

/** Read a program file; `-` reads stdin. */
export function readSource(file: string): SourceResult {
  try {
    return { ok: true, text: fs.readFileSync(file === "-" ? 0 : file, "utf-8") };
  } catch (e) {
    return { ok: false, message: e instanceof Error ? e.message : String(e) };
  }
}
