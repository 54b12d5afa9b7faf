/**
 * ecolang settings - effective run ceilings and where they came from
 */
import { resolveConfig } from "./config.js";

export async function runSettings(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  for (const skipped of resolved.skipped) {
    console.error(`warning: ignored settings file ${skipped.path}: ${skipped.reason}`);
  }

  if (opts.json) {
    console.log(
      JSON.stringify({ source: resolved.source, path: resolved.path, settings: resolved.settings }, null, 2)
    );
    return 0;
  }

  console.log("Effective EcoLang settings");
  console.log(`  Source: ${resolved.source}`);
  console.log(`  Path:   ${resolved.path ?? "(none)"}`);
  for (const [key, value] of Object.entries(resolved.settings)) {
    console.log(`  ${key.padEnd(18)}${String(value)}`);
  }
  return 0;
}
