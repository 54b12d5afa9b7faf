/**
 * Run settings: zod schema, defaults and the ceiling clamp.
 */
import { z } from "zod";

const nonNegativeInt = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .nonnegative(`${name} must not be negative`);

const positiveInt = (name: string) => nonNegativeInt(name).positive(`${name} must be greater than 0`);

// deepest call chain the dispatcher runs without exhausting the host stack
export const MAX_CALL_DEPTH = 200;

const positiveNumber = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .positive(`${name} must be greater than 0`)
    .finite(`${name} must be finite`);

const nonNegativeNumber = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .nonnegative(`${name} must not be negative`)
    .finite(`${name} must be finite`);

// Unknown keys are stripped by zod's default object parsing
export const runSettingsSchema = z.object({
  max_steps: positiveInt("max_steps").optional(),
  max_loop: positiveInt("max_loop").optional(),
  max_time_s: positiveNumber("max_time_s").optional(),
  max_output_chars: positiveInt("max_output_chars").optional(),
  max_call_depth: positiveInt("max_call_depth")
    .max(MAX_CALL_DEPTH, `max_call_depth must be at most ${MAX_CALL_DEPTH}`)
    .optional(),
  max_func_params: nonNegativeInt("max_func_params").optional(),
  energy_per_op_J: nonNegativeNumber("energy_per_op_J").optional(),
  idle_power_W: nonNegativeNumber("idle_power_W").optional(),
  co2_per_kwh_g: nonNegativeNumber("co2_per_kwh_g").optional(),
  use_subprocess: z.boolean({ invalid_type_error: "use_subprocess must be a boolean" }).optional(),
  sandbox_timeout_s: positiveNumber("sandbox_timeout_s").optional(),
});

export type RunSettings = z.infer<typeof runSettingsSchema>;

export type FullSettings = Required<RunSettings>;

export const DEFAULT_SETTINGS: Readonly<FullSettings> = Object.freeze({
  max_steps: 100_000,
  max_loop: 10_000,
  max_time_s: 1.5,
  max_output_chars: 5_000,
  max_call_depth: 5,
  max_func_params: 3,
  energy_per_op_J: 1e-9,
  idle_power_W: 0.5,
  co2_per_kwh_g: 475,
  use_subprocess: false,
  sandbox_timeout_s: 2,
});

export interface Limits {
  maxSteps: number;
  maxLoop: number;
  maxTimeMs: number;
  maxOutputChars: number;
  maxCallDepth: number;
  maxFuncParams: number;
}

export interface EcoParams {
  energyPerOpJ: number;
  idlePowerW: number;
  co2PerKwhG: number;
}

export interface ResolvedSettings {
  limits: Readonly<Limits>;
  eco: Readonly<EcoParams>;
  useSubprocess: boolean;
  sandboxTimeoutMs: number;
}

export type SettingsResult =
  | { ok: true; settings: Readonly<ResolvedSettings> }
  | { ok: false; message: string };

/**
 * Validate caller settings and merge them over the defaults. The result is
 * frozen and shared by every block and call of one run.
 */
export function resolveSettings(input: unknown = {}): SettingsResult {
  const parsed = runSettingsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, message: `Invalid settings: ${where}${issue?.message ?? "unknown error"}` };
  }
  const s: FullSettings = { ...DEFAULT_SETTINGS, ...stripUndefined(parsed.data) };
  return {
    ok: true,
    settings: Object.freeze({
      limits: Object.freeze({
        maxSteps: s.max_steps,
        maxLoop: s.max_loop,
        maxTimeMs: s.max_time_s * 1000,
        maxOutputChars: s.max_output_chars,
        maxCallDepth: s.max_call_depth,
        maxFuncParams: s.max_func_params,
      }),
      eco: Object.freeze({
        energyPerOpJ: s.energy_per_op_J,
        idlePowerW: s.idle_power_W,
        co2PerKwhG: s.co2_per_kwh_g,
      }),
      useSubprocess: s.use_subprocess,
      sandboxTimeoutMs: s.sandbox_timeout_s * 1000,
    }),
  };
}

function stripUndefined(settings: RunSettings): RunSettings {
  const out: RunSettings = {};
  for (const [key, value] of Object.entries(settings)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

// Keys a request may lower but never raise
export const CLAMPED_KEYS = [
  "max_steps",
  "max_loop",
  "max_time_s",
  "max_output_chars",
  "max_call_depth",
  "sandbox_timeout_s",
] as const;

/**
 * Clamp the budget keys of a per-run request to server ceilings. Keys the
 * request leaves out take the ceiling; other keys pass through.
 */
export function clampSettings(
  requested: RunSettings,
  ceilings: Readonly<RunSettings> = DEFAULT_SETTINGS
): RunSettings {
  const out: RunSettings = { ...ceilings, ...stripUndefined(requested) };
  for (const key of CLAMPED_KEYS) {
    const ceiling = ceilings[key];
    const value = requested[key];
    if (ceiling === undefined) continue;
    out[key] = value === undefined ? ceiling : Math.min(value, ceiling);
  }
  return out;
}
