/**
 * Eco accounting: op cost table, the run's op counter and the energy and
 * CO2 estimate computed when a run completes.
 */
import type { EcoParams } from "./settings.js";

export const OP_COSTS = Object.freeze({
  print: 50,
  loop_check: 5,
  math: 10,
  assign: 5,
  io: 200,
  optimize: 1000,
  other: 5,
  func_call: 20,
});

export type OpCategory = keyof typeof OP_COSTS;

export const ECO_TIPS: readonly string[] = [
  "Turn off unused devices",
  "Reduce loop counts",
  "Prefer simpler math operations",
];

export const HIGH_USE_THRESHOLD = 1000;
export const HIGH_USE_TIP = "Consider reducing loop iterations or heavy math operations";
export const HIGH_USE_WARNING = "High estimated energy use";

const J_PER_KWH = 3.6e6;
const MIN_DURATION_S = 1e-6;

export function savePowerScale(level: number): number {
  return Math.max(0.1, 1 - level * 0.01);
}

export class OpCounter {
  private totalOps = 0;

  get total(): number {
    return this.totalOps;
  }

  /** Charge `times` ops of a category at the given multiplier; returns the ops added. */
  charge(category: OpCategory, scale = 1, times = 1): number {
    const ops = Math.trunc(OP_COSTS[category] * scale) * times;
    this.totalOps += ops;
    return ops;
  }
}

export interface EcoStats {
  totalOps: number;
  energyJ: number;
  energyKWh: number;
  co2G: number;
  tips: string[];
}

export function computeEco(totalOps: number, durationS: number, params: EcoParams): EcoStats {
  const duration = Math.max(durationS, MIN_DURATION_S);
  const energyJ = totalOps * params.energyPerOpJ + duration * params.idlePowerW;
  const energyKWh = energyJ / J_PER_KWH;
  const tips: string[] = [];
  if (totalOps > HIGH_USE_THRESHOLD) tips.push(HIGH_USE_TIP);
  return {
    totalOps,
    energyJ,
    energyKWh,
    co2G: energyKWh * params.co2PerKwhG,
    tips,
  };
}

export function pickEcoTip(totalOps: number): string {
  return ECO_TIPS[totalOps % ECO_TIPS.length] ?? "";
}
