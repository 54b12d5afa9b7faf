/**
 * Resource governor: step, time, loop and output budgets of one run.
 * Owns the run's output and warning lists.
 */
import { EcoRuntimeError } from "./diagnostics.js";
import type { OpCounter } from "./eco.js";
import type { Limits } from "./settings.js";

export type LoopKind = "repeat" | "while" | "for";

export interface BudgetEvent {
  budget: "steps" | "time" | "output" | "loop" | "ops";
  limit: number;
  actual: number;
}

const LOOP_LABELS: Record<LoopKind, string> = {
  repeat: "Repeat",
  while: "While",
  for: "For",
};

export class Governor {
  readonly output: string[] = [];
  readonly warnings: string[] = [];
  private steps = 0;
  private outputChars = 0;
  private readonly startMs: number;

  constructor(
    private readonly limits: Readonly<Limits>,
    private readonly counter: OpCounter,
    private readonly clock: () => number,
    private readonly onBudgetExceeded: (event: BudgetEvent) => void = () => {}
  ) {
    this.startMs = clock();
  }

  get elapsedMs(): number {
    return this.clock() - this.startMs;
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  checkTime(): void {
    const elapsed = this.elapsedMs;
    if (elapsed > this.limits.maxTimeMs) {
      this.onBudgetExceeded({ budget: "time", limit: this.limits.maxTimeMs, actual: elapsed });
      throw new EcoRuntimeError("TIMEOUT", "Time limit exceeded");
    }
  }

  /** Checkpoint before each statement; both budgets are fatal. */
  beforeStatement(): void {
    this.checkTime();
    if (this.steps >= this.limits.maxSteps) {
      this.onBudgetExceeded({ budget: "steps", limit: this.limits.maxSteps, actual: this.steps + 1 });
      this.warn("Step limit exceeded");
      throw new EcoRuntimeError("STEP_LIMIT", "Step limit exceeded");
    }
    this.steps++;
  }

  /**
   * Checkpoint before a loop iteration. Returns false, after recording a
   * warning, when the loop has to stop; the run itself goes on.
   */
  allowIteration(loop: LoopKind, iterations: number): boolean {
    if (loop !== "repeat" && iterations >= this.limits.maxLoop) {
      this.onBudgetExceeded({ budget: "loop", limit: this.limits.maxLoop, actual: iterations });
      this.warn(`${LOOP_LABELS[loop]} iterations limited to ${this.limits.maxLoop}`);
      return false;
    }
    if (this.counter.total > this.limits.maxSteps) {
      this.onBudgetExceeded({ budget: "ops", limit: this.limits.maxSteps, actual: this.counter.total });
      this.warn(`Step limit exceeded inside ${loop}; aborted`);
      return false;
    }
    this.checkTime();
    return true;
  }

  capRepeat(count: number): number {
    if (count > this.limits.maxLoop) {
      this.warn(`Repeat count limited to ${this.limits.maxLoop}`);
      return this.limits.maxLoop;
    }
    return Math.max(0, count);
  }

  appendOutput(line: string): void {
    const next = this.outputChars + line.length;
    if (next > this.limits.maxOutputChars) {
      this.onBudgetExceeded({ budget: "output", limit: this.limits.maxOutputChars, actual: next });
      throw new EcoRuntimeError("OUTPUT_LIMIT", "Output length limit reached");
    }
    this.outputChars = next;
    this.output.push(line);
  }
}
