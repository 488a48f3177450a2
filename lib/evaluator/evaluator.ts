/**
 * Evaluator interface for Turing machines.
 *
 * This module defines the interface for machine evaluators, providing both
 * single-step and run-to-completion operations.
 *
 * @module
 */
import type { RunState, TransitionRule } from "../machine/types.js";

export interface RunOptions {
  /** Stop after this many steps even if no terminal state was reached. */
  maxSteps?: number;
  /** Called after every step with the state it produced. */
  onStep?: (state: RunState, rule: TransitionRule | undefined) => void;
}

export interface RunOutcome {
  state: string;
  steps: number;
  /** False only when `maxSteps` ended the run. */
  halted: boolean;
  /** True when the run ended in a user-defined accept state. */
  accepted: boolean;
}

export interface Evaluator {
  /**
   * Apply exactly one transition. Returns the rule applied, or undefined when
   * none matched and the machine moved to the reject state.
   */
  step(): TransitionRule | undefined;

  /** Keep stepping until a terminal state or `maxSteps`. */
  run(options?: RunOptions): RunOutcome;
}
