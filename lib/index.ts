/**
 * Turing machine simulator: definition parsing and single-tape execution.
 *
 * This module re-exports the public API:
 * - machine definition types and the transition table
 * - the line classifier, config parser and transition parser
 * - the execution engine and its tape
 * - the file loader, end-to-end driver and report formatting
 *
 * @example
 * ```ts
 * import { simulateSource, formatResult } from "tmsim";
 * const result = simulateSource(
 *   "init: q0\naccept: qA\nq0,1\nq0,1,>\nq0,_\nqA,_,-",
 *   "1",
 * );
 * console.log(formatResult(result));
 * ```
 *
 * @module
 */
// Machine definition exports
export { Direction, headOffset, parseDirection } from "./machine/direction.js";
export {
  BLANK,
  createRule,
  DEFAULT_MACHINE_NAME,
  type MachineConfig,
  prettyPrintRule,
  REJECT_STATE,
  rulesEqual,
  type RunState,
  symbolLength,
  type TransitionRule,
} from "./machine/types.js";
export {
  type Ambiguity,
  TransitionTable,
} from "./machine/transitionTable.js";

// Parser exports
export { ConfigError } from "./parser/configError.js";
export { isProperty } from "./parser/lineClassifier.js";
export { parseMachineConfig } from "./parser/machineConfig.js";
export { parseRule, parseTransitions } from "./parser/transitions.js";
export { type MachineDefinition, parseMachine } from "./parser/machine.js";

// Evaluator exports
export type {
  Evaluator,
  RunOptions,
  RunOutcome,
} from "./evaluator/evaluator.js";
export { Tape } from "./evaluator/tape.js";
export { TuringMachine } from "./evaluator/turingMachine.js";

// Driver exports
export { loadMachineLines, stripSourceLines } from "./loader/lineLoader.js";
export {
  simulate,
  simulateLines,
  simulateSource,
  type SimulationResult,
} from "./simulator.js";
export { formatResult, formatTape } from "./report.js";
