/**
 * End-to-end driver: definition text in, final machine state out.
 *
 * @module
 */
import type { RunOptions } from "./evaluator/evaluator.js";
import { TuringMachine } from "./evaluator/turingMachine.js";
import { loadMachineLines, stripSourceLines } from "./loader/lineLoader.js";
import { parseMachine } from "./parser/machine.js";

export interface SimulationResult {
  name: string;
  state: string;
  tape: string[];
  /** One-based head position. */
  head: number;
  steps: number;
  halted: boolean;
  accepted: boolean;
}

export function simulateLines(
  lines: readonly string[],
  input: string,
  options: RunOptions = {},
): SimulationResult {
  const { config, transitions } = parseMachine(lines);
  const machine = new TuringMachine(config, transitions, input);
  const outcome = machine.run(options);
  return {
    name: machine.name,
    state: outcome.state,
    tape: machine.tape,
    head: machine.headPosition + 1,
    steps: outcome.steps,
    halted: outcome.halted,
    accepted: outcome.accepted,
  };
}

export function simulateSource(
  source: string,
  input: string,
  options?: RunOptions,
): SimulationResult {
  return simulateLines(stripSourceLines(source), input, options);
}

export function simulate(
  filePath: string,
  input: string,
  options?: RunOptions,
): SimulationResult {
  return simulateLines(loadMachineLines(filePath), input, options);
}
