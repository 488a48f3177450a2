/**
 * Whole-definition parsing.
 *
 * @module
 */
import { parseMachineConfig } from "./machineConfig.js";
import { parseTransitions } from "./transitions.js";
import type { TransitionTable } from "../machine/transitionTable.js";
import type { MachineConfig } from "../machine/types.js";

export interface MachineDefinition {
  config: MachineConfig;
  transitions: TransitionTable;
}

/** Runs the property pass and the transition pass over the same lines. */
export function parseMachine(lines: readonly string[]): MachineDefinition {
  return {
    config: parseMachineConfig(lines),
    transitions: parseTransitions(lines),
  };
}
