/**
 * Core machine definition types.
 *
 * @module
 */
import type { Direction } from "./direction.js";

/** The symbol read at tape positions that were never written. */
export const BLANK = "_";

/** Terminal state entered when no rule matches the current state and symbol. */
export const REJECT_STATE = "REJECT";

export const DEFAULT_MACHINE_NAME = "Turing Machine";

/**
 * One entry of the transition relation:
 * (currentState, readSymbol) -> (newState, writeSymbol, direction).
 */
export interface TransitionRule {
  readonly currentState: string;
  readonly readSymbol: string;
  readonly newState: string;
  readonly writeSymbol: string;
  readonly direction: Direction;
}

export interface MachineConfig {
  readonly name: string;
  readonly initialState: string;
  readonly acceptStates: readonly string[];
}

export interface RunState {
  currentState: string;
  headPosition: number;
  tape: string[];
}

export function createRule(
  currentState: string,
  readSymbol: string,
  newState: string,
  writeSymbol: string,
  direction: Direction,
): TransitionRule {
  return Object.freeze({
    currentState,
    readSymbol,
    newState,
    writeSymbol,
    direction,
  });
}

export function rulesEqual(a: TransitionRule, b: TransitionRule): boolean {
  return a.currentState === b.currentState &&
    a.readSymbol === b.readSymbol &&
    a.newState === b.newState &&
    a.writeSymbol === b.writeSymbol &&
    a.direction === b.direction;
}

/** Number of code points; a symbol is exactly one. */
export function symbolLength(text: string): number {
  return Array.from(text).length;
}

export function prettyPrintRule(rule: TransitionRule): string {
  return `${rule.currentState},${rule.readSymbol} -> ` +
    `${rule.newState},${rule.writeSymbol},${rule.direction}`;
}
