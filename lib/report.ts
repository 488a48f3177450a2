/**
 * Plain-text rendering of a finished simulation.
 *
 * @module
 */
import type { SimulationResult } from "./simulator.js";

/** Renders symbols as a quoted listing, e.g. `['1', '_']`. */
export function formatTape(symbols: readonly string[]): string {
  return `[${symbols.map((symbol) => `'${symbol}'`).join(", ")}]`;
}

export function formatResult(result: SimulationResult): string {
  const lines = [
    `Ended in state ${result.state}`,
    `Tape was: ${formatTape(result.tape)}`,
    `Tape head was at position ${result.head}`,
  ];
  if (!result.halted) {
    lines.push(
      `Stopped after ${result.steps} steps without reaching a terminal state`,
    );
  }
  return lines.join("\n");
}
