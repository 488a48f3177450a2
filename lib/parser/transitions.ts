/**
 * Parser for transition rules, written as line pairs:
 *
 * ```
 * currentState, readSymbol
 * newState, writeSymbol, direction
 * ```
 *
 * @module
 */
import { ConfigError } from "./configError.js";
import { isProperty } from "./lineClassifier.js";
import { parseDirection } from "../machine/direction.js";
import { TransitionTable } from "../machine/transitionTable.js";
import {
  createRule,
  symbolLength,
  type TransitionRule,
} from "../machine/types.js";

const FIELD_SEPARATOR = ",";

function splitFields(line: string, expected: number, shape: string): string[] {
  const fields = line.split(FIELD_SEPARATOR).map((field) => field.trim());
  if (fields.length !== expected) {
    throw new ConfigError(
      `expected '${shape}' but found '${line}'`,
    );
  }
  return fields;
}

function requireSymbol(symbol: string, role: string): void {
  if (symbolLength(symbol) !== 1) {
    throw new ConfigError(
      `${role} symbol must be one character, but was '${symbol}'`,
    );
  }
}

export function parseRule(condition: string, action: string): TransitionRule {
  const [currentState, readSymbol] = splitFields(
    condition,
    2,
    "currentState, readSymbol",
  );
  const [newState, writeSymbol, token] = splitFields(
    action,
    3,
    "newState, writeSymbol, direction",
  );

  requireSymbol(readSymbol, "read");
  requireSymbol(writeSymbol, "write");
  const direction = parseDirection(token);
  if (direction === undefined) {
    throw new ConfigError(`invalid direction for state ${newState}: '${token}'`);
  }

  return createRule(currentState, readSymbol, newState, writeSymbol, direction);
}

/**
 * Builds the transition relation from the non-property lines among `lines`,
 * paired up in their original order.
 */
export function parseTransitions(lines: readonly string[]): TransitionTable {
  const ruleLines = lines
    .filter((line) => !isProperty(line))
    .map((line) => line.trim());

  if (ruleLines.length === 0) {
    throw new ConfigError("no transitions defined");
  }
  if (ruleLines.length % 2 !== 0) {
    throw new ConfigError(
      `transitions are defined in line pairs but found ${ruleLines.length} lines`,
    );
  }

  const table = new TransitionTable();
  for (let i = 0; i < ruleLines.length; i += 2) {
    table.add(parseRule(ruleLines[i], ruleLines[i + 1]));
  }
  return table;
}
