/**
 * Parser for the `key: value` property lines of a machine definition.
 *
 * @module
 */
import { ConfigError } from "./configError.js";
import { isProperty, PROPERTY_SEPARATOR } from "./lineClassifier.js";
import { DEFAULT_MACHINE_NAME, type MachineConfig } from "../machine/types.js";

const MIN_PROPERTIES = 2;
const MAX_PROPERTIES = 3;

function splitProperty(line: string): [string, string] {
  const at = line.indexOf(PROPERTY_SEPARATOR);
  return [
    line.slice(0, at).trim().toLowerCase(),
    line.slice(at + PROPERTY_SEPARATOR.length).trim(),
  ];
}

/**
 * Builds the machine config from the property lines among `lines`; every
 * other line is ignored.
 */
export function parseMachineConfig(lines: readonly string[]): MachineConfig {
  const properties = lines.filter(isProperty);
  if (
    properties.length < MIN_PROPERTIES || properties.length > MAX_PROPERTIES
  ) {
    throw new ConfigError(
      `expected ${MIN_PROPERTIES} or ${MAX_PROPERTIES} properties but found ${properties.length}`,
    );
  }

  let name: string | undefined;
  let initialState: string | undefined;
  let acceptStates: string[] | undefined;

  for (const line of properties) {
    const [key, value] = splitProperty(line);
    switch (key) {
      case "name":
        name = value;
        break;
      case "init":
        initialState = value;
        break;
      case "accept":
        acceptStates = value.split(",").map((state) => state.trim());
        break;
      default:
        throw new ConfigError(`unknown property in line: ${line}`);
    }
  }

  if (initialState === undefined) {
    throw new ConfigError("initial state must be defined");
  }
  if (acceptStates === undefined || acceptStates.length === 0) {
    throw new ConfigError("at least one accept state must be defined");
  }

  return {
    name: name ?? DEFAULT_MACHINE_NAME,
    initialState,
    acceptStates,
  };
}
