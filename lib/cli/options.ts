/**
 * Command-line option parsing for the `tmsim` binary.
 *
 * @module
 */

export class UsageError extends Error {
  override name = "UsageError";
}

export interface CLIOptions {
  help: boolean;
  version: boolean;
  trace: boolean;
  inputFile?: string;
  input?: string;
  maxSteps?: number;
}

function takeValue(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined) {
    throw new UsageError(`missing value for ${flag}`);
  }
  return value;
}

function parseMaxSteps(value: string): number {
  const steps = Number(value);
  if (!Number.isSafeInteger(steps) || steps <= 0) {
    throw new UsageError(
      `--max-steps expects a positive integer but got '${value}'`,
    );
  }
  return steps;
}

export function parseCliArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    help: false,
    version: false,
    trace: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--trace":
      case "-t":
        options.trace = true;
        break;
      case "--input_file":
      case "--input-file":
      case "-f":
        options.inputFile = takeValue(args, i, arg);
        i++;
        break;
      case "--input":
      case "-i":
        // The empty string is a valid (blank) tape.
        options.input = takeValue(args, i, arg);
        i++;
        break;
      case "--max-steps":
      case "-m":
        options.maxSteps = parseMaxSteps(takeValue(args, i, arg));
        i++;
        break;
      default:
        throw new UsageError(`unknown option: ${arg}`);
    }
  }

  if (options.help || options.version) {
    return options;
  }
  if (options.inputFile === undefined) {
    throw new UsageError("an input file is required (-f <file>)");
  }
  if (options.input === undefined) {
    throw new UsageError("an initial tape is required (-i <input>)");
  }
  return options;
}

export const USAGE = `
Turing machine simulator

Usage:
  tmsim -f <machine-file> -i <input> [options]

Options:
  -f, --input_file <path>   machine definition file
  -i, --input <tape>        initial tape contents
  -m, --max-steps <n>       stop after n steps
  -t, --trace               print every step
  -h, --help                show this help
  -v, --version             show the version

Definition format:
  name: <machine name>        (optional)
  init: <initial state>
  accept: <state>[, <state>...]

  <state>, <read>
  <new state>, <write>, <direction: < > ->

Lines starting with // are comments.`;
