#!/usr/bin/env node

/**
 * Turing machine simulator CLI (tmsim)
 *
 * Runs a machine definition file against an initial tape and reports the
 * final state, tape and one-based head position.
 *
 * Usage:
 *   tmsim -f <machine-file> -i <input> [--max-steps N] [--trace]
 *   tmsim --help
 *   tmsim --version
 *
 * Examples:
 *   tmsim -f examples/binaryIncrement.tm -i 1011
 *   tmsim -f loop.tm -i "" --max-steps 1000
 */

import tkexport from "terminal-kit";

import {
  ConfigError,
  formatResult,
  formatTape,
  prettyPrintRule,
  type RunOptions,
  simulate,
  type TransitionRule,
  type RunState,
} from "../lib/index.js";
import { parseCliArgs, USAGE, UsageError } from "../lib/cli/options.js";
import { VERSION } from "../lib/shared/version.js";

const { terminal } = tkexport;

const EXIT_ERROR = 1;
const EXIT_STEP_LIMIT = 2;

function printGreen(msg: string): void {
  terminal.green(msg + "\n");
}
function printCyan(msg: string): void {
  terminal.cyan(msg + "\n");
}
function printYellow(msg: string): void {
  terminal.yellow(msg + "\n");
}
function printRed(msg: string): void {
  terminal.red(msg + "\n");
}

function traceStep(state: RunState, rule: TransitionRule | undefined): void {
  const applied = rule === undefined ? "no rule" : prettyPrintRule(rule);
  printCyan(
    `${applied} | ${state.currentState} @ ${state.headPosition + 1} ${
      formatTape(state.tape)
    }`,
  );
}

function main(args: string[]): number {
  const options = parseCliArgs(args);
  if (options.help) {
    printGreen(USAGE);
    return 0;
  }
  if (options.version) {
    printGreen(`tmsim v${VERSION}`);
    return 0;
  }
  if (options.inputFile === undefined || options.input === undefined) {
    throw new UsageError("an input file and an initial tape are required");
  }

  const runOptions: RunOptions = {
    maxSteps: options.maxSteps,
    onStep: options.trace ? traceStep : undefined,
  };
  const result = simulate(options.inputFile, options.input, runOptions);

  if (!result.halted) {
    printYellow(formatResult(result));
    return EXIT_STEP_LIMIT;
  }
  printGreen(formatResult(result));
  return 0;
}

function reportError(e: unknown): number {
  if (e instanceof UsageError) {
    printRed(`error: ${e.message}`);
    printYellow("Use --help for usage information.");
  } else if (e instanceof ConfigError) {
    printRed(`error in machine definition: ${e.message}`);
  } else {
    printRed(`error: ${e instanceof Error ? e.message : String(e)}`);
  }
  return EXIT_ERROR;
}

let code: number;
try {
  code = main(process.argv.slice(2));
} catch (e) {
  code = reportError(e);
}
// terminal-kit holds the terminal open; exit explicitly.
process.exit(code);
