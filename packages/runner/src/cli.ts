/**
 * Command-line front end.
 *
 * Usage:
 *   circuit-regress [-p|--pipelined] <test_path>...
 *
 * Each test_path is a circuit file or a directory searched recursively
 * for circuit files.
 */

import { loadConfig, type HarnessConfig } from "./config.js";
import { RunInterruptedError } from "./errors.js";
import { errorLog } from "./log.js";
import { runTests } from "./run-tests.js";
import type { SpawnSimulatorFn } from "./simulator.js";

export const USAGE = "Usage: circuit-regress [-h] [-p] test_path [test_path ...]";

export const HELP_TEXT = `${USAGE}

Run circuit regression tests

Positional arguments:
  test_path         Path to a test circuit, or a directory containing test circuits

Options:
  -h, --help        Show this help message and exit
  -p, --pipelined   Check against reference output for 2-stage pipeline (when applicable)

Environment:
  CIRCUIT_SIMULATOR           Simulator executable (default: ./tools/logisim, run directly)
  CIRCUIT_SIMULATOR_LAUNCHER  Interpreter to run the simulator with, for a script
                              without a shebang or execute permission
`;

export const EXIT_OK = 0;
export const EXIT_INTERRUPTED = 1;
export const EXIT_USAGE = 2;

export interface CliArgs {
  testPaths: string[];
  pipelined: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { testPaths: [], pipelined: false, help: false };
  let optionsEnded = false;

  for (const arg of argv) {
    if (optionsEnded || !arg.startsWith("-") || arg === "-") {
      result.testPaths.push(arg);
      continue;
    }
    switch (arg) {
      case "--":
        optionsEnded = true;
        break;
      case "-p":
      case "--pipelined":
        result.pipelined = true;
        break;
      case "-h":
      case "--help":
        result.help = true;
        break;
      default:
        throw new CliUsageError(`unrecognized argument: ${arg}`);
    }
  }

  if (!result.help && result.testPaths.length === 0) {
    throw new CliUsageError("the following arguments are required: test_path");
  }
  return result;
}

export interface MainOptions {
  config?: HarnessConfig;
  spawn?: SpawnSimulatorFn;
  signal?: AbortSignal;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/**
 * Run the CLI and return its exit code. Normal completion is 0 whatever
 * the pass/fail counts.
 */
export async function main(
  argv: readonly string[],
  options: MainOptions = {},
): Promise<number> {
  const stdout = options.stdout ?? ((line: string) => console.log(line));
  const stderr = options.stderr ?? ((line: string) => console.error(line));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      stderr(USAGE);
      stderr(`circuit-regress: error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help) {
    stdout(HELP_TEXT);
    return EXIT_OK;
  }

  try {
    await runTests(args.testPaths, {
      pipelined: args.pipelined,
      config: options.config ?? loadConfig(),
      spawn: options.spawn,
      signal: options.signal,
      report: stdout,
    });
  } catch (error) {
    if (error instanceof RunInterruptedError) {
      errorLog(error.message);
      return EXIT_INTERRUPTED;
    }
    throw error;
  }
  return EXIT_OK;
}
