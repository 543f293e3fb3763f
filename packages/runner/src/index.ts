/**
 * @circuit-regress/runner
 *
 * Regression runner for circuit simulation files: discovers circuits,
 * runs each through the external simulator in tty mode and compares the
 * CSV trace with a stored reference.
 */

// Core types
export type {
  TestCase,
  Verdict,
  RunSummary,
  SimulatorProcess,
  SimulatorCommand,
  TerminateOptions,
} from "./types.js";
export { MATCHED, MISMATCHED, ERRORED, UNKNOWN_ERROR } from "./types.js";

// Configuration
export {
  loadConfig,
  DEFAULT_TOOLS_ARGS_VARIABLE,
  DEFAULT_UNPIPELINED_DIRS,
  DEFAULT_TERMINATE,
} from "./config.js";
export type { HarnessConfig } from "./config.js";

export { SimulatorLaunchError, RunInterruptedError } from "./errors.js";

// Discovery and test cases
export { discoverCircuits } from "./discover.js";
export {
  createTestCase,
  CIRCUIT_EXTENSION,
  REFERENCE_DIR,
  ACTUAL_DIR,
} from "./test-case.js";
export type { TestCaseOptions } from "./test-case.js";

// Simulator process
export { spawnSimulator, buildInvocation, TTY_ARGS } from "./simulator.js";
export type { SpawnSimulatorFn, SimulatorInvocation } from "./simulator.js";
export { terminateProcess, isRunning } from "./process-lifecycle.js";

// Comparison and run loop
export { CsvParser, CsvRowStream, formatCsv, formatCsvRow, rowsEqual } from "./csv.js";
export type { CsvRow } from "./csv.js";
export { runTest, compareTraces } from "./run-test.js";
export type { RunTestOptions, ComparisonResult } from "./run-test.js";
export { runTests, formatVerdict, formatSummary } from "./run-tests.js";
export type { RunTestsOptions } from "./run-tests.js";

// CLI
export { main, parseCliArgs, CliUsageError } from "./cli.js";
export type { CliArgs, MainOptions } from "./cli.js";
