/**
 * Per-test execution: run one circuit through the simulator and compare
 * its trace with the stored reference.
 */

import { mkdir, open, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { addAbortSignal, type Readable } from "node:stream";
import type { HarnessConfig } from "./config.js";
import { CsvRowStream, formatCsv, rowsEqual, type CsvRow } from "./csv.js";
import { RunInterruptedError } from "./errors.js";
import { debugLog, errorLog } from "./log.js";
import { terminateProcess } from "./process-lifecycle.js";
import { spawnSimulator, type SpawnSimulatorFn } from "./simulator.js";
import {
  ERRORED,
  MATCHED,
  MISMATCHED,
  type SimulatorProcess,
  type TestCase,
  type Verdict,
} from "./types.js";

export interface RunTestOptions {
  /** Compare against the pipelined reference where the test has one. */
  pipelined?: boolean;
  config: HarnessConfig;
  /** Override for testing — inject an in-process simulator. */
  spawn?: SpawnSimulatorFn;
  /** Aborting it interrupts the whole run, not just this test. */
  signal?: AbortSignal;
}

export interface ComparisonResult {
  readonly passed: boolean;
  /** Simulator rows read while the reference still had rows. */
  readonly actualRows: readonly CsvRow[];
}

/**
 * Read both traces in lockstep until the reference runs out.
 *
 * The reference length is the comparison horizon: simulator rows past it
 * are never read. A simulator trace that ends early is a mismatch, and
 * reading stops there.
 */
export async function compareTraces(
  actual: CsvRowStream,
  expected: CsvRowStream,
  signal?: AbortSignal,
): Promise<ComparisonResult> {
  const actualRows: CsvRow[] = [];
  let passed = true;

  for (;;) {
    signal?.throwIfAborted();
    const actualRow = await actual.next();
    const expectedRow = await expected.next();
    if (expectedRow === undefined) break;
    if (!rowsEqual(actualRow, expectedRow)) {
      passed = false;
    }
    if (actualRow === undefined) break;
    actualRows.push(actualRow);
  }

  return { passed, actualRows };
}

/**
 * Run one test and produce its verdict.
 *
 * The observed rows are written to the test's actual-output file whether
 * or not they match. Every failure other than an interrupt is reported as
 * an errored verdict, with the stack trace on stderr.
 *
 * @throws RunInterruptedError when `options.signal` aborts mid-test.
 */
export async function runTest(
  test: TestCase,
  options: RunTestOptions,
): Promise<Verdict> {
  const { config, signal } = options;
  const pipelined = (options.pipelined ?? false) && test.canPipeline;
  const launch = options.spawn ?? spawnSimulator;

  let proc: SimulatorProcess | undefined;
  let reference: Readable | undefined;
  try {
    signal?.throwIfAborted();
    proc = await launch(test.circuitPath, config);
    signal?.throwIfAborted();

    const expectedPath = test.expectedOutputPath(pipelined);
    debugLog(`Comparing ${test.id} against ${expectedPath}`);
    const referenceFile = await open(expectedPath, "r");
    reference = referenceFile.createReadStream();

    // Aborting destroys the simulator's stdout, so a pending read rejects.
    const actualSource = signal ? addAbortSignal(signal, proc.stdout) : proc.stdout;
    const { passed, actualRows } = await compareTraces(
      new CsvRowStream(actualSource),
      new CsvRowStream(reference),
      signal,
    );

    await mkdir(dirname(test.actualOutputPath), { recursive: true });
    await writeFile(test.actualOutputPath, formatCsv(actualRows), "utf-8");

    return passed
      ? { passed: true, reason: MATCHED }
      : { passed: false, reason: MISMATCHED };
  } catch (error) {
    if (signal?.aborted) {
      throw new RunInterruptedError(test.id);
    }
    errorLog(`Error while running ${test.id}:`, error);
    return { passed: false, reason: ERRORED };
  } finally {
    reference?.destroy();
    await terminateProcess(proc, config.terminate);
    proc?.stdout.destroy();
  }
}
