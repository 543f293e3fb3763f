import type { HarnessConfig } from "./config.js";
import { discoverCircuits } from "./discover.js";
import { RunInterruptedError } from "./errors.js";
import { errorLog } from "./log.js";
import { runTest } from "./run-test.js";
import type { SpawnSimulatorFn } from "./simulator.js";
import { createTestCase } from "./test-case.js";
import {
  UNKNOWN_ERROR,
  type RunSummary,
  type TestCase,
  type Verdict,
} from "./types.js";

export interface RunTestsOptions {
  pipelined?: boolean;
  config: HarnessConfig;
  /** Receives each progress line as soon as it is known. Default: stdout. */
  report?: (line: string) => void;
  /** Override for testing — inject an in-process simulator. */
  spawn?: SpawnSimulatorFn;
  signal?: AbortSignal;
}

export function formatVerdict(test: TestCase, verdict: Verdict): string {
  return verdict.passed
    ? `PASS: ${test.id}`
    : `FAIL: ${test.id} (${verdict.reason})`;
}

export function formatSummary(summary: RunSummary): string {
  const total = summary.passed.length + summary.failed.length;
  return `Passed ${summary.passed.length}/${total} tests`;
}

/**
 * Discover the circuits under `paths` and run them one at a time.
 *
 * A `RunInterruptedError` ends the run immediately; any other error
 * escaping a test counts as that test's failure and the run continues.
 */
export async function runTests(
  paths: readonly string[],
  options: RunTestsOptions,
): Promise<RunSummary> {
  const report = options.report ?? ((line: string) => console.log(line));
  const circuits = await discoverCircuits(paths);

  const passed: TestCase[] = [];
  const failed: TestCase[] = [];

  for (const circuitPath of circuits) {
    const test = createTestCase(circuitPath, {
      unpipelinedDirs: options.config.unpipelinedDirs,
    });

    let verdict: Verdict = { passed: false, reason: UNKNOWN_ERROR };
    try {
      verdict = await runTest(test, options);
    } catch (error) {
      if (error instanceof RunInterruptedError) {
        throw error;
      }
      errorLog(`Unexpected error in ${test.id}:`, error);
    }
    // An abort that lands during cleanup still leaves the verdict unreported.
    if (options.signal?.aborted) {
      throw new RunInterruptedError(test.id);
    }

    report(formatVerdict(test, verdict));
    (verdict.passed ? passed : failed).push(test);
  }

  const summary: RunSummary = { passed, failed };
  report(formatSummary(summary));
  return summary;
}
