/**
 * @circuit-regress/runner — Core type definitions
 *
 * These types define the contract between:
 *   - the discoverer: produces circuit paths
 *   - the simulator launcher: produces SimulatorProcess handles
 *   - the comparator and run loop: consume both and produce verdicts
 */

import type { Readable } from "node:stream";

// ---------------------------------------------------------------------------
// Test cases
// ---------------------------------------------------------------------------

/** A single circuit under test. Built once per run and never mutated. */
export interface TestCase {
  /** The circuit path exactly as discovered; printed in PASS/FAIL lines. */
  readonly id: string;
  /** Display name; the circuit file name without its extension by default. */
  readonly name: string;
  readonly circuitPath: string;
  /** False for circuits that have no pipelined reference output. */
  readonly canPipeline: boolean;
  /** `<parent>/reference-output/<name>-ref.out` (or `-pipelined-ref.out`). */
  expectedOutputPath(pipelined: boolean): string;
  /** `<parent>/student-output/<name>-student.out` */
  readonly actualOutputPath: string;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export const MATCHED = "Matched expected output";
export const MISMATCHED = "Did not match expected output";
export const ERRORED = "Errored while running test";
export const UNKNOWN_ERROR = "Unknown test error";

export interface Verdict {
  readonly passed: boolean;
  readonly reason: string;
}

export interface RunSummary {
  readonly passed: readonly TestCase[];
  readonly failed: readonly TestCase[];
}

// ---------------------------------------------------------------------------
// Simulator process (produced by spawnSimulator, or a fake in tests)
// ---------------------------------------------------------------------------

/**
 * The subset of `ChildProcess` the runner relies on.
 * A spawned child with a piped stdout satisfies it structurally.
 */
export interface SimulatorProcess {
  readonly stdout: Readable;
  /** `null` while the process is running. */
  readonly exitCode: number | null;
  /** `null` unless the process was ended by a signal. */
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface SimulatorCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export interface TerminateOptions {
  /** Number of exit polls after SIGTERM before falling back to SIGKILL. */
  readonly attempts: number;
  readonly intervalMs: number;
}
