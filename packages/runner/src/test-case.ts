import { basename, dirname, extname, join } from "node:path";
import { DEFAULT_UNPIPELINED_DIRS } from "./config.js";
import type { TestCase } from "./types.js";

export const CIRCUIT_EXTENSION = ".circ";

/** Directory (beside the circuit) holding reference traces. */
export const REFERENCE_DIR = "reference-output";
/** Directory (beside the circuit) the observed traces are written to. */
export const ACTUAL_DIR = "student-output";

export interface TestCaseOptions {
  /** Display name override. Defaults to the file name without extension. */
  name?: string;
  unpipelinedDirs?: readonly string[];
}

/**
 * Build the test case for a circuit path.
 *
 * ```ts
 * const test = createTestCase("tests/alu/add.circ");
 * test.expectedOutputPath(false); // "tests/alu/reference-output/add-ref.out"
 * test.canPipeline;               // false
 * ```
 */
export function createTestCase(
  circuitPath: string,
  options?: TestCaseOptions,
): TestCase {
  const name = options?.name ?? stem(circuitPath);
  const parent = dirname(circuitPath);
  const unpipelined = options?.unpipelinedDirs ?? DEFAULT_UNPIPELINED_DIRS;

  return {
    id: circuitPath,
    name,
    circuitPath,
    canPipeline: !unpipelined.some((dir) => isCircuitIn(circuitPath, dir)),
    expectedOutputPath(pipelined: boolean): string {
      const file = pipelined ? `${name}-pipelined-ref.out` : `${name}-ref.out`;
      return join(parent, REFERENCE_DIR, file);
    },
    actualOutputPath: join(parent, ACTUAL_DIR, `${name}-student.out`),
  };
}

/** True for `<anything>/<dir>/<file>.circ`. */
function isCircuitIn(circuitPath: string, dir: string): boolean {
  return (
    extname(circuitPath) === CIRCUIT_EXTENSION &&
    basename(dirname(circuitPath)) === dir
  );
}

function stem(filePath: string): string {
  const base = basename(filePath);
  const ext = extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}
