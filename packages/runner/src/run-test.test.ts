import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { Readable } from "node:stream";
import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { loadConfig, type HarnessConfig } from "./config.js";
import { CsvRowStream } from "./csv.js";
import { RunInterruptedError } from "./errors.js";
import { FakeSimulatorProcess, fakeSpawn } from "./fake-simulator.js";
import { compareTraces, runTest } from "./run-test.js";
import { createTestCase } from "./test-case.js";
import { ERRORED, MATCHED, MISMATCHED, type TestCase } from "./types.js";

// ---------------------------------------------------------------------------
// Fixture helpers
// ---------------------------------------------------------------------------

let root: string;
let config: HarnessConfig;
let consoleError: MockInstance;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "circuit-regress-run-"));
  config = { ...loadConfig({}, root), terminate: { attempts: 3, intervalMs: 1 } };
  consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  consoleError.mockRestore();
  rmSync(root, { recursive: true, force: true });
});

function write(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

function circuit(
  rel: string,
  reference?: string,
  pipelinedReference?: string,
): TestCase {
  const t = createTestCase(join(root, rel));
  if (reference !== undefined) write(t.expectedOutputPath(false), reference);
  if (pipelinedReference !== undefined) write(t.expectedOutputPath(true), pipelinedReference);
  return t;
}

function captured(t: TestCase): string {
  return readFileSync(t.actualOutputPath, "utf-8");
}

function rows(text: string): CsvRowStream {
  return new CsvRowStream(Readable.from([Buffer.from(text)]));
}

// ---------------------------------------------------------------------------
// compareTraces
// ---------------------------------------------------------------------------

describe("compareTraces", () => {
  test("reference length is the comparison horizon", async () => {
    const result = await compareTraces(rows("1,0\n0,1\n1,1\n"), rows("1,0\n0,1\n"));
    expect(result).toEqual({ passed: true, actualRows: [["1", "0"], ["0", "1"]] });
  });

  test("keeps reading after a mismatch", async () => {
    const result = await compareTraces(rows("1\n9\n3\n"), rows("1\n2\n3\n"));
    expect(result).toEqual({ passed: false, actualRows: [["1"], ["9"], ["3"]] });
  });

  test("early end of the simulator trace is a mismatch", async () => {
    const result = await compareTraces(rows("1\n2\n"), rows("1\n2\n3\n"));
    expect(result).toEqual({ passed: false, actualRows: [["1"], ["2"]] });
  });

  test("empty reference passes without reading rows", async () => {
    const result = await compareTraces(rows("1\n"), rows(""));
    expect(result).toEqual({ passed: true, actualRows: [] });
  });
});

// ---------------------------------------------------------------------------
// runTest
// ---------------------------------------------------------------------------

describe("runTest", () => {
  test("matching trace passes and is captured", async () => {
    const t = circuit("cpu/addi.circ", "1,0\n0,1\n");
    const launched: FakeSimulatorProcess[] = [];
    const spawn = fakeSpawn({ [t.circuitPath]: "1,0\n0,1\n" }, launched);

    const verdict = await runTest(t, { config, spawn });

    expect(verdict).toEqual({ passed: true, reason: MATCHED });
    expect(captured(t)).toBe("1,0\r\n0,1\r\n");
    expect(launched).toHaveLength(1);
    expect(launched[0]?.signals).toEqual(["SIGTERM"]);
  });

  test("extra simulator rows past the reference are ignored", async () => {
    const t = circuit("cpu/addi.circ", "1,0\n0,1\n");
    const spawn = fakeSpawn({ [t.circuitPath]: "1,0\n0,1\n1,1\n" });

    const verdict = await runTest(t, { config, spawn });

    expect(verdict).toEqual({ passed: true, reason: MATCHED });
    expect(captured(t)).toBe("1,0\r\n0,1\r\n");
  });

  test("simulator exiting early fails with the rows it produced", async () => {
    const t = circuit("cpu/addi.circ", "1\n2\n3\n");
    const spawn = fakeSpawn({ [t.circuitPath]: "1\n2\n" });

    const verdict = await runTest(t, { config, spawn });

    expect(verdict).toEqual({ passed: false, reason: MISMATCHED });
    expect(captured(t)).toBe("1\r\n2\r\n");
  });

  test("mismatched row fails and the full trace is still captured", async () => {
    const t = circuit("cpu/addi.circ", "1\n2\n3\n");
    const spawn = fakeSpawn({ [t.circuitPath]: "1\n9\n3\n" });

    const verdict = await runTest(t, { config, spawn });

    expect(verdict).toEqual({ passed: false, reason: MISMATCHED });
    expect(captured(t)).toBe("1\r\n9\r\n3\r\n");
  });

  test("capture file is overwritten", async () => {
    const t = circuit("cpu/addi.circ", "1\n");
    write(t.actualOutputPath, "stale\nrows\n");
    const spawn = fakeSpawn({ [t.circuitPath]: "1\n" });

    await runTest(t, { config, spawn });

    expect(captured(t)).toBe("1\r\n");
  });

  test("missing reference file errors and stops the simulator", async () => {
    const t = circuit("cpu/addi.circ");
    const launched: FakeSimulatorProcess[] = [];
    const spawn = fakeSpawn({ [t.circuitPath]: "1\n" }, launched);

    const verdict = await runTest(t, { config, spawn });

    expect(verdict).toEqual({ passed: false, reason: ERRORED });
    expect(launched[0]?.signals).toEqual(["SIGTERM"]);
    expect(existsSync(t.actualOutputPath)).toBe(false);
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  test("launch failure errors", async () => {
    const t = circuit("cpu/addi.circ", "1\n");

    const verdict = await runTest(t, { config, spawn: fakeSpawn({}) });

    expect(verdict).toEqual({ passed: false, reason: ERRORED });
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  test("stuck simulator is force-killed", async () => {
    const t = circuit("cpu/addi.circ", "1\n");
    const proc = new FakeSimulatorProcess(["1\n"], { ignoreSigterm: true });

    await runTest(t, { config, spawn: fakeSpawn({ [t.circuitPath]: proc }) });

    expect(proc.signals).toEqual(["SIGTERM", "SIGKILL"]);
  });

  test("pipelined request uses the pipelined reference", async () => {
    const t = circuit("cpu/addi.circ", "0\n", "1\n");
    const spawn = () => fakeSpawn({ [t.circuitPath]: "1\n" });

    expect(await runTest(t, { config, spawn: spawn(), pipelined: true })).toEqual({
      passed: true,
      reason: MATCHED,
    });
    expect(await runTest(t, { config, spawn: spawn(), pipelined: false })).toEqual({
      passed: false,
      reason: MISMATCHED,
    });
  });

  test("pipelined request is downgraded for ineligible circuits", async () => {
    const t = circuit("alu/add.circ", "1\n");
    expect(t.canPipeline).toBe(false);

    const verdict = await runTest(t, {
      config,
      spawn: fakeSpawn({ [t.circuitPath]: "1\n" }),
      pipelined: true,
    });

    expect(verdict).toEqual({ passed: true, reason: MATCHED });
  });

  test("abort mid-test interrupts the run and stops the simulator", async () => {
    const t = circuit("cpu/addi.circ", "1\n");
    const proc = new FakeSimulatorProcess([], { endOutput: false });
    const controller = new AbortController();

    const pending = runTest(t, {
      config,
      spawn: fakeSpawn({ [t.circuitPath]: proc }),
      signal: controller.signal,
    });
    await new Promise((resolve) => setTimeout(resolve, 10));
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RunInterruptedError);
    expect(proc.signals).toEqual(["SIGTERM"]);
    expect(existsSync(t.actualOutputPath)).toBe(false);
  });

  test("already-aborted signal never launches the simulator", async () => {
    const t = circuit("cpu/addi.circ", "1\n");
    const launched: FakeSimulatorProcess[] = [];
    const controller = new AbortController();
    controller.abort();

    await expect(
      runTest(t, {
        config,
        spawn: fakeSpawn({ [t.circuitPath]: "1\n" }, launched),
        signal: controller.signal,
      }),
    ).rejects.toThrow(`Run interrupted while running ${t.id}`);
    expect(launched).toEqual([]);
  });
});
