/**
 * In-process stand-in for the simulator, used by the test suites.
 */

import { Readable } from "node:stream";
import type { SpawnSimulatorFn } from "./simulator.js";
import type { SimulatorProcess } from "./types.js";

export interface FakeSimulatorOptions {
  /** Keep running after SIGTERM; only SIGKILL stops it. */
  ignoreSigterm?: boolean;
  /** End stdout after the given chunks. Default: true. */
  endOutput?: boolean;
  /** Start out as an already-exited process. */
  exited?: boolean;
}

export class FakeSimulatorProcess implements SimulatorProcess {
  readonly stdout = new Readable({ read() {} });
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  /** Every signal sent through `kill()`, in order. */
  readonly signals: NodeJS.Signals[] = [];
  private readonly _ignoreSigterm: boolean;
  private _outputEnded = false;

  constructor(
    chunks: readonly (string | Buffer)[] = [],
    options: FakeSimulatorOptions = {},
  ) {
    this._ignoreSigterm = options.ignoreSigterm ?? false;
    for (const chunk of chunks) {
      this.stdout.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
    }
    if (options.endOutput ?? true) {
      this.endOutput();
    }
    if (options.exited) {
      this.exitCode = 0;
    }
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this._ignoreSigterm) {
      return true;
    }
    this.signalCode = signal;
    this.endOutput();
    return true;
  }

  private endOutput(): void {
    if (this._outputEnded || this.stdout.destroyed) return;
    this._outputEnded = true;
    this.stdout.push(null);
  }
}

/**
 * A spawn function serving a fixed trace per circuit path. Circuits with
 * no entry make the launch fail, like a missing executable.
 */
export function fakeSpawn(
  traces: Record<string, string | FakeSimulatorProcess>,
  launched: FakeSimulatorProcess[] = [],
): SpawnSimulatorFn {
  return async (circuitPath) => {
    const trace = traces[circuitPath];
    if (trace === undefined) {
      throw new Error(`spawn simulator ENOENT (${circuitPath})`);
    }
    const proc = typeof trace === "string" ? new FakeSimulatorProcess([trace]) : trace;
    launched.push(proc);
    return proc;
  };
}
