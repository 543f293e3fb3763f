import { setTimeout as sleep } from "node:timers/promises";
import { DEFAULT_TERMINATE } from "./config.js";
import { debugLog } from "./log.js";
import type { SimulatorProcess, TerminateOptions } from "./types.js";

export function isRunning(proc: SimulatorProcess): boolean {
  return proc.exitCode === null && proc.signalCode === null;
}

/**
 * Stop a simulator process without ever waiting on it unboundedly.
 *
 * Sends SIGTERM, polls for exit every `intervalMs` up to `attempts`
 * times, then sends SIGKILL if the process is still alive. Safe to call
 * on a process that has already exited, or with no process at all.
 */
export async function terminateProcess(
  proc: SimulatorProcess | undefined,
  options: TerminateOptions = DEFAULT_TERMINATE,
): Promise<void> {
  if (!proc || !isRunning(proc)) return;

  proc.kill("SIGTERM");
  for (let i = 0; i < options.attempts; i++) {
    if (!isRunning(proc)) return;
    await sleep(options.intervalMs);
  }

  if (isRunning(proc)) {
    debugLog("Simulator ignored SIGTERM, sending SIGKILL");
    proc.kill("SIGKILL");
  }
}
