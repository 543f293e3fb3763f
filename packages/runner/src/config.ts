import { join } from "node:path";
import type { SimulatorCommand, TerminateOptions } from "./types.js";

/** Environment variable the simulator wrapper reads its extra flags from. */
export const DEFAULT_TOOLS_ARGS_VARIABLE = "CS61C_TOOLS_ARGS";

/** Circuits under these directories have no pipelined reference output. */
export const DEFAULT_UNPIPELINED_DIRS: readonly string[] = ["alu", "regfile"];

export const DEFAULT_TERMINATE: TerminateOptions = {
  attempts: 10,
  intervalMs: 100,
};

export interface HarnessConfig {
  readonly simulator: SimulatorCommand;
  /** Name of the variable that carries extra simulator flags. */
  readonly toolsArgsVariable: string;
  /** Appended (space-separated) to any existing value of that variable. */
  readonly toolsArgs: string;
  readonly unpipelinedDirs: readonly string[];
  readonly terminate: TerminateOptions;
  /** Base environment handed to the simulator. */
  readonly env: NodeJS.ProcessEnv;
}

/**
 * Build the harness configuration.
 *
 * The simulator defaults to `<projectRoot>/tools/logisim`, run directly.
 *
 * Environment:
 *   CIRCUIT_SIMULATOR              - simulator executable
 *   CIRCUIT_SIMULATOR_LAUNCHER     - interpreter to run the simulator script with
 *   CIRCUIT_TERMINATE_ATTEMPTS     - exit polls before SIGKILL (default 10)
 *   CIRCUIT_TERMINATE_INTERVAL_MS  - delay between polls (default 100)
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  projectRoot: string = process.cwd(),
): HarnessConfig {
  const executable = env.CIRCUIT_SIMULATOR || join(projectRoot, "tools", "logisim");
  const launcher = env.CIRCUIT_SIMULATOR_LAUNCHER;
  const simulator: SimulatorCommand = launcher
    ? { command: launcher, args: [executable] }
    : { command: executable, args: [] };

  return {
    simulator,
    toolsArgsVariable: DEFAULT_TOOLS_ARGS_VARIABLE,
    toolsArgs: "-q",
    unpipelinedDirs: DEFAULT_UNPIPELINED_DIRS,
    terminate: {
      attempts: positiveInt(env, "CIRCUIT_TERMINATE_ATTEMPTS", DEFAULT_TERMINATE.attempts),
      intervalMs: positiveInt(env, "CIRCUIT_TERMINATE_INTERVAL_MS", DEFAULT_TERMINATE.intervalMs),
    },
    env,
  };
}

function positiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}
