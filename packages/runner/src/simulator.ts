/**
 * Launching the external circuit simulator.
 *
 * The simulator is driven as an opaque process: it is given a circuit
 * path in tty mode and streams its trace table as CSV on stdout. Its
 * exit status is never inspected.
 */

import { spawn } from "node:child_process";
import { once } from "node:events";
import type { HarnessConfig } from "./config.js";
import { SimulatorLaunchError } from "./errors.js";
import { debugLog } from "./log.js";
import type { SimulatorProcess } from "./types.js";

/** Simulator arguments selecting headless mode and a binary CSV table. */
export const TTY_ARGS: readonly string[] = ["-tty", "table,binary,csv"];

/**
 * Launch function used by the runner. Tests inject a fake that returns an
 * in-process `SimulatorProcess`.
 */
export type SpawnSimulatorFn = (
  circuitPath: string,
  config: HarnessConfig,
) => Promise<SimulatorProcess>;

export interface SimulatorInvocation {
  readonly command: string;
  readonly args: string[];
  readonly env: NodeJS.ProcessEnv;
}

/**
 * Compute the command line and environment for one circuit.
 *
 * The extra tools flags are appended to whatever value the variable
 * already has in `config.env`; the caller's environment object is left
 * untouched.
 */
export function buildInvocation(
  circuitPath: string,
  config: HarnessConfig,
): SimulatorInvocation {
  const previous = config.env[config.toolsArgsVariable] ?? "";
  return {
    command: config.simulator.command,
    args: [...config.simulator.args, ...TTY_ARGS, circuitPath],
    env: {
      ...config.env,
      [config.toolsArgsVariable]: `${previous} ${config.toolsArgs}`,
    },
  };
}

/**
 * Start the simulator for `circuitPath`.
 *
 * Resolves once the process has spawned, with stdout piped and stderr
 * passed through. Rejects with `SimulatorLaunchError` when the executable
 * cannot be started.
 */
export const spawnSimulator: SpawnSimulatorFn = async (circuitPath, config) => {
  const { command, args, env } = buildInvocation(circuitPath, config);
  debugLog(`Spawning ${command} ${args.join(" ")}`);

  const child = spawn(command, args, {
    env,
    stdio: ["ignore", "pipe", "inherit"],
  });

  try {
    await once(child, "spawn");
  } catch (error) {
    throw new SimulatorLaunchError(command, error);
  }
  return child;
};
