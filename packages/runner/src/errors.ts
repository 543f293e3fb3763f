/** The simulator process could not be started. */
export class SimulatorLaunchError extends Error {
  constructor(command: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to launch simulator '${command}': ${detail}`, { cause });
    this.name = "SimulatorLaunchError";
  }
}

/**
 * The run was cancelled (SIGINT / SIGTERM) while a test was in flight.
 * Unlike every other error this one aborts the whole run.
 */
export class RunInterruptedError extends Error {
  constructor(testId: string) {
    super(`Run interrupted while running ${testId}`);
    this.name = "RunInterruptedError";
  }
}
