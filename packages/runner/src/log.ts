const PREFIX = "[circuit-regress]";

/**
 * Check if debug output is enabled via `CIRCUIT_REGRESS_DEBUG`.
 */
export function isDebugMode(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.CIRCUIT_REGRESS_DEBUG;
  return value !== undefined && value !== "" && value !== "0";
}

/**
 * Log debug message (only shown when debug mode is enabled)
 */
export function debugLog(message: string, ...args: unknown[]): void {
  if (isDebugMode()) {
    console.error(`${PREFIX} ${message}`, ...args);
  }
}

/**
 * Log error message (always shown, on stderr)
 */
export function errorLog(message: string, ...args: unknown[]): void {
  console.error(`${PREFIX} ${message}`, ...args);
}

/**
 * Log warning message (always shown, on stderr)
 */
export function warnLog(message: string, ...args: unknown[]): void {
  console.warn(`${PREFIX} ${message}`, ...args);
}
