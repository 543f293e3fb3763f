import { readdir, stat } from "node:fs/promises";
import { extname, join, normalize } from "node:path";
import { CIRCUIT_EXTENSION } from "./test-case.js";
import { debugLog, warnLog } from "./log.js";

/**
 * Expand files and directories into the sorted list of circuit paths.
 *
 * Files with the circuit extension are taken as given, after path
 * normalization; directories are walked recursively. Symlinked files are
 * included, symlinked directories are not descended into. Matches are
 * not de-duplicated. The result is sorted by path string in code-unit
 * order so that it does not depend on the platform or locale.
 */
export async function discoverCircuits(paths: readonly string[]): Promise<string[]> {
  const found: string[] = [];

  for (const given of paths) {
    const searchPath = normalize(given);
    const info = await stat(searchPath).catch(() => undefined);
    if (!info) {
      warnLog(`No such file or directory: ${given}`);
      continue;
    }

    if (info.isFile()) {
      if (extname(searchPath) === CIRCUIT_EXTENSION) {
        found.push(searchPath);
      } else {
        debugLog(`Skipping non-circuit file ${searchPath}`);
      }
    } else if (info.isDirectory()) {
      await walkCircuits(searchPath, found);
    }
  }

  return found.sort(comparePaths);
}

async function walkCircuits(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkCircuits(full, out);
    } else if (extname(entry.name) !== CIRCUIT_EXTENSION) {
      continue;
    } else if (entry.isFile()) {
      out.push(full);
    } else if (entry.isSymbolicLink()) {
      const target = await stat(full).catch(() => undefined);
      if (target?.isFile()) {
        out.push(full);
      }
    }
  }
}

function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
