#!/usr/bin/env node
import { main } from "./cli.js";
import { errorLog } from "./log.js";

const controller = new AbortController();
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.once(sig, () => controller.abort());
}

main(process.argv.slice(2), { signal: controller.signal }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    errorLog("Fatal error:", error);
    process.exitCode = 1;
  },
);
