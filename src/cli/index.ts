#!/usr/bin/env node
// =============================================================================
// fanweave CLI — Main entry point
// =============================================================================

import { color } from "./format.js";
import { runCli } from "./program.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(color("red", `\n✗ Fatal error: ${err instanceof Error ? err.message : String(err)}\n`));
    process.exitCode = 1;
  },
);
