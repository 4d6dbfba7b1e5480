#!/usr/bin/env node

/**
 * Strata — CLI entry point
 */

import pc from "picocolors";
import { createProcessContext, runCli } from "./program.js";

runCli(process.argv, createProcessContext())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(
      pc.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`),
    );
    process.exit(1);
  });
