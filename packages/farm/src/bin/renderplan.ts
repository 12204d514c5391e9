#!/usr/bin/env node
/**
 * renderplan CLI entry point. See `renderplan --help`.
 */

import { runCli } from "../cli.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
