#!/usr/bin/env node
/**
 * vdi-assign entry point.
 *
 * Sets the exit code and lets the process end on its own, so the log
 * transport can flush.
 */

import { runMain } from "./cli.js";

void runMain(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
