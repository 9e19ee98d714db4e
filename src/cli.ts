#!/usr/bin/env node
/**
 * CLI entry point for mini-cross.
 */

import { defaultRunDependencies, run } from "./commands/run.js";
import { reportError } from "./error-handler.js";
import { createProgram } from "./program.js";

const program = createProgram((options) => run(options, defaultRunDependencies()));

program.parseAsync().catch((error: unknown) => {
  reportError(error);
  process.exit(1);
});
