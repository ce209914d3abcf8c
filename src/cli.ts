#!/usr/bin/env node
import { buildProgram } from "./program.js";
import { formatCliError } from "./shared/errors.js";
import { consoleLogger, setLogger } from "./shared/logger.js";

/** Whether to log and show full stack traces (set DEBUG=1 in env). */
const DEBUG = Boolean(process.env.DEBUG);

if (DEBUG) setLogger(consoleLogger);

buildProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(`Error: ${formatCliError(err)}`);
    if (DEBUG && err instanceof Error && err.stack) {
      console.error(`\nStack trace:\n${err.stack}`);
    }
    process.exit(1);
  });
