#!/usr/bin/env node
import { EXIT_SETUP_FAILED, formatFatalError, runCli } from "./run.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(formatFatalError(error));
    process.exitCode = EXIT_SETUP_FAILED;
  },
);
