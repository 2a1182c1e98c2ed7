#!/usr/bin/env node
import { runCli } from "./cli/app.js";
import { Logger } from "./cli/logger.js";
import { formatError } from "./core/errors.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    new Logger().error(formatError(error));
    process.exitCode = 1;
  },
);
