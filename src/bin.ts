#!/usr/bin/env node
import { buildProgram } from "./cli.js";
import { log } from "./logger.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    log.error("command failed:", err);
    process.exitCode = 1;
  });
