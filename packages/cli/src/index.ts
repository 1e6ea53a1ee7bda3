#!/usr/bin/env node
import { describeError } from "./errors.js";
import { log } from "./logger.js";
import { createProgram } from "./program.js";

try {
  createProgram().parse();
} catch (err) {
  log.error(describeError(err));
  process.exitCode = 1;
}
