#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { describeError } from "./errors.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`[CLI] ${describeError(err)}`);
    process.exitCode = 1;
  });
