#!/usr/bin/env node
import { buildProgram } from "./cli/program/build-program.js";
import { formatErrorMessage } from "./errors.js";
import { defaultRuntime } from "./runtime.js";

const controller = new AbortController();
process.once("SIGINT", () => {
  defaultRuntime.error("Interrupted; finishing the current analyzer");
  controller.abort();
});

buildProgram(defaultRuntime, { signal: controller.signal })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    defaultRuntime.error(formatErrorMessage(err));
    process.exitCode = 1;
  });
