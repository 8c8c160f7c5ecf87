import { Command } from "commander";

import type { CommandDeps } from "../../commands/context.js";
import { defaultRuntime, type RuntimeEnv } from "../../runtime.js";
import { VERSION } from "../../version.js";
import { registerAnalyzeCommand } from "./register.analyze.js";
import { registerPricingCommand } from "./register.pricing.js";

export function buildProgram(runtime: RuntimeEnv = defaultRuntime, deps: CommandDeps = {}): Command {
  const program = new Command();
  program
    .name("cloudtrim")
    .description("Cost-saving recommendations for AWS compute and database fleets")
    .version(VERSION);

  registerAnalyzeCommand(program, runtime, deps);
  registerPricingCommand(program, runtime, deps);
  return program;
}
