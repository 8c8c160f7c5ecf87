import type { Command } from "commander";

import { analyzeCommand } from "../../commands/analyze.js";
import type { CommandDeps } from "../../commands/context.js";
import type { RuntimeEnv } from "../../runtime.js";
import { optionalString, optionalStringList, runCommandWithRuntime } from "../cli-utils.js";

export function registerAnalyzeCommand(program: Command, runtime: RuntimeEnv, deps: CommandDeps) {
  program
    .command("analyze")
    .description("Analyze AWS compute and database fleets for cost savings")
    .option("--region <region...>", "Regions to analyze (default: config regions or AWS_REGION)")
    .option("--config <path>", "Path to a JSON config file")
    .option("--pricing <source>", "Pricing source: static or catalog")
    .option("--output-dir <dir>", "Directory for the JSON report file")
    .option("--json", "Print the JSON report instead of the text summary")
    .option("--skip-credential-check", "Do not call STS GetCallerIdentity before analysis")
    .option("--log-level <level>", "debug, info, warn or error")
    .action(async (opts: Record<string, unknown>) => {
      await runCommandWithRuntime(runtime, async () => {
        await analyzeCommand(
          {
            regions: optionalStringList(opts.region),
            configPath: optionalString(opts.config),
            pricingSource: optionalString(opts.pricing),
            outputDir: optionalString(opts.outputDir),
            logLevel: optionalString(opts.logLevel),
            json: Boolean(opts.json),
            skipCredentialCheck: Boolean(opts.skipCredentialCheck),
          },
          runtime,
          deps,
        );
      });
    });
}
