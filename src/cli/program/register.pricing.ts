import type { Command } from "commander";

import type { CommandDeps } from "../../commands/context.js";
import { isPricedKind, pricingCommand } from "../../commands/pricing.js";
import type { RuntimeEnv } from "../../runtime.js";
import { optionalString, runCommandWithRuntime } from "../cli-utils.js";

export function registerPricingCommand(program: Command, runtime: RuntimeEnv, deps: CommandDeps) {
  program
    .command("pricing")
    .description("Print the unit price of an instance type, DB class or volume type")
    .argument("<type>", "Instance type, DB instance class or volume type (e.g. t3.micro, db.t3.micro, gp2)")
    .option("--region <region>", "Region to price (default: first configured region)")
    .option("--kind <kind>", "instance, database or volume", "instance")
    .option("--config <path>", "Path to a JSON config file")
    .option("--pricing <source>", "Pricing source: static or catalog")
    .action(async (type: string, opts: Record<string, unknown>) => {
      await runCommandWithRuntime(runtime, async () => {
        const kind = opts.kind;
        if (!isPricedKind(kind)) {
          throw new Error(`Unknown resource kind: ${String(kind)} (expected instance, database or volume)`);
        }
        await pricingCommand(
          {
            type,
            kind,
            region: optionalString(opts.region),
            configPath: optionalString(opts.config),
            pricingSource: optionalString(opts.pricing),
          },
          runtime,
          deps,
        );
      });
    });
}
