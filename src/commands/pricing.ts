/**
 * `cloudtrim pricing <type>`: print one unit price from the configured source.
 */

import type { PricedKind } from "../plugins/types.js";
import type { RuntimeEnv } from "../runtime.js";
import { createCommandContext, type CommandDeps, type ConfigOverrides } from "./context.js";

export type PricingOptions = Omit<ConfigOverrides, "regions" | "outputDir"> & {
  type: string;
  kind: PricedKind;
  region?: string;
};

const PRICED_KINDS: readonly PricedKind[] = ["instance", "database", "volume"];

export function isPricedKind(value: unknown): value is PricedKind {
  return typeof value === "string" && PRICED_KINDS.some((kind) => kind === value);
}

export function priceUnit(kind: PricedKind): string {
  return kind === "volume" ? "GiB-month" : "hour";
}

export async function pricingCommand(opts: PricingOptions, runtime: RuntimeEnv, deps: CommandDeps = {}): Promise<number> {
  const { config, registry } = await createCommandContext(opts, deps);
  const region = opts.region ?? config.regions[0] ?? "us-east-1";

  const price = await registry.lookupPrice("aws", { type: opts.type, kind: opts.kind, region });
  runtime.log(`${opts.type} (${opts.kind}) in ${region}: $${price} per ${priceUnit(opts.kind)}`);
  return price;
}
