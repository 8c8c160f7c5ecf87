/**
 * Provider plugin contract.
 *
 * A plugin registers an analyzer factory for its provider; the host calls the
 * factory once per requested region.
 */

import type { AppConfig } from "../config/schema.js";
import type { Logger } from "../logging/logger.js";
import type { Analyzer, CloudProvider } from "../analyzers/types.js";

export type AnalyzerFactoryContext = {
  region: string;
  config: AppConfig;
  logger: Logger;
};

export type AnalyzerFactory = (ctx: AnalyzerFactoryContext) => Analyzer[] | Promise<Analyzer[]>;

export type PricedKind = "instance" | "database" | "volume";

export type PriceQuery = {
  type: string;
  kind: PricedKind;
  region: string;
};

/** Unit price in USD: per hour for instances and databases, per GiB-month for volumes. */
export type PriceLookup = (query: PriceQuery) => Promise<number>;

export type PluginApi = {
  logger: Logger;
  config: AppConfig;
  registerAnalyzers(provider: CloudProvider, factory: AnalyzerFactory): void;
  /** Optional hook run before any analyzer is created (credential checks). */
  registerPreflight(provider: CloudProvider, check: (region: string) => Promise<void>): void;
  registerPriceLookup(provider: CloudProvider, lookup: PriceLookup): void;
};

export type CostPlugin = {
  id: string;
  name: string;
  description?: string;
  register(api: PluginApi): void | Promise<void>;
};
