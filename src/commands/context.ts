/**
 * Shared setup for CLI commands: config, logger and a populated registry.
 */

import { AnalyzerRegistry } from "../analyzers/registry.js";
import { loadConfig, mergeConfig, resolveConfig, type ConfigEnv } from "../config/io.js";
import type { AppConfig } from "../config/schema.js";
import { createConsoleLogger, type Logger } from "../logging/logger.js";
import { BUNDLED_PLUGINS, registerPlugins } from "../plugins/loader.js";
import type { CostPlugin } from "../plugins/types.js";

export type CommandDeps = {
  plugins?: readonly CostPlugin[];
  env?: ConfigEnv;
  now?: () => Date;
  signal?: AbortSignal;
  /** Log sink; defaults to stderr. */
  logWrite?: (line: string) => void;
};

export type ConfigOverrides = {
  configPath?: string;
  regions?: string[];
  pricingSource?: string;
  outputDir?: string;
  logLevel?: string;
};

export type CommandContext = {
  config: AppConfig;
  logger: Logger;
  registry: AnalyzerRegistry;
};

/** CLI flags win over the config file, which wins over defaults. */
export async function resolveCommandConfig(overrides: ConfigOverrides, env?: ConfigEnv): Promise<AppConfig> {
  const base = await loadConfig(overrides.configPath, env);
  const patch: Record<string, unknown> = {};
  if (overrides.regions) patch.regions = overrides.regions;
  if (overrides.pricingSource) patch.pricing = { source: overrides.pricingSource };
  if (overrides.outputDir) patch.report = { outputDir: overrides.outputDir };
  if (overrides.logLevel) patch.logging = { level: overrides.logLevel };
  if (Object.keys(patch).length === 0) return base;
  return resolveConfig(mergeConfig(base, patch), {});
}

export async function createCommandContext(overrides: ConfigOverrides, deps: CommandDeps): Promise<CommandContext> {
  const config = await resolveCommandConfig(overrides, deps.env);
  const logger = createConsoleLogger({
    level: config.logging.level,
    format: config.logging.format,
    write: deps.logWrite,
    now: deps.now,
  });
  const registry = new AnalyzerRegistry(config, logger);
  await registerPlugins(registry, deps.plugins ?? BUNDLED_PLUGINS, logger);
  return { config, logger, registry };
}
