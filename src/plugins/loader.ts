/**
 * Plugin loading.
 */

import awsPlugin from "../../extensions/aws/index.js";
import type { AnalyzerRegistry } from "../analyzers/registry.js";
import type { Logger } from "../logging/logger.js";
import type { CostPlugin } from "./types.js";

export const BUNDLED_PLUGINS: readonly CostPlugin[] = [awsPlugin];

export async function registerPlugins(
  registry: AnalyzerRegistry,
  plugins: readonly CostPlugin[],
  logger: Logger,
): Promise<void> {
  const seen = new Set<string>();
  for (const plugin of plugins) {
    if (seen.has(plugin.id)) {
      throw new Error(`Duplicate plugin id: ${plugin.id}`);
    }
    seen.add(plugin.id);
    logger.debug?.(`Registering plugin: ${plugin.id}`);
    await plugin.register(registry.pluginApi());
  }
}
