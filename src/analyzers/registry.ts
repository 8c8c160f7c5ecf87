/**
 * Analyzer Registry
 *
 * Maps a provider id to the factory that builds its analyzers for a region,
 * and applies the per-analyzer `enabled` switches from config.
 */

import type { AppConfig } from "../config/schema.js";
import { UnknownProviderError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { AnalyzerFactory, PluginApi, PriceLookup, PriceQuery } from "../plugins/types.js";
import type { Analyzer, AnalyzerCategory, AnalyzerTarget, CloudProvider } from "./types.js";

type Preflight = (region: string) => Promise<void>;

function isEnabled(config: AppConfig, category: AnalyzerCategory): boolean {
  switch (category) {
    case "compute":
      return config.analyzers.compute.enabled;
    case "database":
      return config.analyzers.database.enabled;
    default:
      return true;
  }
}

export class AnalyzerRegistry {
  private readonly factories = new Map<CloudProvider, AnalyzerFactory>();
  private readonly preflights = new Map<CloudProvider, Preflight>();
  private readonly priceLookups = new Map<CloudProvider, PriceLookup>();

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
  ) {}

  register(provider: CloudProvider, factory: AnalyzerFactory): void {
    if (this.factories.has(provider)) {
      throw new Error(`Analyzers for provider ${provider} are already registered`);
    }
    this.factories.set(provider, factory);
  }

  registerPreflight(provider: CloudProvider, check: Preflight): void {
    this.preflights.set(provider, check);
  }

  registerPriceLookup(provider: CloudProvider, lookup: PriceLookup): void {
    this.priceLookups.set(provider, lookup);
  }

  has(provider: CloudProvider): boolean {
    return this.factories.has(provider);
  }

  providers(): CloudProvider[] {
    return [...this.factories.keys()];
  }

  /** Plugin-facing view of this registry. */
  pluginApi(): PluginApi {
    return {
      logger: this.logger,
      config: this.config,
      registerAnalyzers: (provider, factory) => this.register(provider, factory),
      registerPreflight: (provider, check) => this.registerPreflight(provider, check),
      registerPriceLookup: (provider, lookup) => this.registerPriceLookup(provider, lookup),
    };
  }

  async preflight(target: AnalyzerTarget): Promise<void> {
    if (!this.factories.has(target.provider)) {
      throw new UnknownProviderError(target.provider);
    }
    await this.preflights.get(target.provider)?.(target.region);
  }

  async lookupPrice(provider: CloudProvider, query: PriceQuery): Promise<number> {
    const lookup = this.priceLookups.get(provider);
    if (!lookup) {
      throw new UnknownProviderError(provider);
    }
    return lookup(query);
  }

  async create(target: AnalyzerTarget): Promise<Analyzer[]> {
    const factory = this.factories.get(target.provider);
    if (!factory) {
      throw new UnknownProviderError(target.provider);
    }

    const analyzers = await factory({
      region: target.region,
      config: this.config,
      logger: this.logger,
    });

    return analyzers.filter((analyzer) => {
      const enabled = isEnabled(this.config, analyzer.getCategory());
      if (!enabled) {
        this.logger.debug?.(`Skipping disabled analyzer: ${analyzer.getName()}`);
      }
      return enabled;
    });
  }
}
