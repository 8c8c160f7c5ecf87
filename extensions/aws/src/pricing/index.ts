/**
 * Pricing sources.
 */

import type { PricingConfig } from "../../../../src/plugin-sdk/index.js";
import type { PricingService } from "../types.js";
import { CatalogPricingService } from "./catalog.js";
import { PricingCatalogClient } from "./catalog-client.js";
import { StaticPricingService } from "./static.js";

export { CatalogPricingService, type CatalogPricingOptions } from "./catalog.js";
export { PricingCatalogClient, type PricingCatalogClientOptions } from "./catalog-client.js";
export { StaticPricingService, defaultPricingDataDir, loadPricingTables, type PricingTables } from "./static.js";
export { DEFAULT_EC2_FILTER, DEFAULT_RDS_FILTER, type ProductFilter } from "./offer-file.js";

/**
 * Build the pricing service for one run. The catalog source loads its region
 * index before returning.
 */
export async function createPricingService(config: PricingConfig): Promise<PricingService> {
  if (config.source === "catalog") {
    const service = new CatalogPricingService(
      new PricingCatalogClient({
        cacheTtlMs: config.cacheTtlMs,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
    );
    await service.prepare();
    return service;
  }
  return StaticPricingService.load(config.dataDir);
}
