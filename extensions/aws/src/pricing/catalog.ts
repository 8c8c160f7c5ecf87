/**
 * Price list backed pricing service.
 */

import {
  HOURS_PER_MONTH,
  PricingError,
  type PricedResource,
  type PricingService,
} from "../types.js";
import { PricingCatalogClient, type CatalogService } from "./catalog-client.js";
import {
  DEFAULT_EC2_FILTER,
  DEFAULT_RDS_FILTER,
  resolvePrice,
  type ProductFilter,
} from "./offer-file.js";

export type CatalogPricingOptions = {
  ec2Filter?: ProductFilter;
  rdsFilter?: ProductFilter;
};

type PriceQuery = {
  service: CatalogService;
  filter: ProductFilter;
  unit: "Hrs" | "GB-Mo";
};

export class CatalogPricingService implements PricingService {
  private pricedRegions: ReadonlySet<string> = new Set();
  private readonly ec2Filter: ProductFilter;
  private readonly rdsFilter: ProductFilter;

  constructor(
    private readonly client: PricingCatalogClient,
    options: CatalogPricingOptions = {},
  ) {
    this.ec2Filter = options.ec2Filter ?? DEFAULT_EC2_FILTER;
    this.rdsFilter = options.rdsFilter ?? DEFAULT_RDS_FILTER;
  }

  /** Load the EC2 region index. Until this resolves no region is priced. */
  async prepare(): Promise<void> {
    const index = await this.client.getRegionIndex("AmazonEC2");
    this.pricedRegions = new Set(Object.keys(index.regions));
  }

  isRegionPriced(region: string): boolean {
    return this.pricedRegions.has(region);
  }

  async getUnitPrice(resource: PricedResource, region: string): Promise<number> {
    if (!this.isRegionPriced(region)) {
      throw new PricingError("region-not-priced", `region ${region} is not supported for pricing`);
    }

    const query = this.queryFor(resource);
    const offer = await this.client.getOfferFile(query.service, region);
    const price = resolvePrice(offer, query.filter, query.unit);
    if (price === undefined) {
      throw new PricingError(
        "price-not-found",
        `no matching product found for ${resource.kind} type ${resource.type} in region ${region}`,
      );
    }
    return price;
  }

  /** Database classes (`db.` prefix) are priced from the RDS offer, everything else from EC2. */
  async getUpgradeSavings(currentType: string, targetType: string, region: string): Promise<number> {
    const kind = currentType.startsWith("db.") ? "database" : "instance";
    const current = await this.getUnitPrice({ kind, type: currentType }, region);
    const target = await this.getUnitPrice({ kind, type: targetType }, region);
    return (current - target) * HOURS_PER_MONTH;
  }

  private queryFor(resource: PricedResource): PriceQuery {
    switch (resource.kind) {
      case "instance":
        return {
          service: "AmazonEC2",
          filter: { ...this.ec2Filter, instanceType: resource.type },
          unit: "Hrs",
        };
      case "database":
        return {
          service: "AmazonRDS",
          filter: { ...this.rdsFilter, instanceType: resource.type },
          unit: "Hrs",
        };
      case "volume":
        return {
          service: "AmazonEC2",
          filter: { volumeApiName: resource.type },
          unit: "GB-Mo",
        };
    }
  }
}
