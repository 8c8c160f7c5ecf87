/**
 * AWS Price List offer files
 *
 * Schemas for the public price list documents and SKU matching over a closed
 * set of product attributes.
 */

import { Type, type Static } from "@sinclair/typebox";
import { PricingError } from "../types.js";

// =============================================================================
// Document Schemas
// =============================================================================

export const ServiceIndexSchema = Type.Object({
  offers: Type.Record(
    Type.String(),
    Type.Object({
      offerCode: Type.String(),
      currentVersionUrl: Type.String(),
      currentRegionIndexUrl: Type.Optional(Type.String()),
    }),
  ),
});

export const RegionIndexSchema = Type.Object({
  regions: Type.Record(
    Type.String(),
    Type.Object({
      regionCode: Type.String(),
      currentVersionUrl: Type.String(),
    }),
  ),
});

const PriceDimensionSchema = Type.Object({
  unit: Type.String(),
  pricePerUnit: Type.Record(Type.String(), Type.String()),
  description: Type.Optional(Type.String()),
});

const OfferTermSchema = Type.Object({
  sku: Type.String(),
  priceDimensions: Type.Record(Type.String(), PriceDimensionSchema),
});

export const OfferFileSchema = Type.Object({
  offerCode: Type.String(),
  products: Type.Record(
    Type.String(),
    Type.Object({
      sku: Type.String(),
      productFamily: Type.Optional(Type.String()),
      attributes: Type.Record(Type.String(), Type.String()),
    }),
  ),
  terms: Type.Object({
    OnDemand: Type.Optional(Type.Record(Type.String(), Type.Record(Type.String(), OfferTermSchema))),
  }),
});

export type ServiceIndex = Static<typeof ServiceIndexSchema>;
export type RegionIndex = Static<typeof RegionIndexSchema>;
export type OfferFile = Static<typeof OfferFileSchema>;
export type OfferProductRecord = OfferFile["products"][string];

// =============================================================================
// Product Attributes
// =============================================================================

/** The product attributes a price lookup may filter on. */
export type OfferProduct = {
  sku: string;
  productFamily?: string;
  instanceType?: string;
  operatingSystem?: string;
  tenancy?: string;
  capacityStatus?: string;
  preInstalledSw?: string;
  licenseModel?: string;
  volumeApiName?: string;
  databaseEngine?: string;
  deploymentOption?: string;
};

export function toOfferProduct(record: OfferProductRecord): OfferProduct {
  const attrs = record.attributes;
  return {
    sku: record.sku,
    productFamily: record.productFamily,
    instanceType: attrs.instanceType,
    operatingSystem: attrs.operatingSystem,
    tenancy: attrs.tenancy,
    capacityStatus: attrs.capacitystatus,
    preInstalledSw: attrs.preInstalledSw,
    licenseModel: attrs.licenseModel,
    volumeApiName: attrs.volumeApiName,
    databaseEngine: attrs.databaseEngine,
    deploymentOption: attrs.deploymentOption,
  };
}

const FILTER_ACCESSORS = {
  instanceType: (p: OfferProduct) => p.instanceType,
  operatingSystem: (p: OfferProduct) => p.operatingSystem,
  tenancy: (p: OfferProduct) => p.tenancy,
  capacitystatus: (p: OfferProduct) => p.capacityStatus,
  preInstalledSw: (p: OfferProduct) => p.preInstalledSw,
  licenseModel: (p: OfferProduct) => p.licenseModel,
  volumeApiName: (p: OfferProduct) => p.volumeApiName,
  databaseEngine: (p: OfferProduct) => p.databaseEngine,
  deploymentOption: (p: OfferProduct) => p.deploymentOption,
} satisfies Record<string, (p: OfferProduct) => string | undefined>;

export type ProductFilterKey = keyof typeof FILTER_ACCESSORS;

export type ProductFilter = Partial<Record<ProductFilterKey, string>>;

export const DEFAULT_EC2_FILTER: ProductFilter = {
  operatingSystem: "Linux",
  tenancy: "Shared",
  capacitystatus: "Used",
  preInstalledSw: "NA",
  licenseModel: "No License required",
};

export const DEFAULT_RDS_FILTER: ProductFilter = {
  databaseEngine: "MySQL",
  deploymentOption: "Single-AZ",
};

/** Attribute values compare case-insensitively; a missing attribute never matches. */
export function matchesFilter(product: OfferProduct, filter: ProductFilter): boolean {
  for (const key of Object.keys(FILTER_ACCESSORS)) {
    if (!isFilterKey(key)) continue;
    const expected = filter[key];
    if (expected === undefined) continue;
    const actual = FILTER_ACCESSORS[key](product);
    if (actual === undefined || actual.toLowerCase() !== expected.toLowerCase()) return false;
  }
  return true;
}

function isFilterKey(key: string): key is ProductFilterKey {
  return Object.hasOwn(FILTER_ACCESSORS, key);
}

// =============================================================================
// Price Extraction
// =============================================================================

export function findProducts(offer: OfferFile, filter: ProductFilter): OfferProduct[] {
  const matches: OfferProduct[] = [];
  for (const record of Object.values(offer.products)) {
    const product = toOfferProduct(record);
    if (matchesFilter(product, filter)) matches.push(product);
  }
  return matches;
}

/**
 * On-demand USD price of `sku` for the given unit (`Hrs`, `GB-Mo`).
 * Returns undefined when the SKU has no on-demand dimension with that unit.
 */
export function onDemandPrice(offer: OfferFile, sku: string, unit: string): number | undefined {
  const terms = offer.terms.OnDemand?.[sku];
  if (!terms) return undefined;

  for (const term of Object.values(terms)) {
    for (const dimension of Object.values(term.priceDimensions)) {
      if (dimension.unit !== unit) continue;
      const raw = dimension.pricePerUnit.USD;
      if (raw === undefined) continue;
      const price = Number.parseFloat(raw);
      if (!Number.isFinite(price)) {
        throw new PricingError("invalid-catalog", `Unparseable price "${raw}" for SKU ${sku}`);
      }
      return price;
    }
  }
  return undefined;
}

/**
 * First matching product with a non-zero on-demand price. Offer files list
 * zero-priced placeholder SKUs (reservation-covered capacity) beside the real
 * ones.
 */
export function resolvePrice(offer: OfferFile, filter: ProductFilter, unit: string): number | undefined {
  let zeroPriced: number | undefined;
  for (const product of findProducts(offer, filter)) {
    const price = onDemandPrice(offer, product.sku, unit);
    if (price === undefined) continue;
    if (price > 0) return price;
    zeroPriced = price;
  }
  return zeroPriced;
}
