import { beforeEach, describe, expect, it, vi } from "vitest";
import { PricingCatalogClient } from "./catalog-client.js";
import { CatalogPricingService } from "./catalog.js";
import { matchesFilter, onDemandPrice, resolvePrice, toOfferProduct, type OfferFile } from "./offer-file.js";

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

const BASE = "https://pricing.us-east-1.amazonaws.com";

const serviceIndex = {
  offers: {
    AmazonEC2: {
      offerCode: "AmazonEC2",
      currentVersionUrl: "/offers/v1.0/aws/AmazonEC2/current/index.json",
      currentRegionIndexUrl: "/offers/v1.0/aws/AmazonEC2/current/region_index.json",
    },
    AmazonRDS: {
      offerCode: "AmazonRDS",
      currentVersionUrl: "/offers/v1.0/aws/AmazonRDS/current/index.json",
      currentRegionIndexUrl: "/offers/v1.0/aws/AmazonRDS/current/region_index.json",
    },
  },
};

function regionIndex(service: string) {
  return {
    regions: {
      "us-east-1": {
        regionCode: "us-east-1",
        currentVersionUrl: `/offers/v1.0/aws/${service}/20240101/us-east-1/index.json`,
      },
    },
  };
}

function term(sku: string, unit: string, usd: string) {
  return {
    [`${sku}.JRTCKXETXF`]: {
      sku,
      priceDimensions: {
        [`${sku}.JRTCKXETXF.6YS6EN2CT7`]: { unit, pricePerUnit: { USD: usd }, description: "on demand" },
      },
    },
  };
}

const ec2Offer: OfferFile = {
  offerCode: "AmazonEC2",
  products: {
    SKU_T2_WIN: {
      sku: "SKU_T2_WIN",
      productFamily: "Compute Instance",
      attributes: {
        instanceType: "t2.micro",
        operatingSystem: "Windows",
        tenancy: "Shared",
        capacitystatus: "Used",
        preInstalledSw: "NA",
        licenseModel: "No License required",
      },
    },
    SKU_T2: {
      sku: "SKU_T2",
      productFamily: "Compute Instance",
      attributes: {
        instanceType: "t2.micro",
        operatingSystem: "Linux",
        tenancy: "Shared",
        capacitystatus: "Used",
        preInstalledSw: "NA",
        licenseModel: "No License required",
      },
    },
    SKU_T3: {
      sku: "SKU_T3",
      productFamily: "Compute Instance",
      attributes: {
        instanceType: "t3.micro",
        operatingSystem: "Linux",
        tenancy: "Shared",
        capacitystatus: "Used",
        preInstalledSw: "NA",
        licenseModel: "No License required",
      },
    },
    SKU_GP2: {
      sku: "SKU_GP2",
      productFamily: "Storage",
      attributes: { volumeApiName: "gp2" },
    },
  },
  terms: {
    OnDemand: {
      SKU_T2_WIN: term("SKU_T2_WIN", "Hrs", "0.0162000000"),
      SKU_T2: term("SKU_T2", "Hrs", "0.0116000000"),
      SKU_T3: term("SKU_T3", "Hrs", "0.0104000000"),
      SKU_GP2: term("SKU_GP2", "GB-Mo", "0.1000000000"),
    },
  },
};

function routeCatalog(offers: Record<string, unknown> = { AmazonEC2: ec2Offer }) {
  mockFetch.mockImplementation(async (input) => {
    const url = String(input);
    if (url === `${BASE}/offers/v1.0/aws/index.json`) return jsonResponse(serviceIndex);
    for (const service of ["AmazonEC2", "AmazonRDS"]) {
      if (url === `${BASE}/offers/v1.0/aws/${service}/current/region_index.json`) {
        return jsonResponse(regionIndex(service));
      }
      if (url === `${BASE}/offers/v1.0/aws/${service}/20240101/us-east-1/index.json`) {
        return offers[service] ? jsonResponse(offers[service]) : jsonResponse({}, 404);
      }
    }
    return jsonResponse({ message: "not found" }, 404);
  });
}

// ===========================================================================
// Offer file helpers
// ===========================================================================

describe("offer file matching", () => {
  it("compares filter values case-insensitively", () => {
    const product = toOfferProduct({
      sku: "A",
      attributes: { instanceType: "t3.micro", operatingSystem: "Linux" },
    });
    expect(matchesFilter(product, { instanceType: "T3.MICRO", operatingSystem: "linux" })).toBe(true);
    expect(matchesFilter(product, { tenancy: "Shared" })).toBe(false);
    expect(matchesFilter(product, {})).toBe(true);
  });

  it("reads the on-demand price of the matching SKU only", () => {
    expect(onDemandPrice(ec2Offer, "SKU_T3", "Hrs")).toBe(0.0104);
    expect(onDemandPrice(ec2Offer, "SKU_T3", "GB-Mo")).toBeUndefined();
    expect(onDemandPrice(ec2Offer, "MISSING", "Hrs")).toBeUndefined();
  });

  it("resolves a price through the filter", () => {
    expect(resolvePrice(ec2Offer, { instanceType: "t2.micro", operatingSystem: "Linux" }, "Hrs")).toBe(0.0116);
    expect(resolvePrice(ec2Offer, { volumeApiName: "gp2" }, "GB-Mo")).toBe(0.1);
  });
});

// ===========================================================================
// PricingCatalogClient
// ===========================================================================

describe("PricingCatalogClient", () => {
  it("follows the index to the regional offer file", async () => {
    routeCatalog();
    const client = new PricingCatalogClient();

    const offer = await client.getOfferFile("AmazonEC2", "us-east-1");

    expect(offer.offerCode).toBe("AmazonEC2");
    expect(mockFetch.mock.calls.map(([url]) => String(url))).toEqual([
      `${BASE}/offers/v1.0/aws/index.json`,
      `${BASE}/offers/v1.0/aws/AmazonEC2/current/region_index.json`,
      `${BASE}/offers/v1.0/aws/AmazonEC2/20240101/us-east-1/index.json`,
    ]);
  });

  it("shares one in-flight fetch between concurrent callers", async () => {
    routeCatalog();
    const client = new PricingCatalogClient();

    const [a, b] = await Promise.all([
      client.getOfferFile("AmazonEC2", "us-east-1"),
      client.getOfferFile("AmazonEC2", "us-east-1"),
    ]);

    expect(a).toBe(b);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("serves cached documents until the freshness window passes", async () => {
    routeCatalog();
    let now = 0;
    const client = new PricingCatalogClient({ cacheTtlMs: 1000, now: () => now });

    await client.getOfferFile("AmazonEC2", "us-east-1");
    now = 999;
    await client.getOfferFile("AmazonEC2", "us-east-1");
    expect(mockFetch).toHaveBeenCalledTimes(3);

    now = 1000;
    await client.getOfferFile("AmazonEC2", "us-east-1");
    expect(mockFetch).toHaveBeenCalledTimes(6);
  });

  it("refetches after clearCache", async () => {
    routeCatalog();
    const client = new PricingCatalogClient();

    await client.getOfferFile("AmazonEC2", "us-east-1");
    client.clearCache();
    expect(client.cachedOfferCount).toBe(0);
    await client.getOfferFile("AmazonEC2", "us-east-1");

    expect(mockFetch).toHaveBeenCalledTimes(6);
  });

  it("does not cache failures", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 503));
    const client = new PricingCatalogClient();

    await expect(client.getServiceIndex()).rejects.toMatchObject({ code: "catalog-unavailable" });

    mockFetch.mockResolvedValueOnce(jsonResponse(serviceIndex));
    await expect(client.getServiceIndex()).resolves.toEqual(serviceIndex);
  });

  it("rejects documents that do not match the price list shape", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ offers: "nope" }));
    const client = new PricingCatalogClient();

    await expect(client.getServiceIndex()).rejects.toMatchObject({ code: "invalid-catalog" });
  });

  it("wraps network errors", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    const client = new PricingCatalogClient();

    await expect(client.getServiceIndex()).rejects.toThrow(
      `Failed to fetch pricing data from ${BASE}/offers/v1.0/aws/index.json: fetch failed`,
    );
  });

  it("reports regions missing from the region index", async () => {
    routeCatalog();
    const client = new PricingCatalogClient();

    await expect(client.getOfferFile("AmazonEC2", "mars-north-1")).rejects.toMatchObject({
      code: "region-not-priced",
    });
  });
});

// ===========================================================================
// CatalogPricingService
// ===========================================================================

describe("CatalogPricingService", () => {
  it("prices nothing until prepared", async () => {
    routeCatalog();
    const service = new CatalogPricingService(new PricingCatalogClient());

    expect(service.isRegionPriced("us-east-1")).toBe(false);
    await service.prepare();
    expect(service.isRegionPriced("us-east-1")).toBe(true);
    expect(service.isRegionPriced("eu-west-1")).toBe(false);
  });

  it("uses the Linux shared-tenancy SKU for instance prices", async () => {
    routeCatalog();
    const service = new CatalogPricingService(new PricingCatalogClient());
    await service.prepare();

    await expect(service.getUnitPrice({ kind: "instance", type: "t2.micro" }, "us-east-1")).resolves.toBe(0.0116);
    await expect(service.getUnitPrice({ kind: "volume", type: "gp2" }, "us-east-1")).resolves.toBe(0.1);
  });

  it("computes monthly upgrade savings from hourly prices", async () => {
    routeCatalog();
    const service = new CatalogPricingService(new PricingCatalogClient());
    await service.prepare();

    const savings = await service.getUpgradeSavings("t2.micro", "t3.micro", "us-east-1");
    expect(savings).toBeCloseTo(0.0012 * 730, 10);
  });

  it("rejects unknown types and unpriced regions", async () => {
    routeCatalog();
    const service = new CatalogPricingService(new PricingCatalogClient());
    await service.prepare();

    await expect(service.getUnitPrice({ kind: "instance", type: "z9.huge" }, "us-east-1")).rejects.toMatchObject({
      code: "price-not-found",
    });
    await expect(service.getUnitPrice({ kind: "volume", type: "gp2" }, "eu-west-1")).rejects.toMatchObject({
      code: "region-not-priced",
    });
  });

  it("prices database classes from the RDS offer", async () => {
    const rdsOffer: OfferFile = {
      offerCode: "AmazonRDS",
      products: {
        SKU_DB: {
          sku: "SKU_DB",
          attributes: { instanceType: "db.t3.micro", databaseEngine: "MySQL", deploymentOption: "Single-AZ" },
        },
        SKU_DB_MAZ: {
          sku: "SKU_DB_MAZ",
          attributes: { instanceType: "db.t3.micro", databaseEngine: "MySQL", deploymentOption: "Multi-AZ" },
        },
      },
      terms: {
        OnDemand: {
          SKU_DB: term("SKU_DB", "Hrs", "0.0170000000"),
          SKU_DB_MAZ: term("SKU_DB_MAZ", "Hrs", "0.0340000000"),
        },
      },
    };
    routeCatalog({ AmazonEC2: ec2Offer, AmazonRDS: rdsOffer });
    const service = new CatalogPricingService(new PricingCatalogClient());
    await service.prepare();

    await expect(service.getUnitPrice({ kind: "database", type: "db.t3.micro" }, "us-east-1")).resolves.toBe(0.017);
  });
});
