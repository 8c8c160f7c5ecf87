/**
 * AWS Price List Client
 *
 * Fetches the public price list documents over HTTPS with native `fetch()`.
 * Responses are cached per (region, service) for a freshness window; callers
 * asking for the same key while a fetch is running share that fetch.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { formatErrorMessage } from "../retry.js";
import { PricingError } from "../types.js";
import {
  OfferFileSchema,
  RegionIndexSchema,
  ServiceIndexSchema,
  type OfferFile,
  type RegionIndex,
  type ServiceIndex,
} from "./offer-file.js";

export const PRICING_BASE_URL = "https://pricing.us-east-1.amazonaws.com";
export const PRICING_INDEX_PATH = "/offers/v1.0/aws/index.json";
export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export type CatalogService = "AmazonEC2" | "AmazonRDS";

export type PricingCatalogClientOptions = {
  baseUrl?: string;
  cacheTtlMs?: number;
  requestTimeoutMs?: number;
  now?: () => number;
};

// =============================================================================
// Cache
// =============================================================================

type CacheEntry<T> = {
  value: Promise<T>;
  storedAt: number;
  settled: boolean;
};

/**
 * Promise cache with a freshness window. A pending entry is always served;
 * a failed load is evicted so the next caller retries.
 */
class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number,
  ) {}

  get(key: string, load: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(key);
    if (existing && (!existing.settled || this.now() - existing.storedAt < this.ttlMs)) {
      return existing.value;
    }

    const entry: CacheEntry<T> = {
      storedAt: this.now(),
      settled: false,
      value: load().then(
        (value) => {
          entry.settled = true;
          entry.storedAt = this.now();
          return value;
        },
        (err: unknown) => {
          if (this.entries.get(key) === entry) this.entries.delete(key);
          throw err;
        },
      ),
    };
    this.entries.set(key, entry);
    return entry.value;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

// =============================================================================
// Client
// =============================================================================

export class PricingCatalogClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly serviceIndex: TtlCache<ServiceIndex>;
  private readonly regionIndexes: TtlCache<RegionIndex>;
  private readonly offers: TtlCache<OfferFile>;

  constructor(options: PricingCatalogClientOptions = {}) {
    const ttl = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    const now = options.now ?? Date.now;
    this.baseUrl = (options.baseUrl ?? PRICING_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.serviceIndex = new TtlCache(ttl, now);
    this.regionIndexes = new TtlCache(ttl, now);
    this.offers = new TtlCache(ttl, now);
  }

  getServiceIndex(): Promise<ServiceIndex> {
    return this.serviceIndex.get("index", () =>
      this.fetchJson(this.resolveUrl(PRICING_INDEX_PATH), ServiceIndexSchema),
    );
  }

  /** Regions the service publishes a price list for. */
  getRegionIndex(service: CatalogService): Promise<RegionIndex> {
    return this.regionIndexes.get(service, async () => {
      const index = await this.getServiceIndex();
      const offer = index.offers[service];
      if (!offer?.currentRegionIndexUrl) {
        throw new PricingError("invalid-catalog", `service ${service} not found in pricing index`);
      }
      return this.fetchJson(this.resolveUrl(offer.currentRegionIndexUrl), RegionIndexSchema);
    });
  }

  getOfferFile(service: CatalogService, region: string): Promise<OfferFile> {
    return this.offers.get(`${region}:${service}`, async () => {
      const regions = await this.getRegionIndex(service);
      const entry = Object.hasOwn(regions.regions, region) ? regions.regions[region] : undefined;
      if (!entry) {
        throw new PricingError("region-not-priced", `region ${region} not found for service ${service}`);
      }
      return this.fetchJson(this.resolveUrl(entry.currentVersionUrl), OfferFileSchema);
    });
  }

  clearCache(): void {
    this.serviceIndex.clear();
    this.regionIndexes.clear();
    this.offers.clear();
  }

  get cachedOfferCount(): number {
    return this.offers.size;
  }

  private resolveUrl(pathOrUrl: string): string {
    return pathOrUrl.startsWith("/") ? `${this.baseUrl}${pathOrUrl}` : pathOrUrl;
  }

  private async fetchJson<T extends TSchema>(url: string, schema: T): Promise<Static<T>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let body: unknown;
    try {
      const res = await fetch(url, {
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });
      if (!res.ok) {
        throw new PricingError("catalog-unavailable", `Pricing request failed: HTTP ${res.status} (${url})`);
      }
      body = await res.json();
    } catch (err) {
      if (err instanceof PricingError) throw err;
      throw new PricingError(
        "catalog-unavailable",
        `Failed to fetch pricing data from ${url}: ${formatErrorMessage(err)}`,
      );
    } finally {
      clearTimeout(timer);
    }

    if (!Check(schema, body)) {
      const first = Errors(schema, body).First();
      throw new PricingError(
        "invalid-catalog",
        `Unexpected pricing document at ${url}${first ? `: ${first.path || "/"} ${first.message}` : ""}`,
      );
    }
    return body;
  }
}
