/**
 * Static pricing tables
 *
 * Offline price source backed by the JSON tables under `data/pricing/`.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { formatErrorMessage } from "../retry.js";
import {
  PricingError,
  type PricedResource,
  type PricingService,
} from "../types.js";

/** The bundled tables price a month as 30 days of 24 hours. */
export const STATIC_HOURS_PER_MONTH = 720;

// =============================================================================
// Table Schemas
// =============================================================================

const HourlyPriceSchema = Type.Object({ onDemandHourly: Type.Number({ minimum: 0 }) });
const VolumePriceSchema = Type.Object({ perGiBMonth: Type.Number({ minimum: 0 }) });

export const HourlyPriceTableSchema = Type.Record(Type.String(), Type.Record(Type.String(), HourlyPriceSchema));
export const VolumePriceTableSchema = Type.Record(Type.String(), Type.Record(Type.String(), VolumePriceSchema));

export type HourlyPriceTable = Static<typeof HourlyPriceTableSchema>;
export type VolumePriceTable = Static<typeof VolumePriceTableSchema>;

export type PricingTables = {
  /** region → instance type → hourly price */
  ec2: HourlyPriceTable;
  /** region → volume type → GiB-month price */
  ebs: VolumePriceTable;
  /** region → DB instance class → hourly price */
  rds: HourlyPriceTable;
};

export const PRICING_TABLE_FILES = {
  ec2: "ec2.json",
  ebs: "ebs.json",
  rds: "rds.json",
} as const;

/**
 * Locate `data/pricing` by walking up from this module, so the same lookup
 * works from sources and from `dist/`.
 */
export function defaultPricingDataDir(from: string = dirname(fileURLToPath(import.meta.url))): string {
  let dir = from;
  for (;;) {
    const candidate = join(dir, "data", "pricing");
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new PricingError("catalog-unavailable", `Cannot find data/pricing above ${from}`);
    }
    dir = parent;
  }
}

async function readTable<T extends TSchema>(path: string, schema: T): Promise<Static<T>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new PricingError("catalog-unavailable", `Failed to read pricing table ${path}: ${formatErrorMessage(err)}`);
  }
  if (!Check(schema, raw)) {
    const first = Errors(schema, raw).First();
    throw new PricingError(
      "invalid-catalog",
      `Pricing table ${path} is malformed${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`,
    );
  }
  return raw;
}

export async function loadPricingTables(dataDir: string = defaultPricingDataDir()): Promise<PricingTables> {
  const [ec2, ebs, rds] = await Promise.all([
    readTable(join(dataDir, PRICING_TABLE_FILES.ec2), HourlyPriceTableSchema),
    readTable(join(dataDir, PRICING_TABLE_FILES.ebs), VolumePriceTableSchema),
    readTable(join(dataDir, PRICING_TABLE_FILES.rds), HourlyPriceTableSchema),
  ]);
  return { ec2, ebs, rds };
}

// =============================================================================
// Service
// =============================================================================

function lookup<V>(table: Record<string, Record<string, V>>, region: string, type: string): V | undefined {
  const regionTable = Object.hasOwn(table, region) ? table[region] : undefined;
  if (!regionTable || !Object.hasOwn(regionTable, type)) return undefined;
  return regionTable[type];
}

export class StaticPricingService implements PricingService {
  constructor(private readonly tables: PricingTables) {}

  static async load(dataDir?: string): Promise<StaticPricingService> {
    return new StaticPricingService(await loadPricingTables(dataDir));
  }

  isRegionPriced(region: string): boolean {
    return Object.hasOwn(this.tables.ec2, region) || Object.hasOwn(this.tables.rds, region);
  }

  async getUnitPrice(resource: PricedResource, region: string): Promise<number> {
    if (!this.isRegionPriced(region)) {
      throw new PricingError("region-not-priced", `region ${region} is not supported`);
    }

    let price: number | undefined;
    switch (resource.kind) {
      case "instance":
        price = lookup(this.tables.ec2, region, resource.type)?.onDemandHourly;
        break;
      case "database":
        price = lookup(this.tables.rds, region, resource.type)?.onDemandHourly;
        break;
      case "volume":
        price = lookup(this.tables.ebs, region, resource.type)?.perGiBMonth;
        break;
    }

    if (price === undefined) {
      throw new PricingError(
        "price-not-found",
        `no pricing data available for ${resource.kind} type ${resource.type} in region ${region}`,
      );
    }
    return price;
  }

  /** Tries the EC2 table first, then RDS. */
  async getUpgradeSavings(currentType: string, targetType: string, region: string): Promise<number> {
    if (!this.isRegionPriced(region)) {
      throw new PricingError("region-not-priced", `region ${region} is not supported`);
    }

    for (const table of [this.tables.ec2, this.tables.rds]) {
      const current = lookup(table, region, currentType);
      const target = lookup(table, region, targetType);
      if (current && target) {
        return (current.onDemandHourly - target.onDemandHourly) * STATIC_HOURS_PER_MONTH;
      }
    }

    throw new PricingError(
      "price-not-found",
      `no pricing data available for ${currentType} -> ${targetType} in region ${region}`,
    );
  }
}
