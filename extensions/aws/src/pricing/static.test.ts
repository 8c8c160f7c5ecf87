import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { PricingError } from "../types.js";
import {
  STATIC_HOURS_PER_MONTH,
  StaticPricingService,
  defaultPricingDataDir,
  loadPricingTables,
  type PricingTables,
} from "./static.js";

const tables: PricingTables = {
  ec2: {
    "us-east-1": {
      "t2.micro": { onDemandHourly: 0.0116 },
      "t3.micro": { onDemandHourly: 0.0104 },
      "m4.large": { onDemandHourly: 0.1 },
      "m5.large": { onDemandHourly: 0.096 },
    },
  },
  ebs: {
    "us-east-1": { gp2: { perGiBMonth: 0.1 } },
  },
  rds: {
    "us-east-1": {
      "db.t3.micro": { onDemandHourly: 0.017 },
      "db.t4g.micro": { onDemandHourly: 0.016 },
    },
    "ap-south-1": {
      "db.t3.micro": { onDemandHourly: 0.02 },
    },
  },
};

describe("StaticPricingService", () => {
  const service = new StaticPricingService(tables);

  it("prices regions present in the EC2 or RDS table", () => {
    expect(service.isRegionPriced("us-east-1")).toBe(true);
    expect(service.isRegionPriced("ap-south-1")).toBe(true);
    expect(service.isRegionPriced("sa-east-1")).toBe(false);
    expect(service.isRegionPriced("toString")).toBe(false);
  });

  it("returns unit prices per resource kind", async () => {
    await expect(service.getUnitPrice({ kind: "volume", type: "gp2" }, "us-east-1")).resolves.toBe(0.1);
    await expect(service.getUnitPrice({ kind: "instance", type: "t3.micro" }, "us-east-1")).resolves.toBe(0.0104);
    await expect(service.getUnitPrice({ kind: "database", type: "db.t3.micro" }, "ap-south-1")).resolves.toBe(0.02);
  });

  it("rejects unpriced regions and unknown types with coded errors", async () => {
    await expect(service.getUnitPrice({ kind: "volume", type: "gp2" }, "sa-east-1")).rejects.toMatchObject({
      code: "region-not-priced",
    });
    await expect(service.getUnitPrice({ kind: "volume", type: "gp2" }, "ap-south-1")).rejects.toMatchObject({
      code: "price-not-found",
      message: "no pricing data available for volume type gp2 in region ap-south-1",
    });
  });

  it("computes monthly upgrade savings over 720 hours", async () => {
    const savings = await service.getUpgradeSavings("t2.micro", "t3.micro", "us-east-1");
    expect(savings).toBeCloseTo((0.0116 - 0.0104) * 720, 10);
    expect(STATIC_HOURS_PER_MONTH).toBe(720);
  });

  it("prices an m4.large to m5.large upgrade at 2.88 a month", async () => {
    await expect(service.getUpgradeSavings("m4.large", "m5.large", "us-east-1")).resolves.toBeCloseTo(2.88, 10);
  });

  it("falls back to the RDS table for database classes", async () => {
    const savings = await service.getUpgradeSavings("db.t3.micro", "db.t4g.micro", "us-east-1");
    expect(savings).toBeCloseTo(0.001 * 720, 10);
  });

  it("returns negative savings without suppressing them", async () => {
    const savings = await service.getUpgradeSavings("t3.micro", "m5.large", "us-east-1");
    expect(savings).toBeLessThan(0);
  });

  it("rejects when either type is missing", async () => {
    await expect(service.getUpgradeSavings("t2.micro", "t4g.micro", "us-east-1")).rejects.toBeInstanceOf(PricingError);
  });
});

describe("loadPricingTables", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("loads the bundled tables", async () => {
    const loaded = await loadPricingTables(defaultPricingDataDir());
    expect(loaded.ec2["us-east-1"]?.["t2.micro"]?.onDemandHourly).toBe(0.0116);
    expect(loaded.ebs["us-east-1"]?.gp2?.perGiBMonth).toBe(0.1);
    expect(loaded.rds["eu-west-1"]?.["db.r5.large"]?.onDemandHourly).toBe(0.27);
  });

  it("rejects malformed tables", async () => {
    dir = await mkdtemp(join(tmpdir(), "cloudtrim-pricing-"));
    await writeFile(join(dir, "ec2.json"), JSON.stringify({ "us-east-1": { "t2.micro": { onDemandHourly: "cheap" } } }));
    await writeFile(join(dir, "ebs.json"), "{}");
    await writeFile(join(dir, "rds.json"), "{}");

    await expect(loadPricingTables(dir)).rejects.toMatchObject({ code: "invalid-catalog" });
  });

  it("reports missing files as unavailable", async () => {
    dir = await mkdtemp(join(tmpdir(), "cloudtrim-pricing-"));
    await expect(loadPricingTables(dir)).rejects.toMatchObject({ code: "catalog-unavailable" });
  });
});
