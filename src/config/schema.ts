/**
 * Configuration schema
 *
 * TypeBox definitions for the cloudtrim config file. The file is merged over
 * DEFAULT_CONFIG before validation, so every field here is required in the
 * resolved config.
 */

import { Type, type Static } from "@sinclair/typebox";

export const LogLevelSchema = Type.Union([
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
]);

export const PricingSourceSchema = Type.Union([
  Type.Literal("static"),
  Type.Literal("catalog"),
]);

export const PricingConfigSchema = Type.Object(
  {
    source: PricingSourceSchema,
    dataDir: Type.Optional(Type.String({ minLength: 1, description: "Directory holding the static pricing tables" })),
    cacheTtlMs: Type.Integer({ minimum: 0, description: "Freshness window for cached catalog files" }),
    requestTimeoutMs: Type.Integer({ minimum: 1 }),
  },
  { additionalProperties: false },
);

export const ComputeAnalyzerConfigSchema = Type.Object(
  {
    enabled: Type.Boolean(),
    unattachedVolumeHourlyExpansion: Type.Boolean({
      description: "Multiply the GiB-month volume price by 24 x 30 for unattached volumes",
    }),
  },
  { additionalProperties: false },
);

export const DatabaseAnalyzerConfigSchema = Type.Object(
  {
    enabled: Type.Boolean(),
    concurrency: Type.Integer({ minimum: 1, maximum: 32, description: "Instances analysed in parallel" }),
  },
  { additionalProperties: false },
);

export const RetryConfigSchema = Type.Object(
  {
    attempts: Type.Integer({ minimum: 1, maximum: 10 }),
    minDelayMs: Type.Integer({ minimum: 0 }),
    maxDelayMs: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export const AppConfigSchema = Type.Object(
  {
    regions: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
    pricing: PricingConfigSchema,
    analyzers: Type.Object(
      {
        compute: ComputeAnalyzerConfigSchema,
        database: DatabaseAnalyzerConfigSchema,
      },
      { additionalProperties: false },
    ),
    retry: RetryConfigSchema,
    report: Type.Object(
      {
        outputDir: Type.String({ minLength: 1 }),
        writeFile: Type.Boolean(),
      },
      { additionalProperties: false },
    ),
    logging: Type.Object(
      {
        level: LogLevelSchema,
        format: Type.Union([Type.Literal("text"), Type.Literal("json")]),
      },
      { additionalProperties: false },
    ),
  },
  { additionalProperties: false },
);

export type AppConfig = Static<typeof AppConfigSchema>;
export type PricingConfig = Static<typeof PricingConfigSchema>;
export type PricingSource = Static<typeof PricingSourceSchema>;
export type RetrySettings = Static<typeof RetryConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = {
  regions: ["us-east-1"],
  pricing: {
    source: "static",
    cacheTtlMs: 24 * 60 * 60 * 1000,
    requestTimeoutMs: 30_000,
  },
  analyzers: {
    compute: { enabled: true, unattachedVolumeHourlyExpansion: true },
    database: { enabled: true, concurrency: 1 },
  },
  retry: {
    attempts: 3,
    minDelayMs: 100,
    maxDelayMs: 30_000,
  },
  report: {
    outputDir: ".",
    writeFile: true,
  },
  logging: {
    level: "info",
    format: "text",
  },
};
