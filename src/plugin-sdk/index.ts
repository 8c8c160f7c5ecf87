/**
 * Public surface for provider plugins.
 */

export type {
  AnalysisResult,
  Analyzer,
  AnalyzerCategory,
  AnalyzerTarget,
  CloudProvider,
  ExecuteOptions,
} from "../analyzers/types.js";
export { AnalysisResultBuilder, RecommendationSection, formatUsd } from "../analyzers/result.js";
export type { AnalysisResultInit } from "../analyzers/result.js";
export type {
  AnalyzerFactory,
  AnalyzerFactoryContext,
  CostPlugin,
  PluginApi,
  PriceLookup,
  PriceQuery,
  PricedKind,
} from "../plugins/types.js";
export type { AppConfig, PricingConfig, PricingSource, RetrySettings } from "../config/schema.js";
export type { Logger, LogFields } from "../logging/logger.js";
export { silentLogger } from "../logging/logger.js";
export { AnalyzerError, formatErrorMessage } from "../errors.js";
