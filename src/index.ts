export type { AnalysisResult, Analyzer, AnalyzerCategory, AnalyzerTarget, CloudProvider } from "./analyzers/types.js";
export { AnalysisResultBuilder, RecommendationSection, formatUsd } from "./analyzers/result.js";
export { AnalyzerRegistry } from "./analyzers/registry.js";
export { runAnalyzers, type AnalyzerFailure, type RunOutcome, type ScheduledAnalyzer } from "./analyzers/runner.js";
export { DEFAULT_CONFIG, type AppConfig } from "./config/schema.js";
export { loadConfig, resolveConfig } from "./config/io.js";
export { AnalyzerError, ConfigValidationError, UnknownProviderError, formatErrorMessage } from "./errors.js";
export { createConsoleLogger, silentLogger, type Logger } from "./logging/logger.js";
export { BUNDLED_PLUGINS, registerPlugins } from "./plugins/loader.js";
export type { CostPlugin, PluginApi } from "./plugins/types.js";
export { buildReport, formatSummary, reportFileName, writeReport, type CostReport } from "./report/emitter.js";
export { buildProgram } from "./cli/program/build-program.js";
export { VERSION } from "./version.js";
