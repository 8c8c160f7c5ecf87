/**
 * AWS cost analyzers
 *
 * - EC2 upgrade, stopped-instance and unattached-volume checks
 * - RDS utilization heuristics and reserved-instance coverage
 * - Static and price-list backed pricing
 * - SDK inventories with throttling-aware retries
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  ComputeInstance,
  ComputeInventory,
  DatabaseInstance,
  DatabaseInventory,
  DatabaseSnapshot,
  InstanceFilter,
  InstanceState,
  MetricQuery,
  MetricStatistic,
  MetricsSource,
  PricedResource,
  PricingErrorCode,
  PricingService,
  ReservationRecord,
  TimeWindow,
  Volume,
  VolumeFilter,
  VolumeState,
} from "./types.js";

export { HOURS_PER_MONTH, PricingError } from "./types.js";

// =============================================================================
// Analyzers
// =============================================================================

export {
  COMPUTE_ANALYZER_NAME,
  ComputeAnalyzer,
  STOPPED_VOLUME_COST_MULTIPLIER,
  UNATTACHED_VOLUME_COST_MULTIPLIER,
  type ComputeAnalyzerOptions,
} from "./ec2/analyzer.js";

export {
  DATABASE_ANALYZER_NAME,
  DatabaseAnalyzer,
  evaluateHeuristics,
  isAuroraEngine,
  type DatabaseAnalyzerOptions,
} from "./rds/analyzer.js";

export { EC2_UPGRADE_MAP, RDS_UPGRADE_MAP, estimateMaxConnections, type UpgradeMap } from "./upgrade-tables.js";

// =============================================================================
// Collaborators
// =============================================================================

export { Ec2Inventory, type Ec2InventoryOptions } from "./ec2/inventory.js";
export { RdsInventory, type RdsInventoryOptions } from "./rds/inventory.js";
export {
  CloudWatchMetricsSource,
  collectUtilizationMetrics,
  type UtilizationMetrics,
} from "./rds/metrics.js";
export * from "./pricing/index.js";

// =============================================================================
// Plumbing
// =============================================================================

export { createAWSRetryRunner, type AWSRetryRunner, type RetryConfig } from "./retry.js";
export { CredentialValidationError, validateCredentials, type CallerIdentity } from "./credentials.js";
