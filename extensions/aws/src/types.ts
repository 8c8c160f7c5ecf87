/**
 * AWS Cost Plugin - Type Definitions
 *
 * Read-only inventory views, the collaborator contracts the analyzers depend
 * on, and the pricing error taxonomy.
 */

// =============================================================================
// Compute Inventory
// =============================================================================

export type InstanceState = "running" | "stopped" | "other";

export type VolumeState = "available" | "in-use" | "other";

export type ComputeInstance = {
  id: string;
  type: string;
  state: InstanceState;
  /** `Name` tag, or the instance id when untagged. */
  name: string;
};

export type Volume = {
  id: string;
  type: string;
  sizeGiB: number;
  state: VolumeState;
  attachedInstanceId?: string;
  name: string;
};

export type InstanceFilter = {
  states?: InstanceState[];
};

export type VolumeFilter = {
  attachedInstanceId?: string;
  states?: VolumeState[];
};

export interface ComputeInventory {
  listInstances(filter?: InstanceFilter): Promise<ComputeInstance[]>;
  listVolumes(filter?: VolumeFilter): Promise<Volume[]>;
}

// =============================================================================
// Database Inventory
// =============================================================================

export type DatabaseInstance = {
  id: string;
  instanceClass: string;
  engine: string;
  engineVersion: string;
  allocatedStorageGiB: number;
  multiAz: boolean;
  readReplicaSourceId?: string;
  backupRetentionDays: number;
};

export type DatabaseSnapshot = {
  id: string;
  instanceId: string;
};

export type ReservationRecord = {
  id: string;
  instanceClass: string;
  /** "active", "payment-pending", "retired", ... */
  state: string;
  instanceCount: number;
};

export interface DatabaseInventory {
  listDatabaseInstances(): Promise<DatabaseInstance[]>;
  listDatabaseSnapshots(): Promise<DatabaseSnapshot[]>;
  listReservedDatabaseCapacity(): Promise<ReservationRecord[]>;
}

// =============================================================================
// Metrics
// =============================================================================

export type MetricStatistic = "Average" | "Sum" | "Maximum" | "Minimum";

export type MetricQuery = {
  /** Lower-case identifier, unique within one request. */
  id: string;
  metricName: string;
  statistic: MetricStatistic;
};

export type TimeWindow = {
  start: Date;
  end: Date;
};

export interface MetricsSource {
  /**
   * Fetch every query for one instance in a single batched request.
   * Returns the samples per query id; ids with no data map to an empty array.
   */
  getMetricSeries(
    instanceId: string,
    queries: MetricQuery[],
    window: TimeWindow,
    periodSeconds: number,
  ): Promise<Map<string, number[]>>;
}

// =============================================================================
// Pricing
// =============================================================================

export type PricedResource =
  | { kind: "instance"; type: string }
  | { kind: "database"; type: string }
  | { kind: "volume"; type: string };

export interface PricingService {
  isRegionPriced(region: string): boolean;
  /** USD per hour for instances and databases, USD per GiB-month for volumes. */
  getUnitPrice(resource: PricedResource, region: string): Promise<number>;
  /** Monthly USD saved by moving from `currentType` to `targetType`; may be zero or negative. */
  getUpgradeSavings(currentType: string, targetType: string, region: string): Promise<number>;
}

export type PricingErrorCode =
  | "region-not-priced"
  | "price-not-found"
  | "catalog-unavailable"
  | "invalid-catalog";

export class PricingError extends Error {
  constructor(
    public readonly code: PricingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "PricingError";
  }
}

/** Hours in an average month, used by the price-list catalog for monthly rates. */
export const HOURS_PER_MONTH = 730;
