/**
 * RDS Optimization Analyzer
 *
 * Runs a fixed battery of heuristics against every non-Aurora DB instance in
 * a region, then checks reserved-instance coverage for the whole fleet.
 */

import {
  AnalysisResultBuilder,
  AnalyzerError,
  RecommendationSection,
  formatErrorMessage,
  formatUsd,
  type AnalysisResult,
  type Analyzer,
  type AnalyzerCategory,
  type ExecuteOptions,
  type Logger,
} from "../../../../src/plugin-sdk/index.js";
import { processPooled } from "../pool.js";
import type {
  DatabaseInstance,
  DatabaseInventory,
  DatabaseSnapshot,
  MetricsSource,
  PricingService,
} from "../types.js";
import { RDS_UPGRADE_MAP, upgradeTarget, type UpgradeMap } from "../upgrade-tables.js";
import { collectUtilizationMetrics, type UtilizationMetrics } from "./metrics.js";

export const DATABASE_ANALYZER_NAME = "RDS Optimization Analyzer";

// Heuristic thresholds
export const LOW_CPU_PERCENT = 40;
export const LOW_CONNECTION_RATIO = 0.4;
export const LOW_STORAGE_USED_PERCENT = 50;
export const STORAGE_REVIEW_MIN_GIB = 100;
export const HIGH_SWAP_BYTES = 50 * 1024 * 1024;
export const HIGH_DISK_QUEUE_DEPTH = 1;
export const HIGH_LATENCY_SECONDS = 0.02;
export const HIGH_NETWORK_BYTES_PER_SEC = 100 * 1024 * 1024;
export const READ_HEAVY_RATIO = 4;
export const HEAVY_WRITE_IOPS = 1000;
export const HEAVY_CONNECTION_RATIO = 0.7;
export const MIN_BACKUP_RETENTION_DAYS = 7;
export const MAX_SNAPSHOTS_PER_INSTANCE = 30;
export const HIGH_BLOCKED_TRANSACTIONS = 5;
export const LOW_BURST_BALANCE_PERCENT = 20;
export const MIN_RESERVED_COVERAGE_PERCENT = 80;

const MIB = 1024 * 1024;

export function isAuroraEngine(engine: string): boolean {
  return engine.startsWith("aurora");
}

/**
 * Heuristics 2-12 for one instance. Every check runs; the type-upgrade check
 * needs pricing and lives on the analyzer.
 */
export function evaluateHeuristics(
  instance: DatabaseInstance,
  metrics: UtilizationMetrics,
  snapshotCount: number,
): string[] {
  const lines: string[] = [];
  const maxConnections = metrics.maxConnections;

  if (metrics.cpuPercent < LOW_CPU_PERCENT && metrics.connections < maxConnections * LOW_CONNECTION_RATIO) {
    const connectionPercent = (metrics.connections / maxConnections) * 100;
    lines.push(
      `Consider downsizing due to low utilization (CPU: ${metrics.cpuPercent.toFixed(1)}%, Connections: ${connectionPercent.toFixed(1)}%)`,
    );
  }

  if (metrics.storageUsedPercent < LOW_STORAGE_USED_PERCENT && instance.allocatedStorageGiB > STORAGE_REVIEW_MIN_GIB) {
    lines.push(
      `Consider reducing allocated storage (Current: ${instance.allocatedStorageGiB} GB, Utilization: ${metrics.storageUsedPercent.toFixed(1)}%)`,
    );
  }

  if (metrics.swapUsageBytes > HIGH_SWAP_BYTES) {
    lines.push(
      `High swap usage detected (${(metrics.swapUsageBytes / MIB).toFixed(2)} MB). Consider upgrading instance memory`,
    );
  }

  if (metrics.diskQueueDepth > HIGH_DISK_QUEUE_DEPTH) {
    lines.push(
      `High disk queue depth (${metrics.diskQueueDepth.toFixed(2)}). Consider using Provisioned IOPS storage`,
    );
  }

  if (metrics.readLatencySeconds > HIGH_LATENCY_SECONDS || metrics.writeLatencySeconds > HIGH_LATENCY_SECONDS) {
    lines.push(
      `High I/O latency detected (Read: ${(metrics.readLatencySeconds * 1000).toFixed(2)}ms, Write: ${(metrics.writeLatencySeconds * 1000).toFixed(2)}ms). Consider optimizing storage`,
    );
  }

  if (
    metrics.networkReceiveBytesPerSec > HIGH_NETWORK_BYTES_PER_SEC ||
    metrics.networkTransmitBytesPerSec > HIGH_NETWORK_BYTES_PER_SEC
  ) {
    lines.push(
      `High network utilization (Receive: ${(metrics.networkReceiveBytesPerSec / MIB).toFixed(2)} MB/s, Transmit: ${(metrics.networkTransmitBytesPerSec / MIB).toFixed(2)} MB/s). Consider network optimization`,
    );
  }

  if (instance.multiAz) {
    if (metrics.readIops > metrics.writeIops * READ_HEAVY_RATIO) {
      lines.push("Consider using read replicas instead of Multi-AZ for read-heavy workload");
    }
  } else if (metrics.writeIops > HEAVY_WRITE_IOPS || metrics.connections > maxConnections * HEAVY_CONNECTION_RATIO) {
    lines.push("Consider enabling Multi-AZ for high-availability due to heavy workload");
  }

  if (metrics.backupRetentionDays < MIN_BACKUP_RETENTION_DAYS) {
    lines.push(
      `Low backup retention period (${metrics.backupRetentionDays} days). Consider increasing for better disaster recovery`,
    );
  }

  if (snapshotCount > MAX_SNAPSHOTS_PER_INSTANCE) {
    lines.push(`High number of snapshots (${snapshotCount}). Consider implementing a snapshot cleanup policy`);
  }

  switch (instance.engine) {
    case "mysql":
    case "mariadb":
      if (metrics.deadlocks > 0) {
        lines.push(
          `Detected ${Math.trunc(metrics.deadlocks)} deadlocks. Consider reviewing application logic and indexing`,
        );
      }
      break;
    case "postgres":
      if (metrics.blockedTransactions > HIGH_BLOCKED_TRANSACTIONS) {
        lines.push(
          `High number of blocked transactions (${metrics.blockedTransactions.toFixed(2)} avg). Review transaction management`,
        );
      }
      break;
  }

  if (metrics.burstBalancePercent < LOW_BURST_BALANCE_PERCENT) {
    lines.push(
      `Low burst balance (${metrics.burstBalancePercent.toFixed(2)}%). Consider upgrading to a larger instance type`,
    );
  }

  return lines;
}

export type DatabaseAnalyzerOptions = {
  region: string;
  inventory: DatabaseInventory;
  metrics: MetricsSource;
  pricing: PricingService;
  logger: Logger;
  upgradeMap?: UpgradeMap;
  /** Instances whose metrics are fetched at once; output order is unaffected. */
  concurrency?: number;
  now?: () => Date;
};

export class DatabaseAnalyzer implements Analyzer {
  private readonly region: string;
  private readonly inventory: DatabaseInventory;
  private readonly metrics: MetricsSource;
  private readonly pricing: PricingService;
  private readonly logger: Logger;
  private readonly upgradeMap: UpgradeMap;
  private readonly concurrency: number;
  private readonly now: () => Date;

  constructor(options: DatabaseAnalyzerOptions) {
    this.region = options.region;
    this.inventory = options.inventory;
    this.metrics = options.metrics;
    this.pricing = options.pricing;
    this.logger = options.logger;
    this.upgradeMap = options.upgradeMap ?? RDS_UPGRADE_MAP;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.now = options.now ?? (() => new Date());
  }

  getName(): string {
    return DATABASE_ANALYZER_NAME;
  }

  getCategory(): AnalyzerCategory {
    return "database";
  }

  async execute(options: ExecuteOptions = {}): Promise<AnalysisResult> {
    const { signal } = options;
    this.logger.info(`Starting RDS analysis in region: ${this.region}`);

    const builder = new AnalysisResultBuilder({
      analyzer: DATABASE_ANALYZER_NAME,
      provider: "aws",
      category: "database",
      resourceType: "RDS",
      now: this.now,
    });

    let instances: DatabaseInstance[];
    try {
      instances = await this.inventory.listDatabaseInstances();
    } catch (err) {
      throw new AnalyzerError(DATABASE_ANALYZER_NAME, "failed to describe DB instances", err);
    }

    const snapshotCounts = countSnapshots(await this.listSnapshotsOrEmpty());

    const eligible = instances.filter((instance) => {
      if (!isAuroraEngine(instance.engine)) return true;
      this.logger.debug?.(`Skipping Aurora instance ${instance.id} (${instance.engine})`);
      return false;
    });

    const sections = await processPooled(
      eligible,
      (instance) => this.analyzeInstance(instance, snapshotCounts.get(instance.id) ?? 0),
      this.concurrency,
      signal,
    );

    let analyzed = 0;
    for (const section of sections) {
      if (!section) continue;
      analyzed += 1;
      builder.append(section);
    }

    if (!signal?.aborted) {
      await this.checkReservedCoverage(instances.length, builder);
    }

    builder.setDetail("Analyzed Instances", String(analyzed));
    builder.setDetail("Total Monthly Savings", formatUsd(builder.potentialSavings));
    return builder.build();
  }

  /** Undefined when the instance's metrics could not be fetched. */
  private async analyzeInstance(
    instance: DatabaseInstance,
    snapshotCount: number,
  ): Promise<RecommendationSection | undefined> {
    let metrics: UtilizationMetrics;
    try {
      metrics = await collectUtilizationMetrics(this.metrics, instance, this.now());
    } catch (err) {
      this.logger.error(`Failed to get metrics for instance ${instance.id}`, { error: formatErrorMessage(err) });
      return undefined;
    }

    const section = new RecommendationSection();

    const target = upgradeTarget(this.upgradeMap, instance.instanceClass);
    if (target) {
      try {
        const savings = await this.pricing.getUpgradeSavings(instance.instanceClass, target, this.region);
        section.addSaving(
          savings,
          `  - Consider upgrading from ${instance.instanceClass} to ${target} for monthly savings of ${formatUsd(savings)}`,
        );
      } catch (err) {
        this.logger.error(`Failed to calculate savings for instance ${instance.id}`, {
          error: formatErrorMessage(err),
        });
      }
    }

    for (const line of evaluateHeuristics(instance, metrics, snapshotCount)) {
      section.addNote(`  - ${line}`);
    }

    if (section.length > 0) {
      section.prependNote(`Instance ${instance.id}:`);
    }
    return section;
  }

  private async listSnapshotsOrEmpty(): Promise<DatabaseSnapshot[]> {
    try {
      return await this.inventory.listDatabaseSnapshots();
    } catch (err) {
      this.logger.error("Failed to get DB snapshots", { region: this.region, error: formatErrorMessage(err) });
      return [];
    }
  }

  private async checkReservedCoverage(totalInstances: number, builder: AnalysisResultBuilder): Promise<void> {
    if (totalInstances === 0) return;

    let active: number;
    try {
      const reservations = await this.inventory.listReservedDatabaseCapacity();
      active = reservations.filter((r) => r.state === "active").length;
    } catch (err) {
      this.logger.error("Failed to get reserved DB instances", {
        region: this.region,
        error: formatErrorMessage(err),
      });
      return;
    }

    const coverage = (active / totalInstances) * 100;
    builder.setDetail("Reserved Instance Coverage", `${coverage.toFixed(1)}%`);
    if (coverage < MIN_RESERVED_COVERAGE_PERCENT) {
      builder.addNote(
        `Low Reserved Instance coverage (${coverage.toFixed(1)}%). Consider increasing coverage for consistent workloads`,
      );
    }
  }
}

function countSnapshots(snapshots: DatabaseSnapshot[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const snapshot of snapshots) {
    counts.set(snapshot.instanceId, (counts.get(snapshot.instanceId) ?? 0) + 1);
  }
  return counts;
}
