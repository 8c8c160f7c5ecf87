/**
 * RDS utilization metrics
 *
 * One batched CloudWatch `GetMetricData` request per instance over the last
 * seven days, reduced to the mean of each series.
 */

import {
  CloudWatchClient,
  GetMetricDataCommand,
  type MetricDataQuery,
} from "@aws-sdk/client-cloudwatch";
import { createAWSRetryRunner, type AWSRetryRunner } from "../retry.js";
import type { DatabaseInstance, MetricQuery, MetricsSource, TimeWindow } from "../types.js";
import { estimateMaxConnections } from "../upgrade-tables.js";

export const METRIC_LOOKBACK_MS = 7 * 24 * 60 * 60 * 1000;
export const METRIC_PERIOD_SECONDS = 3600;

const BYTES_PER_GIB = 1024 * 1024 * 1024;

export type UtilizationMetrics = {
  cpuPercent: number;
  connections: number;
  storageUsedPercent: number;
  readIops: number;
  writeIops: number;
  readLatencySeconds: number;
  writeLatencySeconds: number;
  freeableMemoryBytes: number;
  swapUsageBytes: number;
  networkReceiveBytesPerSec: number;
  networkTransmitBytesPerSec: number;
  replicaLagSeconds: number;
  burstBalancePercent: number;
  diskQueueDepth: number;
  deadlocks: number;
  blockedTransactions: number;
  maxConnections: number;
  backupRetentionDays: number;
};

const BASE_QUERIES: readonly MetricQuery[] = [
  { id: "cpu", metricName: "CPUUtilization", statistic: "Average" },
  { id: "connections", metricName: "DatabaseConnections", statistic: "Average" },
  { id: "storage", metricName: "FreeStorageSpace", statistic: "Average" },
  { id: "read_iops", metricName: "ReadIOPS", statistic: "Average" },
  { id: "write_iops", metricName: "WriteIOPS", statistic: "Average" },
  { id: "read_latency", metricName: "ReadLatency", statistic: "Average" },
  { id: "write_latency", metricName: "WriteLatency", statistic: "Average" },
  { id: "freeable_memory", metricName: "FreeableMemory", statistic: "Average" },
  { id: "swap_usage", metricName: "SwapUsage", statistic: "Average" },
  { id: "network_receive", metricName: "NetworkReceiveThroughput", statistic: "Average" },
  { id: "network_transmit", metricName: "NetworkTransmitThroughput", statistic: "Average" },
  { id: "burst_balance", metricName: "BurstBalance", statistic: "Average" },
  { id: "disk_queue_depth", metricName: "DiskQueueDepth", statistic: "Average" },
];

const REPLICA_LAG_QUERY: MetricQuery = { id: "replica_lag", metricName: "ReplicaLag", statistic: "Average" };
const DEADLOCKS_QUERY: MetricQuery = { id: "deadlocks", metricName: "Deadlocks", statistic: "Sum" };
const BLOCKED_TRANSACTIONS_QUERY: MetricQuery = {
  id: "blocked_transactions",
  metricName: "BlockedTransactions",
  statistic: "Average",
};

/** Engine and topology decide which optional series are requested. */
export function buildMetricQueries(instance: DatabaseInstance): MetricQuery[] {
  const queries = [...BASE_QUERIES];
  if (instance.readReplicaSourceId) queries.push(REPLICA_LAG_QUERY);
  if (instance.engine === "mysql" || instance.engine === "mariadb") queries.push(DEADLOCKS_QUERY);
  if (instance.engine === "postgres") queries.push(BLOCKED_TRANSACTIONS_QUERY);
  return queries;
}

export function metricWindow(end: Date): TimeWindow {
  return { start: new Date(end.getTime() - METRIC_LOOKBACK_MS), end };
}

function mean(values: number[] | undefined): number | undefined {
  if (!values || values.length === 0) return undefined;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Reduce the fetched series to one value per metric. A series without
 * samples reads as 0, including burst balance and storage utilization.
 */
export function summarizeMetrics(instance: DatabaseInstance, series: Map<string, number[]>): UtilizationMetrics {
  const avg = (id: string) => mean(series.get(id)) ?? 0;

  const freeBytes = mean(series.get("storage"));
  const allocatedBytes = instance.allocatedStorageGiB * BYTES_PER_GIB;
  let storageUsedPercent = 0;
  if (freeBytes !== undefined) {
    storageUsedPercent = allocatedBytes > 0 ? ((allocatedBytes - freeBytes) / allocatedBytes) * 100 : 100;
  }

  return {
    cpuPercent: avg("cpu"),
    connections: avg("connections"),
    storageUsedPercent,
    readIops: avg("read_iops"),
    writeIops: avg("write_iops"),
    readLatencySeconds: avg("read_latency"),
    writeLatencySeconds: avg("write_latency"),
    freeableMemoryBytes: avg("freeable_memory"),
    swapUsageBytes: avg("swap_usage"),
    networkReceiveBytesPerSec: avg("network_receive"),
    networkTransmitBytesPerSec: avg("network_transmit"),
    replicaLagSeconds: avg("replica_lag"),
    burstBalancePercent: avg("burst_balance"),
    diskQueueDepth: avg("disk_queue_depth"),
    deadlocks: avg("deadlocks"),
    blockedTransactions: avg("blocked_transactions"),
    maxConnections: estimateMaxConnections(instance.instanceClass),
    backupRetentionDays: instance.backupRetentionDays,
  };
}

export async function collectUtilizationMetrics(
  source: MetricsSource,
  instance: DatabaseInstance,
  now: Date,
): Promise<UtilizationMetrics> {
  const series = await source.getMetricSeries(
    instance.id,
    buildMetricQueries(instance),
    metricWindow(now),
    METRIC_PERIOD_SECONDS,
  );
  return summarizeMetrics(instance, series);
}

// =============================================================================
// CloudWatch Source
// =============================================================================

export type CloudWatchMetricsSourceOptions = {
  region: string;
  client?: CloudWatchClient;
  retry?: AWSRetryRunner;
};

export class CloudWatchMetricsSource implements MetricsSource {
  private readonly client: CloudWatchClient;
  private readonly retry: AWSRetryRunner;

  constructor(options: CloudWatchMetricsSourceOptions) {
    this.client = options.client ?? new CloudWatchClient({ region: options.region });
    this.retry = options.retry ?? createAWSRetryRunner();
  }

  async getMetricSeries(
    instanceId: string,
    queries: MetricQuery[],
    window: TimeWindow,
    periodSeconds: number,
  ): Promise<Map<string, number[]>> {
    const dataQueries: MetricDataQuery[] = queries.map((q) => ({
      Id: q.id,
      MetricStat: {
        Metric: {
          Namespace: "AWS/RDS",
          MetricName: q.metricName,
          Dimensions: [{ Name: "DBInstanceIdentifier", Value: instanceId }],
        },
        Period: periodSeconds,
        Stat: q.statistic,
      },
    }));

    const series = new Map<string, number[]>(queries.map((q) => [q.id, []]));
    let nextToken: string | undefined;

    do {
      const command = new GetMetricDataCommand({
        MetricDataQueries: dataQueries,
        StartTime: window.start,
        EndTime: window.end,
        NextToken: nextToken,
      });
      const response = await this.retry(() => this.client.send(command), "GetMetricData");

      for (const result of response.MetricDataResults ?? []) {
        if (!result.Id) continue;
        const values = series.get(result.Id) ?? [];
        values.push(...(result.Values ?? []));
        series.set(result.Id, values);
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return series;
  }
}
