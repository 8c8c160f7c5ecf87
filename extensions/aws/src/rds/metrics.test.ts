import { describe, it, expect, beforeEach, vi } from "vitest";
import { GetMetricDataCommand } from "@aws-sdk/client-cloudwatch";
import type { DatabaseInstance } from "../types.js";
import {
  CloudWatchMetricsSource,
  buildMetricQueries,
  collectUtilizationMetrics,
  metricWindow,
  summarizeMetrics,
} from "./metrics.js";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-cloudwatch", () => ({
  CloudWatchClient: vi.fn(() => ({ send: mockSend })),
  GetMetricDataCommand: vi.fn(),
}));

const GIB = 1024 * 1024 * 1024;

function dbInstance(overrides: Partial<DatabaseInstance> = {}): DatabaseInstance {
  return {
    id: "db-1",
    instanceClass: "db.t3.micro",
    engine: "mysql",
    engineVersion: "8.0.35",
    allocatedStorageGiB: 100,
    multiAz: false,
    backupRetentionDays: 7,
    ...overrides,
  };
}

describe("buildMetricQueries", () => {
  it("adds Deadlocks as a sum for MySQL-family engines", () => {
    const queries = buildMetricQueries(dbInstance({ engine: "mariadb" }));
    expect(queries).toHaveLength(14);
    expect(queries.at(-1)).toEqual({ id: "deadlocks", metricName: "Deadlocks", statistic: "Sum" });
  });

  it("adds BlockedTransactions for PostgreSQL", () => {
    const ids = buildMetricQueries(dbInstance({ engine: "postgres" })).map((q) => q.id);
    expect(ids).toContain("blocked_transactions");
    expect(ids).not.toContain("deadlocks");
  });

  it("adds ReplicaLag only for read replicas", () => {
    expect(buildMetricQueries(dbInstance({ engine: "oracle-ee" }))).toHaveLength(13);
    const ids = buildMetricQueries(dbInstance({ engine: "oracle-ee", readReplicaSourceId: "primary" })).map(
      (q) => q.id,
    );
    expect(ids).toContain("replica_lag");
  });
});

describe("metricWindow", () => {
  it("spans the previous seven days", () => {
    const end = new Date("2024-05-08T00:00:00Z");
    expect(metricWindow(end)).toEqual({ start: new Date("2024-05-01T00:00:00Z"), end });
  });
});

describe("summarizeMetrics", () => {
  it("averages each series", () => {
    const metrics = summarizeMetrics(
      dbInstance(),
      new Map([
        ["cpu", [10, 20, 30]],
        ["connections", [4, 8]],
        ["storage", [25 * GIB, 75 * GIB]],
      ]),
    );
    expect(metrics.cpuPercent).toBe(20);
    expect(metrics.connections).toBe(6);
    expect(metrics.storageUsedPercent).toBe(50);
    expect(metrics.maxConnections).toBe(66);
    expect(metrics.backupRetentionDays).toBe(7);
  });

  it("reads missing series as zero, burst balance and storage included", () => {
    const metrics = summarizeMetrics(dbInstance(), new Map([["swap_usage", []]]));
    expect(metrics.swapUsageBytes).toBe(0);
    expect(metrics.deadlocks).toBe(0);
    expect(metrics.burstBalancePercent).toBe(0);
    expect(metrics.storageUsedPercent).toBe(0);
  });

  it("reports full storage when nothing is allocated", () => {
    const metrics = summarizeMetrics(dbInstance({ allocatedStorageGiB: 0 }), new Map([["storage", [GIB]]]));
    expect(metrics.storageUsedPercent).toBe(100);
  });

  it("uses the default connection ceiling for larger classes", () => {
    expect(summarizeMetrics(dbInstance({ instanceClass: "db.r5.large" }), new Map()).maxConnections).toBe(5000);
  });
});

describe("collectUtilizationMetrics", () => {
  it("queries hourly data over the lookback window", async () => {
    const source = { getMetricSeries: vi.fn(async () => new Map([["cpu", [55]]])) };
    const now = new Date("2024-05-08T00:00:00Z");

    const metrics = await collectUtilizationMetrics(source, dbInstance(), now);

    expect(metrics.cpuPercent).toBe(55);
    expect(source.getMetricSeries).toHaveBeenCalledWith(
      "db-1",
      buildMetricQueries(dbInstance()),
      { start: new Date("2024-05-01T00:00:00Z"), end: now },
      3600,
    );
  });
});

describe("CloudWatchMetricsSource", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("batches every query into one request per page", async () => {
    mockSend.mockResolvedValueOnce({
      MetricDataResults: [
        { Id: "cpu", Values: [12, 14] },
        { Id: "connections", Values: [3] },
      ],
    });

    const source = new CloudWatchMetricsSource({ region: "us-east-1" });
    const window = metricWindow(new Date("2024-05-08T00:00:00Z"));
    const series = await source.getMetricSeries(
      "db-1",
      [
        { id: "cpu", metricName: "CPUUtilization", statistic: "Average" },
        { id: "connections", metricName: "DatabaseConnections", statistic: "Average" },
        { id: "swap_usage", metricName: "SwapUsage", statistic: "Average" },
      ],
      window,
      3600,
    );

    expect(mockSend).toHaveBeenCalledTimes(1);
    expect(series.get("cpu")).toEqual([12, 14]);
    expect(series.get("connections")).toEqual([3]);
    expect(series.get("swap_usage")).toEqual([]);

    const input = vi.mocked(GetMetricDataCommand).mock.calls[0]?.[0];
    expect(input?.StartTime).toEqual(window.start);
    expect(input?.EndTime).toEqual(window.end);
    expect(input?.MetricDataQueries?.[0]).toEqual({
      Id: "cpu",
      MetricStat: {
        Metric: {
          Namespace: "AWS/RDS",
          MetricName: "CPUUtilization",
          Dimensions: [{ Name: "DBInstanceIdentifier", Value: "db-1" }],
        },
        Period: 3600,
        Stat: "Average",
      },
    });
  });

  it("concatenates values across pages", async () => {
    mockSend
      .mockResolvedValueOnce({ MetricDataResults: [{ Id: "cpu", Values: [1, 2] }], NextToken: "t-2" })
      .mockResolvedValueOnce({ MetricDataResults: [{ Id: "cpu", Values: [3] }] });

    const source = new CloudWatchMetricsSource({ region: "us-east-1" });
    const series = await source.getMetricSeries(
      "db-1",
      [{ id: "cpu", metricName: "CPUUtilization", statistic: "Average" }],
      metricWindow(new Date("2024-05-08T00:00:00Z")),
      3600,
    );

    expect(series.get("cpu")).toEqual([1, 2, 3]);
    expect(vi.mocked(GetMetricDataCommand).mock.calls[1]?.[0]?.NextToken).toBe("t-2");
  });
});
