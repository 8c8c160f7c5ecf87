import { describe, it, expect, beforeEach, vi } from "vitest";
import { DescribeDBInstancesCommand } from "@aws-sdk/client-rds";
import { RdsInventory, mapDBInstance, mapReservation } from "./inventory.js";

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

vi.mock("@aws-sdk/client-rds", () => ({
  RDSClient: vi.fn(() => ({ send: mockSend })),
  DescribeDBInstancesCommand: vi.fn(),
  DescribeDBSnapshotsCommand: vi.fn(),
  DescribeReservedDBInstancesCommand: vi.fn(),
}));

describe("mapDBInstance", () => {
  it("maps the fields the heuristics read", () => {
    expect(
      mapDBInstance({
        DBInstanceIdentifier: "orders-replica",
        DBInstanceClass: "db.t3.small",
        Engine: "postgres",
        EngineVersion: "15.4",
        AllocatedStorage: 250,
        MultiAZ: true,
        ReadReplicaSourceDBInstanceIdentifier: "orders",
        BackupRetentionPeriod: 14,
      }),
    ).toEqual({
      id: "orders-replica",
      instanceClass: "db.t3.small",
      engine: "postgres",
      engineVersion: "15.4",
      allocatedStorageGiB: 250,
      multiAz: true,
      readReplicaSourceId: "orders",
      backupRetentionDays: 14,
    });
  });

  it("defaults missing numeric fields to zero", () => {
    const instance = mapDBInstance({ DBInstanceIdentifier: "bare" });
    expect(instance.allocatedStorageGiB).toBe(0);
    expect(instance.backupRetentionDays).toBe(0);
    expect(instance.multiAz).toBe(false);
  });
});

describe("mapReservation", () => {
  it("keeps the reservation state verbatim", () => {
    expect(
      mapReservation({ ReservedDBInstanceId: "ri-1", DBInstanceClass: "db.r5.large", State: "active", DBInstanceCount: 2 }),
    ).toEqual({ id: "ri-1", instanceClass: "db.r5.large", state: "active", instanceCount: 2 });
  });
});

describe("RdsInventory", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("follows Marker across DB instance pages", async () => {
    mockSend
      .mockResolvedValueOnce({ DBInstances: [{ DBInstanceIdentifier: "db-1" }], Marker: "m-2" })
      .mockResolvedValueOnce({ DBInstances: [{ DBInstanceIdentifier: "db-2" }] });

    const inventory = new RdsInventory({ region: "eu-west-1" });
    const instances = await inventory.listDatabaseInstances();

    expect(instances.map((i) => i.id)).toEqual(["db-1", "db-2"]);
    const calls = vi.mocked(DescribeDBInstancesCommand).mock.calls;
    expect(calls[0]?.[0]).toEqual({ MaxRecords: 100, Marker: undefined });
    expect(calls[1]?.[0]).toEqual({ MaxRecords: 100, Marker: "m-2" });
  });

  it("lists snapshots with their source instance", async () => {
    mockSend.mockResolvedValueOnce({
      DBSnapshots: [
        { DBSnapshotIdentifier: "snap-1", DBInstanceIdentifier: "db-1" },
        { DBSnapshotIdentifier: "snap-2", DBInstanceIdentifier: "db-1" },
      ],
    });

    const inventory = new RdsInventory({ region: "eu-west-1" });

    expect(await inventory.listDatabaseSnapshots()).toEqual([
      { id: "snap-1", instanceId: "db-1" },
      { id: "snap-2", instanceId: "db-1" },
    ]);
  });

  it("lists reserved capacity", async () => {
    mockSend.mockResolvedValueOnce({
      ReservedDBInstances: [{ ReservedDBInstanceId: "ri-1", DBInstanceClass: "db.t3.micro", State: "retired" }],
    });

    const inventory = new RdsInventory({ region: "eu-west-1" });
    const reservations = await inventory.listReservedDatabaseCapacity();

    expect(reservations).toEqual([{ id: "ri-1", instanceClass: "db.t3.micro", state: "retired", instanceCount: 0 }]);
  });
});
