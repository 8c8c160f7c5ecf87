/**
 * RDS inventory over the AWS SDK.
 */

import {
  RDSClient,
  DescribeDBInstancesCommand,
  DescribeDBSnapshotsCommand,
  DescribeReservedDBInstancesCommand,
  type DBInstance,
  type DBSnapshot,
  type ReservedDBInstance,
} from "@aws-sdk/client-rds";
import { createAWSRetryRunner, type AWSRetryRunner } from "../retry.js";
import type { DatabaseInstance, DatabaseInventory, DatabaseSnapshot, ReservationRecord } from "../types.js";

const MAX_RECORDS = 100;

export type RdsInventoryOptions = {
  region: string;
  client?: RDSClient;
  retry?: AWSRetryRunner;
};

export function mapDBInstance(instance: DBInstance): DatabaseInstance {
  return {
    id: instance.DBInstanceIdentifier ?? "",
    instanceClass: instance.DBInstanceClass ?? "unknown",
    engine: instance.Engine ?? "unknown",
    engineVersion: instance.EngineVersion ?? "",
    allocatedStorageGiB: instance.AllocatedStorage ?? 0,
    multiAz: instance.MultiAZ ?? false,
    readReplicaSourceId: instance.ReadReplicaSourceDBInstanceIdentifier,
    backupRetentionDays: instance.BackupRetentionPeriod ?? 0,
  };
}

export function mapDBSnapshot(snapshot: DBSnapshot): DatabaseSnapshot {
  return {
    id: snapshot.DBSnapshotIdentifier ?? "",
    instanceId: snapshot.DBInstanceIdentifier ?? "",
  };
}

export function mapReservation(reserved: ReservedDBInstance): ReservationRecord {
  return {
    id: reserved.ReservedDBInstanceId ?? "",
    instanceClass: reserved.DBInstanceClass ?? "unknown",
    state: reserved.State ?? "unknown",
    instanceCount: reserved.DBInstanceCount ?? 0,
  };
}

export class RdsInventory implements DatabaseInventory {
  private readonly client: RDSClient;
  private readonly retry: AWSRetryRunner;

  constructor(options: RdsInventoryOptions) {
    this.client = options.client ?? new RDSClient({ region: options.region });
    this.retry = options.retry ?? createAWSRetryRunner();
  }

  async listDatabaseInstances(): Promise<DatabaseInstance[]> {
    const instances: DatabaseInstance[] = [];
    let marker: string | undefined;

    do {
      const command = new DescribeDBInstancesCommand({ MaxRecords: MAX_RECORDS, Marker: marker });
      const response = await this.retry(() => this.client.send(command), "DescribeDBInstances");
      for (const instance of response.DBInstances ?? []) {
        instances.push(mapDBInstance(instance));
      }
      marker = response.Marker;
    } while (marker);

    return instances;
  }

  async listDatabaseSnapshots(): Promise<DatabaseSnapshot[]> {
    const snapshots: DatabaseSnapshot[] = [];
    let marker: string | undefined;

    do {
      const command = new DescribeDBSnapshotsCommand({ MaxRecords: MAX_RECORDS, Marker: marker });
      const response = await this.retry(() => this.client.send(command), "DescribeDBSnapshots");
      for (const snapshot of response.DBSnapshots ?? []) {
        snapshots.push(mapDBSnapshot(snapshot));
      }
      marker = response.Marker;
    } while (marker);

    return snapshots;
  }

  async listReservedDatabaseCapacity(): Promise<ReservationRecord[]> {
    const reservations: ReservationRecord[] = [];
    let marker: string | undefined;

    do {
      const command = new DescribeReservedDBInstancesCommand({ MaxRecords: MAX_RECORDS, Marker: marker });
      const response = await this.retry(() => this.client.send(command), "DescribeReservedDBInstances");
      for (const reserved of response.ReservedDBInstances ?? []) {
        reservations.push(mapReservation(reserved));
      }
      marker = response.Marker;
    } while (marker);

    return reservations;
  }
}
