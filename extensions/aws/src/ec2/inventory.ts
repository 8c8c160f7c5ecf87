/**
 * EC2 / EBS inventory over the AWS SDK.
 */

import {
  EC2Client,
  DescribeInstancesCommand,
  DescribeVolumesCommand,
  type Filter,
  type Instance,
  type Volume as SdkVolume,
} from "@aws-sdk/client-ec2";
import { createAWSRetryRunner, type AWSRetryRunner } from "../retry.js";
import type {
  ComputeInstance,
  ComputeInventory,
  InstanceFilter,
  InstanceState,
  Volume,
  VolumeFilter,
  VolumeState,
} from "../types.js";

const INSTANCE_PAGE_SIZE = 1000;
const VOLUME_PAGE_SIZE = 500;

export type Ec2InventoryOptions = {
  region: string;
  client?: EC2Client;
  retry?: AWSRetryRunner;
};

function nameTag(tags: { Key?: string; Value?: string }[] | undefined, fallback: string): string {
  return tags?.find((t) => t.Key === "Name")?.Value || fallback;
}

function toInstanceState(name: string | undefined): InstanceState {
  return name === "running" || name === "stopped" ? name : "other";
}

function toVolumeState(state: string | undefined): VolumeState {
  return state === "available" || state === "in-use" ? state : "other";
}

export function mapInstance(instance: Instance): ComputeInstance {
  const id = instance.InstanceId ?? "";
  return {
    id,
    type: instance.InstanceType ?? "unknown",
    state: toInstanceState(instance.State?.Name),
    name: nameTag(instance.Tags, id),
  };
}

export function mapVolume(volume: SdkVolume): Volume {
  const id = volume.VolumeId ?? "";
  return {
    id,
    type: volume.VolumeType ?? "unknown",
    sizeGiB: volume.Size ?? 0,
    state: toVolumeState(volume.State),
    attachedInstanceId: volume.Attachments?.find((a) => a.InstanceId)?.InstanceId,
    name: nameTag(volume.Tags, id),
  };
}

export class Ec2Inventory implements ComputeInventory {
  private readonly client: EC2Client;
  private readonly retry: AWSRetryRunner;

  constructor(options: Ec2InventoryOptions) {
    this.client = options.client ?? new EC2Client({ region: options.region });
    this.retry = options.retry ?? createAWSRetryRunner();
  }

  async listInstances(filter: InstanceFilter = {}): Promise<ComputeInstance[]> {
    const filters: Filter[] = [];
    const serverStates = filter.states?.filter((s) => s !== "other");
    // "other" spans several API states; it is filtered client-side only
    if (serverStates && serverStates.length > 0 && serverStates.length === filter.states?.length) {
      filters.push({ Name: "instance-state-name", Values: serverStates });
    }

    const instances: ComputeInstance[] = [];
    let nextToken: string | undefined;

    do {
      const command = new DescribeInstancesCommand({
        Filters: filters.length > 0 ? filters : undefined,
        MaxResults: INSTANCE_PAGE_SIZE,
        NextToken: nextToken,
      });
      const response = await this.retry(() => this.client.send(command), "DescribeInstances");

      for (const reservation of response.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          instances.push(mapInstance(instance));
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);

    const states = filter.states;
    return states && states.length > 0 ? instances.filter((i) => states.includes(i.state)) : instances;
  }

  async listVolumes(filter: VolumeFilter = {}): Promise<Volume[]> {
    const filters: Filter[] = [];
    if (filter.attachedInstanceId) {
      filters.push({ Name: "attachment.instance-id", Values: [filter.attachedInstanceId] });
    }
    const serverStates = filter.states?.filter((s) => s !== "other");
    if (serverStates && serverStates.length > 0 && serverStates.length === filter.states?.length) {
      filters.push({ Name: "status", Values: serverStates });
    }

    const volumes: Volume[] = [];
    let nextToken: string | undefined;

    do {
      const command = new DescribeVolumesCommand({
        Filters: filters.length > 0 ? filters : undefined,
        MaxResults: VOLUME_PAGE_SIZE,
        NextToken: nextToken,
      });
      const response = await this.retry(() => this.client.send(command), "DescribeVolumes");

      for (const volume of response.Volumes ?? []) {
        volumes.push(mapVolume(volume));
      }
      nextToken = response.NextToken;
    } while (nextToken);

    const states = filter.states;
    return states && states.length > 0 ? volumes.filter((v) => states.includes(v.state)) : volumes;
  }
}
