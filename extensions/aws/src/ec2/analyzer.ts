/**
 * EC2 Optimization Analyzer
 *
 * Three independent checks over one region's compute fleet:
 *   - running instances on an older family with a cheaper successor
 *   - stopped instances still paying for attached EBS volumes
 *   - unattached (available) EBS volumes
 *
 * Only a failure to list the region's volumes aborts the run. Every other
 * collaborator failure is logged and skips the affected check or resource.
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
import type { ComputeInstance, ComputeInventory, PricingService, Volume } from "../types.js";
import { EC2_UPGRADE_MAP, upgradeTarget, type UpgradeMap } from "../upgrade-tables.js";

export const COMPUTE_ANALYZER_NAME = "EC2 Optimization Analyzer";

/** Attached volumes of stopped instances: GiB-month price × size. */
export const STOPPED_VOLUME_COST_MULTIPLIER = 1;

/**
 * Unattached volumes: GiB-month price × size × 24 h × 30 d. The price is
 * already monthly, so this overstates the cost; `unattachedVolumeHourlyExpansion:
 * false` switches to {@link STOPPED_VOLUME_COST_MULTIPLIER}.
 */
export const UNATTACHED_VOLUME_COST_MULTIPLIER = 24 * 30;

export const STOPPED_INSTANCE_ACTIONS = [
  "- Terminate instances that have been stopped for extended periods",
  "- Create snapshots of important volumes before termination",
  "- Implement automated cleanup of stopped instances after defined period",
  "- Use automated snapshots to recreate volumes when needed",
] as const;

export type ComputeAnalyzerOptions = {
  region: string;
  inventory: ComputeInventory;
  pricing: PricingService;
  logger: Logger;
  upgradeMap?: UpgradeMap;
  /** Defaults to true. */
  unattachedVolumeHourlyExpansion?: boolean;
  now?: () => Date;
};

type CheckOutcome = {
  section: RecommendationSection;
  count: number;
};

export class ComputeAnalyzer implements Analyzer {
  private readonly region: string;
  private readonly inventory: ComputeInventory;
  private readonly pricing: PricingService;
  private readonly logger: Logger;
  private readonly upgradeMap: UpgradeMap;
  private readonly unattachedMultiplier: number;
  private readonly now?: () => Date;

  constructor(options: ComputeAnalyzerOptions) {
    this.region = options.region;
    this.inventory = options.inventory;
    this.pricing = options.pricing;
    this.logger = options.logger;
    this.upgradeMap = options.upgradeMap ?? EC2_UPGRADE_MAP;
    this.unattachedMultiplier =
      options.unattachedVolumeHourlyExpansion === false
        ? STOPPED_VOLUME_COST_MULTIPLIER
        : UNATTACHED_VOLUME_COST_MULTIPLIER;
    this.now = options.now;
  }

  getName(): string {
    return COMPUTE_ANALYZER_NAME;
  }

  getCategory(): AnalyzerCategory {
    return "compute";
  }

  async execute(options: ExecuteOptions = {}): Promise<AnalysisResult> {
    const { signal } = options;
    this.logger.info(`Starting EC2 analysis in region: ${this.region}`);

    const builder = new AnalysisResultBuilder({
      analyzer: COMPUTE_ANALYZER_NAME,
      provider: "aws",
      category: "compute",
      resourceType: "EC2",
      now: this.now,
    });

    let volumes: Volume[];
    try {
      volumes = await this.inventory.listVolumes();
    } catch (err) {
      throw new AnalyzerError(COMPUTE_ANALYZER_NAME, "failed to describe volumes", err);
    }

    const upgrades = await this.checkUpgradeCandidates(signal);
    builder.append(upgrades.section).setDetail("Upgrade Candidates", String(upgrades.count));

    const stopped = await this.checkStoppedInstances(signal);
    builder.append(stopped.section).setDetail("Stopped Instances", String(stopped.count));

    const unattached = await this.checkUnattachedVolumes(volumes, signal);
    builder.append(unattached.section).setDetail("Unattached Volumes", String(unattached.count));

    builder.setDetail("Total Monthly Savings", formatUsd(builder.potentialSavings));
    return builder.build();
  }

  // --------------------------------------------------------------------------
  // Checks
  // --------------------------------------------------------------------------

  private async checkUpgradeCandidates(signal?: AbortSignal): Promise<CheckOutcome> {
    const section = new RecommendationSection();
    const instances = await this.listInstancesOrSkip("running");

    for (const instance of instances) {
      if (signal?.aborted) break;
      this.logger.debug?.(`Found EC2 instance - Name: ${instance.name}, ID: ${instance.id}, Type: ${instance.type}`);

      const target = upgradeTarget(this.upgradeMap, instance.type);
      if (!target) continue;

      let savings: number;
      try {
        savings = await this.pricing.getUpgradeSavings(instance.type, target, this.region);
      } catch (err) {
        this.logger.error(`Failed to calculate savings for instance ${instance.id}`, {
          error: formatErrorMessage(err),
        });
        continue;
      }

      section.addSaving(
        savings,
        `Instance ${instance.id}: Upgrade from ${instance.type} to ${target} (Monthly savings: ${formatUsd(savings)})`,
      );
    }

    if (section.savingItemCount > 0) {
      section.prependNote(`Found ${section.savingItemCount} instances with optimization opportunities:`);
    }
    return { section, count: section.savingItemCount };
  }

  private async checkStoppedInstances(signal?: AbortSignal): Promise<CheckOutcome> {
    const section = new RecommendationSection();
    const instances = await this.listInstancesOrSkip("stopped");
    let inspected = 0;

    for (const instance of instances) {
      if (signal?.aborted) break;
      this.logger.debug?.(`Found stopped EC2 instance - Name: ${instance.name}, ID: ${instance.id}, Type: ${instance.type}`);

      let attached: Volume[];
      try {
        attached = await this.inventory.listVolumes({ attachedInstanceId: instance.id });
      } catch (err) {
        this.logger.error(`Failed to get volumes for instance ${instance.id}`, { error: formatErrorMessage(err) });
        continue;
      }
      inspected += 1;

      for (const volume of attached) {
        if (signal?.aborted) break;
        const monthly = await this.volumeMonthlyCost(volume, STOPPED_VOLUME_COST_MULTIPLIER);
        if (monthly === undefined) continue;
        section.addSaving(
          monthly,
          `Instance ${instance.id}: ${volume.type} volume of size ${volume.sizeGiB} GB costing ${formatUsd(monthly)} per month`,
        );
      }
    }

    if (inspected > 0) {
      section.prependNote(`Found ${inspected} stopped instances that are still incurring EBS costs:`);
      section.addNote(`Total potential monthly savings: ${formatUsd(section.savings)}`);
      section.addNote("Consider taking these actions:");
      for (const action of STOPPED_INSTANCE_ACTIONS) section.addNote(action);
    }
    return { section, count: inspected };
  }

  private async checkUnattachedVolumes(volumes: Volume[], signal?: AbortSignal): Promise<CheckOutcome> {
    const section = new RecommendationSection();
    const available = volumes.filter((v) => v.state === "available");
    if (available.length > 0 && this.unattachedMultiplier !== STOPPED_VOLUME_COST_MULTIPLIER) {
      this.logger.warn("Unattached volume costs treat the GiB-month price as hourly (x 24 x 30)", {
        region: this.region,
      });
    }

    for (const volume of available) {
      if (signal?.aborted) break;
      this.logger.debug?.(
        `Found unattached EBS volume - Name: ${volume.name}, ID: ${volume.id}, Type: ${volume.type}, Size: ${volume.sizeGiB} GB`,
      );

      if (!this.pricing.isRegionPriced(this.region)) {
        section.addNote(`Unattached volume ${volume.id} in region ${this.region} (pricing not available)`);
        continue;
      }

      const monthly = await this.volumeMonthlyCost(volume, this.unattachedMultiplier);
      if (monthly === undefined) continue;
      section.addSaving(
        monthly,
        `Unattached ${volume.type} volume ${volume.id} of size ${volume.sizeGiB} GB costing approximately ${formatUsd(monthly)} per month`,
      );
    }
    return { section, count: available.length };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async listInstancesOrSkip(state: "running" | "stopped"): Promise<ComputeInstance[]> {
    try {
      return await this.inventory.listInstances({ states: [state] });
    } catch (err) {
      this.logger.error(`Failed to list ${state} instances`, {
        region: this.region,
        error: formatErrorMessage(err),
      });
      return [];
    }
  }

  /** Undefined when the region or volume type has no price. */
  private async volumeMonthlyCost(volume: Volume, multiplier: number): Promise<number | undefined> {
    if (!this.pricing.isRegionPriced(this.region)) {
      this.logger.warn(`Region ${this.region} not supported for pricing calculations`);
      return undefined;
    }
    try {
      const price = await this.pricing.getUnitPrice({ kind: "volume", type: volume.type }, this.region);
      return price * volume.sizeGiB * multiplier;
    } catch (err) {
      this.logger.error(`Failed to get price for volume ${volume.id}`, { error: formatErrorMessage(err) });
      return undefined;
    }
  }
}
