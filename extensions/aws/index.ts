/**
 * AWS provider plugin.
 *
 * Registers the EC2 and RDS analyzers for the `aws` provider, a credential
 * preflight, and a unit price lookup. One pricing service is built per
 * registration and shared by every region's analyzers.
 */

import type { CostPlugin, PluginApi } from "../../src/plugin-sdk/index.js";
import {
  CloudWatchMetricsSource,
  ComputeAnalyzer,
  DatabaseAnalyzer,
  Ec2Inventory,
  RdsInventory,
  createAWSRetryRunner,
  createPricingService,
  validateCredentials,
  type PricingService,
} from "./src/index.js";

const awsPlugin: CostPlugin = {
  id: "aws",
  name: "AWS",
  description: "EC2 and RDS cost-saving recommendations",

  register(api: PluginApi) {
    const { config, logger } = api;
    const retry = createAWSRetryRunner({ retry: config.retry, logger });

    let pricing: Promise<PricingService> | undefined;
    const getPricing = () => (pricing ??= createPricingService(config.pricing));

    api.registerAnalyzers("aws", async (ctx) => {
      const pricingService = await getPricing();
      return [
        new ComputeAnalyzer({
          region: ctx.region,
          inventory: new Ec2Inventory({ region: ctx.region, retry }),
          pricing: pricingService,
          logger: ctx.logger,
          unattachedVolumeHourlyExpansion: ctx.config.analyzers.compute.unattachedVolumeHourlyExpansion,
        }),
        new DatabaseAnalyzer({
          region: ctx.region,
          inventory: new RdsInventory({ region: ctx.region, retry }),
          metrics: new CloudWatchMetricsSource({ region: ctx.region, retry }),
          pricing: pricingService,
          logger: ctx.logger,
          concurrency: ctx.config.analyzers.database.concurrency,
        }),
      ];
    });

    api.registerPreflight("aws", async (region) => {
      const identity = await validateCredentials(region, { retry });
      logger.info(`AWS credentials valid for account ${identity.accountId}`, { region });
    });

    api.registerPriceLookup("aws", async (query) => {
      const pricingService = await getPricing();
      return pricingService.getUnitPrice({ kind: query.kind, type: query.type }, query.region);
    });
  },
};

export default awsPlugin;
