/**
 * `cloudtrim analyze`
 *
 * Runs every enabled analyzer in every configured region, prints the summary
 * (or the JSON report) and writes the report file.
 */

import { runAnalyzers, type RunOutcome, type ScheduledAnalyzer } from "../analyzers/runner.js";
import type { CloudProvider } from "../analyzers/types.js";
import { buildReport, formatSummary, serializeReport, writeReport } from "../report/emitter.js";
import type { RuntimeEnv } from "../runtime.js";
import { createCommandContext, type CommandDeps, type ConfigOverrides } from "./context.js";

export type AnalyzeOptions = ConfigOverrides & {
  json?: boolean;
  skipCredentialCheck?: boolean;
};

const PROVIDER: CloudProvider = "aws";

export async function analyzeCommand(
  opts: AnalyzeOptions,
  runtime: RuntimeEnv,
  deps: CommandDeps = {},
): Promise<RunOutcome> {
  const { config, logger, registry } = await createCommandContext(opts, deps);
  const now = deps.now ?? (() => new Date());

  if (!opts.skipCredentialCheck) {
    for (const region of config.regions) {
      await registry.preflight({ provider: PROVIDER, region });
    }
  }

  const scheduled: ScheduledAnalyzer[] = [];
  for (const region of config.regions) {
    const analyzers = await registry.create({ provider: PROVIDER, region });
    scheduled.push(...analyzers.map((analyzer) => ({ analyzer, region })));
  }

  const outcome = await runAnalyzers(scheduled, { logger, signal: deps.signal });
  const report = buildReport(outcome, now());

  runtime.log(opts.json ? serializeReport(report).trimEnd() : formatSummary(report));

  if (config.report.writeFile) {
    const path = await writeReport(report, config.report.outputDir);
    logger.info(`Report written to ${path}`);
  }

  if (scheduled.length > 0 && outcome.results.length === 0) {
    runtime.exit(1);
  }
  return outcome;
}
