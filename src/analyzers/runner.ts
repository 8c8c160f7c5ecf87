/**
 * Runs analyzers one after another and collects their results.
 */

import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { AnalysisResult, Analyzer } from "./types.js";

export type AnalyzerFailure = {
  analyzer: string;
  region?: string;
  error: string;
};

export type RunOutcome = {
  results: AnalysisResult[];
  failures: AnalyzerFailure[];
};

export type ScheduledAnalyzer = {
  analyzer: Analyzer;
  region?: string;
};

export type RunOptions = {
  logger: Logger;
  signal?: AbortSignal;
};

export async function runAnalyzers(
  scheduled: ScheduledAnalyzer[],
  options: RunOptions,
): Promise<RunOutcome> {
  const { logger, signal } = options;
  const results: AnalysisResult[] = [];
  const failures: AnalyzerFailure[] = [];

  for (const { analyzer, region } of scheduled) {
    if (signal?.aborted) {
      logger.warn(`Run cancelled; skipping ${analyzer.getName()}`);
      break;
    }

    logger.info(`Executing analyzer: ${analyzer.getName()}`, { region });
    try {
      results.push(await analyzer.execute({ signal }));
    } catch (err) {
      const error = formatErrorMessage(err);
      logger.error(`Analyzer ${analyzer.getName()} failed`, { region, error });
      failures.push({ analyzer: analyzer.getName(), region, error });
    }
  }

  return { results, failures };
}
