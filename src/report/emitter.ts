/**
 * Report emitter
 *
 * Serializes a run's results to a JSON file and renders the console summary.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { formatUsd } from "../analyzers/result.js";
import type { AnalyzerFailure, RunOutcome } from "../analyzers/runner.js";
import type { AnalysisResult } from "../analyzers/types.js";

export type CostReport = {
  generatedAt: string;
  totalPotentialSavings: number;
  results: readonly AnalysisResult[];
  failures: readonly AnalyzerFailure[];
};

export function buildReport(outcome: RunOutcome, generatedAt: Date = new Date()): CostReport {
  return {
    generatedAt: generatedAt.toISOString(),
    totalPotentialSavings: outcome.results.reduce((sum, r) => sum + r.potentialSavings, 0),
    results: outcome.results,
    failures: outcome.failures,
  };
}

const pad2 = (n: number) => String(n).padStart(2, "0");

/** `cloudtrim_report_YYYYMMDD_HHMMSS.json`, in UTC. */
export function reportFileName(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad2(at.getUTCMonth() + 1)}${pad2(at.getUTCDate())}`;
  const time = `${pad2(at.getUTCHours())}${pad2(at.getUTCMinutes())}${pad2(at.getUTCSeconds())}`;
  return `cloudtrim_report_${date}_${time}.json`;
}

export function serializeReport(report: CostReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/** Write the report into `outputDir` and return the file path. */
export async function writeReport(report: CostReport, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const path = join(outputDir, reportFileName(new Date(report.generatedAt)));
  await writeFile(path, serializeReport(report), "utf-8");
  return path;
}

export function formatSummary(report: CostReport): string {
  const lines: string[] = ["=== Cost Optimization Report ==="];

  for (const result of report.results) {
    lines.push("");
    lines.push(`Analyzer: ${result.analyzer}`);
    lines.push(`Cloud Provider: ${result.provider}`);
    lines.push(`Potential Savings: ${formatUsd(result.potentialSavings)}`);
    if (result.recommendations.length > 0) {
      lines.push("Recommendations:");
      for (const rec of result.recommendations) {
        lines.push(`- ${rec}`);
      }
    }
  }

  if (report.failures.length > 0) {
    lines.push("");
    lines.push("Failed analyzers:");
    for (const failure of report.failures) {
      const where = failure.region ? ` (${failure.region})` : "";
      lines.push(`- ${failure.analyzer}${where}: ${failure.error}`);
    }
  }

  lines.push("");
  lines.push(`Total Potential Savings: ${formatUsd(report.totalPotentialSavings)}`);
  return lines.join("\n");
}
