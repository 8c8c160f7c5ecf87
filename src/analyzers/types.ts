/**
 * Analyzer Types
 *
 * Shared result model and the contract every cost analyzer implements.
 */

// =============================================================================
// Common Types
// =============================================================================

export type CloudProvider = "aws" | "azure" | "gcp";

export type AnalyzerCategory =
  | "compute"
  | "storage"
  | "network"
  | "database"
  | "container";

// =============================================================================
// Results
// =============================================================================

/**
 * Output of one analyzer invocation. Frozen once returned.
 */
export type AnalysisResult = {
  readonly analyzer: string;
  readonly provider: CloudProvider;
  readonly category: AnalyzerCategory;
  readonly resourceType: string;
  /** USD per month; sum of every savings-bearing recommendation. */
  readonly potentialSavings: number;
  readonly recommendations: readonly string[];
  readonly details: Readonly<Record<string, string>>;
  /** ISO-8601 */
  readonly timestamp: string;
};

// =============================================================================
// Analyzer Contract
// =============================================================================

export type ExecuteOptions = {
  /** Stops new collaborator calls once aborted; partial work is not rolled back. */
  signal?: AbortSignal;
};

export interface Analyzer {
  getName(): string;
  getCategory(): AnalyzerCategory;
  execute(options?: ExecuteOptions): Promise<AnalysisResult>;
}

/** Where an analyzer set should run. */
export type AnalyzerTarget = {
  provider: CloudProvider;
  region: string;
};
