/**
 * Analysis Result Builder
 *
 * Accumulates recommendations and savings for one analyzer run. Savings can
 * only enter through `addSaving`, which pairs every amount with the line that
 * justifies it and drops non-positive amounts, so `potentialSavings` always
 * equals the sum of the savings-bearing recommendations.
 */

import type { AnalysisResult, AnalyzerCategory, CloudProvider } from "./types.js";

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function isPositiveAmount(amount: number): boolean {
  return Number.isFinite(amount) && amount > 0;
}

// =============================================================================
// Sections
// =============================================================================

/**
 * An ordered block of recommendation lines produced by one check (or one
 * resource). Appended to the result as a unit.
 */
export class RecommendationSection {
  private readonly entries: string[] = [];
  private savingsTotal = 0;
  private savingsItems = 0;

  addNote(line: string): this {
    this.entries.push(line);
    return this;
  }

  /** Prepend a header line; does not touch savings. */
  prependNote(line: string): this {
    this.entries.unshift(line);
    return this;
  }

  /**
   * Record a savings amount with its recommendation line.
   * Returns false (and records nothing) for zero, negative or non-finite amounts.
   */
  addSaving(amount: number, line: string): boolean {
    if (!isPositiveAmount(amount)) return false;
    this.entries.push(line);
    this.savingsTotal += amount;
    this.savingsItems += 1;
    return true;
  }

  get savings(): number {
    return this.savingsTotal;
  }

  get savingItemCount(): number {
    return this.savingsItems;
  }

  get length(): number {
    return this.entries.length;
  }

  lines(): string[] {
    return [...this.entries];
  }
}

// =============================================================================
// Builder
// =============================================================================

export type AnalysisResultInit = {
  analyzer: string;
  provider: CloudProvider;
  category: AnalyzerCategory;
  resourceType: string;
  now?: () => Date;
};

export class AnalysisResultBuilder {
  private readonly init: AnalysisResultInit;
  private readonly timestamp: string;
  private readonly recommendations: string[] = [];
  private readonly details: Record<string, string> = {};
  private total = 0;

  constructor(init: AnalysisResultInit) {
    this.init = init;
    this.timestamp = (init.now ?? (() => new Date()))().toISOString();
  }

  addNote(line: string): this {
    this.recommendations.push(line);
    return this;
  }

  addSaving(amount: number, line: string): boolean {
    if (!isPositiveAmount(amount)) return false;
    this.recommendations.push(line);
    this.total += amount;
    return true;
  }

  append(section: RecommendationSection): this {
    this.recommendations.push(...section.lines());
    this.total += section.savings;
    return this;
  }

  setDetail(label: string, value: string): this {
    this.details[label] = value;
    return this;
  }

  get potentialSavings(): number {
    return this.total;
  }

  build(): AnalysisResult {
    return Object.freeze({
      analyzer: this.init.analyzer,
      provider: this.init.provider,
      category: this.init.category,
      resourceType: this.init.resourceType,
      potentialSavings: this.total,
      recommendations: Object.freeze([...this.recommendations]),
      details: Object.freeze({ ...this.details }),
      timestamp: this.timestamp,
    });
  }
}
