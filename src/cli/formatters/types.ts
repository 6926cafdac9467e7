/**
 * Formatter type definitions.
 */
import type { AccessSite, AggregateRewritePlan } from '../../core/accessors/types.js';
import type { UnitResult } from '../../core/driver/driver.js';
import type { Diagnostic } from '../../core/transforms/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Also list units that did not change */
  verbose: boolean;
}

/**
 * What `plan` found in one unit.
 */
export interface PlanReport {
  path: string;
  sites: AccessSite[];
  aggregates: AggregateRewritePlan[];
  diagnostics: Diagnostic[];
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatRun(results: UnitResult[]): string;
  formatPlan(report: PlanReport): string;
}
