import type { UnitResult } from '../../core/driver/driver.js';
import { describeOperation } from './describe.js';
import type { IFormatter, PlanReport } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatRun(results: UnitResult[]): string {
    return JSON.stringify(
      {
        units: results.map((result) => ({
          path: result.path,
          unit_file: result.unitFile,
          section: result.section,
          changed: result.changed,
          edits: result.edits,
          output: result.output,
          output_path: result.outputPath,
          // Patched text is only useful where it was not written anywhere.
          ...(result.outputPath === null ? { text: result.text } : {}),
          diagnostics: result.diagnostics,
        })),
        summary: {
          units: results.length,
          changed: results.filter((result) => result.changed).length,
          warnings: results.reduce((sum, result) => sum + result.diagnostics.length, 0),
        },
      },
      null,
      2
    );
  }

  formatPlan(report: PlanReport): string {
    return JSON.stringify(
      {
        path: report.path,
        sites: report.sites.map((site) => ({
          field: site.binding.qualifiedName,
          operation: describeOperation(site.operation),
          strategy: site.strategy,
          line: site.location.line,
          column: site.location.column,
        })),
        aggregates: report.aggregates.map((aggregate) => ({
          owner: aggregate.owner.qualifiedName,
          fields: aggregate.bindings.map((binding) => binding.qualifiedName),
          text: aggregate.text,
        })),
        diagnostics: report.diagnostics,
      },
      null,
      2
    );
  }
}
