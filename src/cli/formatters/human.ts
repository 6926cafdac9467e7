import chalk from 'chalk';
import type { UnitResult } from '../../core/driver/driver.js';
import type { Diagnostic } from '../../core/transforms/types.js';
import { describeLocation, describeOperation } from './describe.js';
import type { FormatOptions, IFormatter, PlanReport } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatRun(results: UnitResult[]): string {
    const lines: string[] = [];
    let changed = 0;
    let warnings = 0;

    for (const result of results) {
      if (result.changed) changed++;
      warnings += result.diagnostics.length;
      if (!result.changed && result.diagnostics.length === 0 && !this.options.verbose) continue;

      const icon = result.changed ? this.colorize('✓', 'green') : this.colorize('-', 'dim');
      const target = result.outputPath ? ` -> ${result.outputPath}` : '';
      lines.push(`${icon} ${result.path} (${plural(result.edits, 'edit')})${target}`);
      lines.push(...this.formatDiagnostics(result.diagnostics));
    }

    if (lines.length > 0) lines.push('');
    lines.push(`${changed}/${plural(results.length, 'unit')} changed, ${plural(warnings, 'warning')}`);
    return lines.join('\n');
  }

  formatPlan(report: PlanReport): string {
    const lines: string[] = [`${report.path}: ${plural(report.sites.length, 'access site')}`];

    for (const site of report.sites) {
      const strategy = site.strategy === 'in-place' ? site.strategy : this.colorize(site.strategy, 'yellow');
      lines.push(
        `   ${describeLocation(site.location)}  ${site.binding.qualifiedName}  ${describeOperation(site.operation)}  ${strategy}`
      );
    }

    for (const aggregate of report.aggregates) {
      const names = aggregate.bindings.map((binding) => binding.name).join(', ');
      lines.push(`   ${this.colorize('accessors', 'cyan')} ${aggregate.owner.qualifiedName}: ${names}`);
    }

    lines.push(...this.formatDiagnostics(report.diagnostics));
    return lines.join('\n');
  }

  private formatDiagnostics(diagnostics: Diagnostic[]): string[] {
    return diagnostics.map(
      (diagnostic) =>
        `   ${this.colorize('⚠', 'yellow')} ${describeLocation(diagnostic.location)} ${diagnostic.message} [${diagnostic.code}]`
    );
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
