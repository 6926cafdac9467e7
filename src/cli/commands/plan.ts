import { Command } from 'commander';
import * as path from 'node:path';
import { AccessorsTransform } from '../../core/accessors/transform.js';
import { loadCompilationUnit } from '../../core/ast/loader.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';

interface PlanOptions {
  field: string[];
  entry?: string[];
  json?: boolean;
}

/**
 * Create the plan command.
 */
export function createPlanCommand(): Command {
  return new Command('plan')
    .description('List the access sites the accessors transform would rewrite, without writing anything')
    .argument('<unit>', 'Compilation-unit document (.ast.json)')
    .requiredOption('-f, --field <names...>', 'Qualified names of the fields to encapsulate (e.g. Foo::x)')
    .option('-e, --entry <names...>', 'Free functions whose bodies are scanned (default: main)')
    .option('--json', 'Output as JSON')
    .action(async (unitFile: string, options: PlanOptions) => {
      try {
        await runPlan(unitFile, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runPlan(unitFile: string, options: PlanOptions): Promise<void> {
  const unit = await loadCompilationUnit(path.resolve(process.cwd(), unitFile));
  const transform = new AccessorsTransform({ fields: options.field, entryPoints: options.entry });
  const plan = transform.plan(unit);

  const formatter = createFormatter(options.json ? 'json' : 'human');
  console.log(formatter.formatPlan({ path: unit.path, ...plan }));
}
