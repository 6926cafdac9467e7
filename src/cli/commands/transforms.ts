import { Command } from 'commander';
import chalk from 'chalk';
import type { TransformRegistry } from '../../core/transforms/registry.js';

/**
 * Create the transforms command.
 */
export function createTransformsCommand(registry: TransformRegistry): Command {
  return new Command('transforms')
    .description('List the transforms a run configuration can name')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const transforms = registry.list();
      if (options.json) {
        console.log(JSON.stringify(transforms, null, 2));
        return;
      }
      if (transforms.length === 0) {
        console.log(chalk.dim('No transforms registered.'));
        return;
      }
      for (const { name, description } of transforms) {
        console.log(`${chalk.bold(name)}  ${description}`);
      }
    });
}
