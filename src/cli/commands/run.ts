import { Command } from 'commander';
import { DEFAULT_CONFIG_PATH, loadRunConfig, parseRunConfig } from '../../core/config/loader.js';
import { runSections } from '../../core/driver/driver.js';
import type { TransformRegistry } from '../../core/transforms/registry.js';
import { readStream } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';

interface RunOptions {
  config: string;
  dryRun?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Create the run command.
 */
export function createRunCommand(registry: TransformRegistry): Command {
  return new Command('run')
    .description('Apply the configured transforms to compilation units')
    .option('-c, --config <path>', "Run configuration file, or '-' to read it from stdin", DEFAULT_CONFIG_PATH)
    .option('--dry-run', 'Compute the patched text without writing files')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Log every unit and transform, list unchanged units')
    .action(async (options: RunOptions) => {
      try {
        await runConfigured(registry, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runConfigured(registry: TransformRegistry, options: RunOptions): Promise<void> {
  const projectRoot = process.cwd();
  if (options.verbose) log.setLevel('debug');

  const sections =
    options.config === '-'
      ? parseRunConfig(await readStream(process.stdin), '<stdin>')
      : await loadRunConfig(projectRoot, options.config);

  // Patched text owns stdout; logging moves to stderr.
  if (sections.some((section) => section.output.mode === 'stdout')) {
    log.setOutput('stderr');
  }

  const results = await runSections(sections, { projectRoot, registry, dryRun: options.dryRun });

  if (options.json) {
    console.log(createFormatter('json').formatRun(results));
    return;
  }

  const toStdout = results.filter((result) => result.output === 'stdout');
  for (const result of toStdout) {
    process.stdout.write(result.text);
  }
  const summary = createFormatter('human', { verbose: options.verbose }).formatRun(results);
  if (toStdout.length > 0) {
    // The summary follows the logging onto stderr.
    console.error(summary);
  } else {
    console.log(summary);
  }
}
