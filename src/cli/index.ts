import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createTransformRegistry, type TransformRegistry } from '../core/transforms/registry.js';
import { registerBuiltinTransforms } from '../core/transforms/register.js';
import { createRunCommand } from './commands/run.js';
import { createPlanCommand } from './commands/plan.js';
import { createTransformsCommand } from './commands/transforms.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(registry: TransformRegistry = registerBuiltinTransforms(createTransformRegistry())): Command {
  const program = new Command()
    .name('accessorize')
    .description('Encapsulate fields behind synthesized getters and setters')
    .version(VERSION);
  program.addCommand(createRunCommand(registry));
  program.addCommand(createPlanCommand());
  program.addCommand(createTransformsCommand(registry));
  return program;
}
