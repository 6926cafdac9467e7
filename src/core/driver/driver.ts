/**
 * Runs configured sections: loads each compilation unit, applies the
 * section's transforms and writes the patched text.
 */
import * as path from 'node:path';
import { DEFAULT_UNIT_GLOB, type OutputConfig, type OutputMode, type RunSection } from '../config/schema.js';
import { loadCompilationUnit } from '../ast/loader.js';
import type { TransformRegistry } from '../transforms/registry.js';
import { applyTransforms } from '../transforms/runner.js';
import type { Diagnostic, Transform, TransformResult } from '../transforms/types.js';
import { globFiles, isGlobPattern, writeFile } from '../../utils/file-system.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export interface DriverOptions {
  /** Root that relative unit, source and output paths resolve against */
  projectRoot: string;
  registry: TransformRegistry;
  /** Compute results without writing anything */
  dryRun?: boolean;
  logger?: Logger;
}

export interface UnitResult extends TransformResult {
  /** 1-based index of the run section */
  section: number;
  /** The compilation-unit document the unit was loaded from */
  unitFile: string;
  output: OutputMode;
  /** Where the patched text was written, null when nothing was written */
  outputPath: string | null;
}

export async function runSections(sections: RunSection[], options: DriverOptions): Promise<UnitResult[]> {
  const log = options.logger ?? defaultLogger;
  const results: UnitResult[] = [];

  for (const [index, section] of sections.entries()) {
    const number = index + 1;
    const transforms = createSectionTransforms(section, options.registry);
    if (transforms.length === 0) {
      log.warn(`Section ${number} lists no transforms; skipped`);
      continue;
    }

    const files = await resolveUnitFiles(section, options.projectRoot, log);
    if (files.length === 0) {
      log.warn(`Section ${number} matched no compilation units`);
      continue;
    }

    for (const file of files) {
      log.debug(`Section ${number}: ${file}`);
      const unit = await loadCompilationUnit(file);
      const result = applyTransforms(unit, transforms, log);
      reportDiagnostics(result.diagnostics, log);

      const outputPath = options.dryRun
        ? null
        : await writeOutput(result, section.output, options.projectRoot);
      results.push({ ...result, section: number, unitFile: file, output: section.output.mode, outputPath });
    }
  }

  return results;
}

/**
 * Instantiate a section's transforms in the order the section lists them.
 */
export function createSectionTransforms(section: RunSection, registry: TransformRegistry): Transform[] {
  return Object.entries(section.transforms ?? {}).map(([name, options]) => registry.create(name, options));
}

/**
 * Absolute paths of the unit documents a section names. Without a file
 * list, every `*.ast.json` under the project root is taken.
 */
export async function resolveUnitFiles(
  section: RunSection,
  projectRoot: string,
  log: Logger = defaultLogger
): Promise<string[]> {
  if (!section.files) {
    log.warn(`No files listed; scanning ${DEFAULT_UNIT_GLOB} under ${projectRoot}`);
    return globFiles(DEFAULT_UNIT_GLOB, { cwd: projectRoot });
  }

  const files: string[] = [];
  for (const entry of section.files) {
    if (isGlobPattern(entry)) {
      files.push(...(await globFiles(entry, { cwd: projectRoot })));
    } else {
      files.push(path.resolve(projectRoot, entry));
    }
  }
  return [...new Set(files)];
}

/**
 * Path the patched text of a unit goes to, or null for stdout.
 */
export function resolveOutputPath(unitPath: string, output: OutputConfig, projectRoot: string): string | null {
  const source = path.resolve(projectRoot, unitPath);
  switch (output.mode) {
    case 'in-place':
      return source;
    case 'stdout':
      return null;
    case 'out-dir': {
      const relative = path.relative(projectRoot, source);
      if (relative.startsWith('..') || path.isAbsolute(relative)) {
        throw new ConfigError(
          ErrorCodes.OUTPUT_OUTSIDE_ROOT,
          `Cannot mirror ${source} into an output directory: it lies outside ${projectRoot}`,
          { source, projectRoot }
        );
      }
      return path.resolve(projectRoot, output.dir ?? '.', relative);
    }
  }
}

async function writeOutput(result: TransformResult, output: OutputConfig, projectRoot: string): Promise<string | null> {
  const target = resolveOutputPath(result.path, output, projectRoot);
  if (target === null) return null;
  // An unchanged unit is left alone in place but still mirrored to an out-dir.
  if (output.mode === 'in-place' && !result.changed) return null;
  await writeFile(target, result.text);
  return target;
}

function reportDiagnostics(diagnostics: Diagnostic[], log: Logger): void {
  for (const diagnostic of diagnostics) {
    const { path: file, location } = diagnostic;
    log.warn(`${file}:${location.line}:${location.column}: ${diagnostic.message} [${diagnostic.code}]`);
  }
}
