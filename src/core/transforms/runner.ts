/**
 * Applies a list of transforms to one compilation unit.
 */
import type { CompilationUnit } from '../ast/types.js';
import { EditBuffer } from '../edits/edit-buffer.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { Diagnostic, Transform, TransformResult } from './types.js';

/**
 * Every transform sees the same pristine unit and records its edits in one
 * shared buffer, which is applied once at the end.
 */
export function applyTransforms(
  unit: CompilationUnit,
  transforms: Transform[],
  log: Logger = defaultLogger
): TransformResult {
  const edits = new EditBuffer();
  const diagnostics: Diagnostic[] = [];

  for (const transform of transforms) {
    log.debug(`Applying ${transform.name} to ${unit.path}`);
    transform.apply(unit, {
      edits,
      report: (diagnostic) => diagnostics.push(diagnostic),
      logger: log.child(transform.name),
    });
  }

  const text = edits.apply(unit.source);
  return {
    path: unit.path,
    text,
    changed: text !== unit.source,
    edits: edits.size,
    diagnostics,
  };
}
