/**
 * Types shared by every source transform.
 */
import type { CompilationUnit, SourceLocation } from '../ast/types.js';
import type { EditBuffer } from '../edits/edit-buffer.js';
import type { Logger } from '../../utils/logger.js';

export type DiagnosticSeverity = 'warning' | 'info';

export type DiagnosticCode =
  /** A non-const reference or pointer to a tracked field escapes */
  | 'escaping-reference'
  /** A write could not be hoisted and goes through the non-const getter */
  | 'write-through-reference'
  /** A synthesized accessor name is already taken; the field was skipped */
  | 'accessor-collision'
  /** The field's shape (union member, bitfield, pointer or reference) is not supported */
  | 'unsupported-field';

/**
 * Advisory message on the side channel. Never changes the patched text.
 */
export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  /** Qualified name of the field concerned */
  field: string;
  path: string;
  location: SourceLocation;
}

/**
 * What a transform receives for one unit.
 */
export interface TransformContext {
  /** Buffer shared by every transform applied to the unit */
  edits: EditBuffer;
  report(diagnostic: Diagnostic): void;
  logger: Logger;
}

export interface Transform {
  readonly name: string;
  /**
   * Record the transform's edits for a unit. Transforms never mutate the
   * tree and never look at each other's edits.
   */
  apply(unit: CompilationUnit, context: TransformContext): void;
}

/**
 * Outcome of applying transforms to one unit.
 */
export interface TransformResult {
  path: string;
  text: string;
  changed: boolean;
  /** Number of edits applied */
  edits: number;
  diagnostics: Diagnostic[];
}
