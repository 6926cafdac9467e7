/**
 * Declaration collector: finds the configured fields and the entry-point
 * bodies to scan.
 */
import type {
  BlockStatement,
  CompilationUnit,
  Declaration,
  FieldDeclaration,
  RecordDeclaration,
} from '../ast/types.js';
import { assertNever } from '../ast/traverse.js';
import { locationAt } from '../edits/source-text.js';
import type { Diagnostic } from '../transforms/types.js';
import { accessorNames } from './naming.js';
import type { FieldBinding } from './types.js';

export const DEFAULT_ENTRY_POINTS = ['main'];

export interface CollectOptions {
  /** Names of the free functions whose bodies get rewritten */
  entryPoints?: string[];
}

export interface CollectedDeclarations {
  /** Bindings keyed by field id */
  bindings: Map<string, FieldBinding>;
  bodies: BlockStatement[];
  diagnostics: Diagnostic[];
}

/**
 * Walk the declaration tree of a unit. Targets are qualified field names;
 * a target that names nothing produces nothing.
 */
export function collectDeclarations(
  unit: CompilationUnit,
  targets: Iterable<string>,
  options: CollectOptions = {}
): CollectedDeclarations {
  const wanted = new Set(targets);
  const entryPoints = new Set(options.entryPoints ?? DEFAULT_ENTRY_POINTS);
  const collected: CollectedDeclarations = { bindings: new Map(), bodies: [], diagnostics: [] };

  const visit = (declarations: Declaration[]): void => {
    for (const declaration of declarations) {
      switch (declaration.kind) {
        case 'record':
          for (const field of declaration.fields) {
            if (wanted.has(field.qualifiedName)) {
              collectField(unit, declaration, field, collected);
            }
          }
          visit(declaration.declarations);
          break;
        case 'namespace':
          visit(declaration.declarations);
          break;
        case 'function':
          if (entryPoints.has(declaration.name) && declaration.body) {
            collected.bodies.push(declaration.body);
          }
          break;
        case 'variable':
          break;
        default:
          assertNever(declaration);
      }
    }
  };

  visit(unit.root.declarations);
  return collected;
}

function collectField(
  unit: CompilationUnit,
  owner: RecordDeclaration,
  field: FieldDeclaration,
  collected: CollectedDeclarations
): void {
  const unsupported = unsupportedReason(owner, field);
  if (unsupported) {
    collected.diagnostics.push({
      severity: 'warning',
      code: 'unsupported-field',
      message: `${field.qualifiedName} is ${unsupported}; no accessors are generated for it`,
      field: field.qualifiedName,
      path: unit.path,
      location: locationAt(unit.source, field.span.start),
    });
    return;
  }

  const { getter, setter } = accessorNames(field.name);
  const constType = `const ${field.type.spelling}`;
  collected.bindings.set(field.id, {
    id: field.id,
    name: field.name,
    qualifiedName: field.qualifiedName,
    valueType: field.type.isConst ? constType : field.type.spelling,
    constType,
    isConst: field.type.isConst,
    getterName: getter,
    setterName: setter,
    field,
    owner,
    blocked: owner.methods.some((method) => method.name === getter || method.name === setter),
  });
}

function unsupportedReason(owner: RecordDeclaration, field: FieldDeclaration): string | null {
  if (owner.tag === 'union') return 'a union member';
  if (field.bitWidth !== null) return 'a bitfield';
  if (field.type.indirection !== 'none') return `of ${field.type.indirection} type`;
  return null;
}
