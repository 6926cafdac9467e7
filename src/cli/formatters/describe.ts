import type { OperationKind } from '../../core/accessors/types.js';
import type { SourceLocation } from '../../core/ast/types.js';

/**
 * Short label of an operation: `read`, `assign`, `+=`, `postfix ++`.
 */
export function describeOperation(operation: OperationKind): string {
  switch (operation.kind) {
    case 'read':
    case 'assign':
      return operation.kind;
    case 'compound-assign':
      return `${operation.operator}=`;
    case 'inc-dec':
      return `${operation.position} ${operation.direction === 'increment' ? '++' : '--'}`;
  }
}

export function describeLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
