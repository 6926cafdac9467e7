/**
 * Types for the accessors transform: tracked fields, classified access
 * sites and per-aggregate rewrite plans.
 */
import type {
  Expression,
  FieldDeclaration,
  MemberExpression,
  RecordDeclaration,
  SourceLocation,
  SyntaxNode,
} from '../ast/types.js';

/**
 * A configured target field found in the unit.
 */
export interface FieldBinding {
  /** Front-end identity of the field */
  readonly id: string;
  readonly name: string;
  readonly qualifiedName: string;
  /** Value type spelling the non-const getter returns */
  readonly valueType: string;
  /** Const-qualified spelling for the const getter and the setter parameter */
  readonly constType: string;
  readonly isConst: boolean;
  readonly getterName: string;
  readonly setterName: string;
  readonly field: FieldDeclaration;
  readonly owner: RecordDeclaration;
  /** Set when a synthesized name is already a member of the owner */
  readonly blocked: boolean;
}

export type IncDecDirection = 'increment' | 'decrement';
export type IncDecPosition = 'prefix' | 'postfix';

/** The arithmetic operator a compound assignment applies, `+` for `+=` */
export type CompoundOperator = '+' | '-' | '*' | '/' | '%' | '<<' | '>>' | '&' | '^' | '|';

export type OperationKind =
  | { kind: 'read' }
  | { kind: 'assign' }
  | { kind: 'compound-assign'; operator: CompoundOperator }
  | { kind: 'inc-dec'; direction: IncDecDirection; position: IncDecPosition };

/**
 * - in-place: the site was the whole statement and was replaced
 * - hoisted: a statement was inserted before or after the anchor
 * - by-reference: the field was replaced by the non-const getter and the
 *   original operator writes through its reference
 * - skipped: the field is blocked
 */
export type RewriteStrategy = 'in-place' | 'hoisted' | 'by-reference' | 'skipped';

export interface AccessSite {
  binding: FieldBinding;
  operation: OperationKind;
  strategy: RewriteStrategy;
  /** The binary, unary or member expression that was classified */
  node: Expression;
  member: MemberExpression;
  /** Outermost ancestor reached through expressions and declarations */
  boundary: SyntaxNode;
  location: SourceLocation;
}

/**
 * Accessor text for one aggregate and where it goes.
 */
export interface AggregateRewritePlan {
  owner: RecordDeclaration;
  bindings: FieldBinding[];
  text: string;
  anchor: {
    offset: number;
    mode: 'insert-before' | 'insert-after';
  };
}
