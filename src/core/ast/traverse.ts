/**
 * Traversal helpers over the resolved syntax tree.
 */
import type { Expression, ParenExpression, SyntaxNode } from './types.js';

/**
 * Map from a node to its parent, built once per executable body.
 */
export type ParentIndex = ReadonlyMap<SyntaxNode, SyntaxNode>;

export function assertNever(value: never): never {
  throw new Error(`Unhandled syntax node: ${JSON.stringify(value)}`);
}

/**
 * Child slots of a node in source order. Absent optional parts
 * (a missing `else`, an empty `for` clause, a bare `return`) are null.
 */
export function childrenOf(node: SyntaxNode): (SyntaxNode | null)[] {
  switch (node.kind) {
    case 'identifier':
    case 'literal':
    case 'break':
    case 'continue':
    case 'empty':
      return [];
    case 'member':
      return [node.base];
    case 'binary':
      return [node.left, node.right];
    case 'unary':
      return [node.operand];
    case 'call':
      return [node.callee, ...node.arguments];
    case 'paren':
      return [node.expression];
    case 'conditional':
      return [node.condition, node.whenTrue, node.whenFalse];
    case 'subscript':
      return [node.base, node.index];
    case 'cast':
      return [node.expression];
    case 'variable':
      return [node.initializer];
    case 'block':
      return node.statements;
    case 'expression-statement':
      return [node.expression];
    case 'declaration-statement':
      return node.declarators;
    case 'if':
      return [node.condition, node.then, node.else];
    case 'while':
      return [node.condition, node.body];
    case 'do':
      return [node.body, node.condition];
    case 'for':
      return [node.init, node.condition, node.increment, node.body];
    case 'switch':
      return [node.condition, node.body];
    case 'case':
      return [node.value, node.body];
    case 'return':
      return [node.value];
    default:
      return assertNever(node);
  }
}

export function isExpression(node: SyntaxNode): node is Expression {
  switch (node.kind) {
    case 'identifier':
    case 'literal':
    case 'member':
    case 'binary':
    case 'unary':
    case 'call':
    case 'paren':
    case 'conditional':
    case 'subscript':
    case 'cast':
      return true;
    default:
      return false;
  }
}

/**
 * Build the parent index for a body in a single walk.
 */
export function buildParentIndex(root: SyntaxNode): ParentIndex {
  const parents = new Map<SyntaxNode, SyntaxNode>();
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    for (const child of childrenOf(node)) {
      if (child) {
        parents.set(child, node);
        stack.push(child);
      }
    }
  }
  return parents;
}

/**
 * Strip redundant parentheses: `((foo.x))` -> `foo.x`.
 */
export function unwrapParens(expression: Expression): Expression {
  let current = expression;
  while (current.kind === 'paren') {
    current = current.expression;
  }
  return current;
}

/**
 * The outermost parenthesized expression that only wraps `node`,
 * or `node` itself when it is not parenthesized.
 */
export function outermostParen(node: Expression, parents: ParentIndex): Expression {
  let current = node;
  let parent = parents.get(current);
  while (parent !== undefined && isParen(parent)) {
    current = parent;
    parent = parents.get(current);
  }
  return current;
}

function isParen(node: SyntaxNode): node is ParenExpression {
  return node.kind === 'paren';
}
