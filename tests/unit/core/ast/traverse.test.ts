/**
 * Tests for syntax tree traversal helpers.
 */
import { describe, it, expect } from 'vitest';
import {
  buildParentIndex,
  childrenOf,
  isExpression,
  outermostParen,
  unwrapParens,
} from '../../../../src/core/ast/traverse.js';
import { bin, bodyOf, exprStmt, expressionAt, forStmt, id, lit, main, member, paren, program, block } from '../../../helpers/program-builder.js';

describe('childrenOf', () => {
  it('should list child slots in source order with null for absent parts', () => {
    const unit = program(main(forStmt(null, null, null, block())));
    const loop = bodyOf(unit).statements[0];

    expect(loop.kind).toBe('for');
    const children = childrenOf(loop);
    expect(children.slice(0, 3)).toEqual([null, null, null]);
    expect(children[3]?.kind).toBe('block');
  });
});

describe('buildParentIndex', () => {
  it('should map every node below the root to its parent', () => {
    const unit = program(main(exprStmt(bin(member(id('foo'), 'Foo::x'), '=', lit('1')))));
    const body = bodyOf(unit);
    const parents = buildParentIndex(body);
    const assignment = expressionAt(unit, 0);

    expect(parents.get(body)).toBeUndefined();
    expect(parents.get(body.statements[0])).toBe(body);
    expect(parents.get(assignment)).toBe(body.statements[0]);
    if (assignment.kind !== 'binary') throw new Error('expected a binary expression');
    expect(parents.get(assignment.left)).toBe(assignment);
    expect(parents.get(assignment.right)).toBe(assignment);
  });
});

describe('parentheses', () => {
  const unit = program(main(exprStmt(paren(paren(id('x'))))));
  const outer = expressionAt(unit, 0);
  const parents = buildParentIndex(bodyOf(unit));

  it('should unwrap nested parentheses', () => {
    expect(unwrapParens(outer)).toMatchObject({ kind: 'identifier', name: 'x' });
  });

  it('should find the outermost parenthesis around a node', () => {
    const inner = unwrapParens(outer);

    expect(outermostParen(inner, parents)).toBe(outer);
    expect(outermostParen(outer, parents)).toBe(outer);
  });

  it('should print the source between the parentheses', () => {
    expect(unit.source.slice(outer.span.start, outer.span.end)).toBe('((x))');
  });
});

describe('node categories', () => {
  it('should tell expressions from statements', () => {
    const unit = program(main(exprStmt(id('x'))));
    const statement = bodyOf(unit).statements[0];

    expect(isExpression(expressionAt(unit, 0))).toBe(true);
    expect(isExpression(statement)).toBe(false);
  });
});
