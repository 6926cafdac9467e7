/**
 * Rewrite planner: locates the statement boundary of an access site and
 * emits the statement-level edits (hoisted statements, synthetic braces).
 */
import type {
  BinaryOperator,
  CompilationUnit,
  Expression,
  MemberExpression,
  Statement,
  SyntaxNode,
} from '../ast/types.js';
import { isExpression, outermostParen, type ParentIndex } from '../ast/traverse.js';
import { RANK_CLOSE, RANK_OPEN, type EditBuffer } from '../edits/edit-buffer.js';
import { isLineLeading, lineIndentAt, lineStartOf } from '../edits/source-text.js';
import type { FieldBinding, IncDecDirection } from './types.js';

/**
 * The statement hoisted text is attached to.
 */
export interface Anchor {
  statement: Statement;
  /** A statement may be inserted ahead of it */
  before: boolean;
  /** A statement may be inserted behind it */
  after: boolean;
  /** The statement is the unbraced body of a control statement */
  unbraced: boolean;
  /** Indentation of the closing brace of a synthetic block */
  indent: string;
  /** Indentation for hoisted statements */
  innerIndent: string;
  /**
   * Where the opening brace of a synthetic block goes when the statement
   * starts its own line: just past the control header that owns it.
   * Null when the statement shares the header's line, or when a
   * preprocessor line separates the two.
   */
  headerEnd: number | null;
}

export interface Placement {
  /** The site, widened over parentheses that only wrap it */
  target: Expression;
  boundary: SyntaxNode;
  /** The site is a whole statement whose value nobody reads */
  statementLevel: boolean;
  anchor: Anchor | null;
}

const INDENT_STEP = '  ';

export class RewritePlanner {
  private readonly braced = new Set<Statement>();

  constructor(
    private readonly unit: CompilationUnit,
    private readonly edits: EditBuffer,
    private readonly parents: ParentIndex
  ) {}

  place(site: Expression): Placement {
    const target = outermostParen(site, this.parents);

    let boundary: SyntaxNode = site;
    let owner = this.parents.get(boundary);
    while (owner !== undefined && isBoundaryLink(owner)) {
      boundary = owner;
      owner = this.parents.get(boundary);
    }

    const statementLevel =
      target === boundary &&
      owner !== undefined &&
      (owner.kind === 'expression-statement' || (owner.kind === 'for' && owner.increment === boundary));

    return { target, boundary, statementLevel, anchor: this.anchorFor(site, boundary, owner) };
  }

  /**
   * Insert `statement;` ahead of the anchor.
   */
  hoistBefore(anchor: Anchor, statement: string): void {
    this.brace(anchor);
    this.edits.insertBefore(anchor.statement.span.start, `${statement};\n${anchor.innerIndent}`);
  }

  /**
   * Insert `statement;` behind the anchor.
   */
  hoistAfter(anchor: Anchor, statement: string): void {
    this.brace(anchor);
    this.edits.insertAfter(anchor.statement.span.end, `\n${anchor.innerIndent}${statement};`);
  }

  /**
   * Wrap an unbraced anchor in a block, once.
   */
  brace(anchor: Anchor): void {
    if (!anchor.unbraced || this.braced.has(anchor.statement)) return;
    this.braced.add(anchor.statement);
    const { span } = anchor.statement;
    if (anchor.headerEnd === null) {
      this.edits.wrap(span, `{\n${anchor.innerIndent}`, `\n${anchor.indent}}`);
      return;
    }
    this.edits.insertAfter(anchor.headerEnd, ' {', RANK_OPEN);
    this.edits.insertAfter(span.end, `\n${anchor.indent}}`, RANK_CLOSE);
  }

  private anchorFor(site: Expression, boundary: SyntaxNode, owner: SyntaxNode | undefined): Anchor | null {
    let statement: Statement;
    let after: boolean;

    if (boundary.kind === 'declaration-statement') {
      statement = boundary;
      after = true;
    } else if (owner === undefined) {
      return null;
    } else if (owner.kind === 'expression-statement') {
      statement = owner;
      after = true;
    } else if (
      owner.kind === 'return' ||
      ((owner.kind === 'if' || owner.kind === 'switch') && owner.condition === boundary)
    ) {
      // The value is consumed by the statement itself: nothing can follow it.
      statement = owner;
      after = false;
    } else {
      return null;
    }

    if (!this.inStatementList(statement)) return null;

    const { source } = this.unit;
    const start = statement.span.start;
    const conditional = this.crossesConditionalOperand(site, boundary);
    const unbraced = this.parents.get(statement)?.kind !== 'block';
    const ownLine = unbraced && isLineLeading(source, start) && lineStartOf(source, start) > 0;
    const headerEnd = ownLine ? this.headerEnd(statement) : null;
    const lineIndent = lineIndentAt(source, start);

    let indent = lineIndent;
    let innerIndent = lineIndent;
    if (headerEnd !== null) {
      indent = lineIndentAt(source, headerEnd);
    } else if (unbraced) {
      innerIndent = lineIndent + INDENT_STEP;
    }

    return {
      statement,
      before: !conditional,
      after: after && !conditional,
      unbraced,
      indent,
      innerIndent,
      headerEnd,
    };
  }

  /**
   * True when the statement sits where a block could replace it.
   */
  private inStatementList(statement: Statement): boolean {
    const parent = this.parents.get(statement);
    if (parent === undefined) return false;
    switch (parent.kind) {
      case 'block':
        return true;
      case 'if':
        return parent.then === statement || parent.else === statement;
      case 'while':
      case 'do':
      case 'for':
      case 'switch':
      case 'case':
        return parent.body === statement;
      default:
        return false;
    }
  }

  /**
   * True when the site only runs under a condition within its statement
   * (right of `&&`/`||`, a branch of `?:`), so hoisting would change when it runs.
   */
  private crossesConditionalOperand(site: Expression, boundary: SyntaxNode): boolean {
    let child: SyntaxNode = site;
    while (child !== boundary) {
      const parent = this.parents.get(child);
      if (parent === undefined) return false;
      if (parent.kind === 'binary' && (parent.operator === '&&' || parent.operator === '||') && parent.right === child) {
        return true;
      }
      if (parent.kind === 'conditional' && parent.condition !== child) {
        return true;
      }
      child = parent;
    }
    return false;
  }

  /**
   * True when an operand sequenced on the other side of the site touches
   * the same field, so moving the write `before` or `after` the statement
   * would change the value that operand sees.
   */
  crossesSequencedAccess(
    site: Expression,
    boundary: SyntaxNode,
    hoist: 'before' | 'after',
    touches: (node: SyntaxNode) => boolean
  ): boolean {
    let child: SyntaxNode = site;
    while (child !== boundary) {
      const parent = this.parents.get(child);
      if (parent === undefined) return false;
      switch (parent.kind) {
        case 'binary':
          if (hoist === 'after' && parent.left === child && isSequencing(parent.operator) && touches(parent.right)) {
            return true;
          }
          if (hoist === 'before' && parent.right === child && parent.operator === ',' && touches(parent.left)) {
            return true;
          }
          break;
        case 'conditional':
          if (hoist === 'after' && parent.condition === child && (touches(parent.whenTrue) || touches(parent.whenFalse))) {
            return true;
          }
          break;
        case 'declaration-statement': {
          const position = parent.declarators.findIndex((declarator) => declarator === child);
          const others =
            hoist === 'after' ? parent.declarators.slice(position + 1) : parent.declarators.slice(0, position);
          if (position >= 0 && others.some(touches)) return true;
          break;
        }
        default:
          break;
      }
      child = parent;
    }
    return false;
  }

  /**
   * Offset just past the control header owning an unbraced body: the `)`
   * closing its condition, the `else` or `do` keyword, or a case label's `:`.
   */
  private headerEnd(statement: Statement): number | null {
    const parent = this.parents.get(statement);
    if (parent === undefined) return null;
    const { source } = this.unit;
    const limit = statement.span.start;

    let end: number | null;
    switch (parent.kind) {
      case 'if':
        end =
          parent.else === statement
            ? keywordEnd(source, 'else', parent.then.span.end, limit)
            : closingParen(source, parent.condition.span.end, limit);
        break;
      case 'while':
      case 'switch':
        end = closingParen(source, parent.condition.span.end, limit);
        break;
      case 'for': {
        const last = parent.increment ?? parent.condition ?? parent.init;
        end = closingParen(source, last ? last.span.end : parent.span.start, limit);
        break;
      }
      case 'do':
        end = keywordEnd(source, 'do', parent.span.start, limit);
        break;
      case 'case': {
        const colon = source.indexOf(':', parent.value ? parent.value.span.end : parent.span.start);
        end = colon >= 0 && colon < limit ? colon + 1 : null;
        break;
      }
      default:
        end = null;
    }

    if (end === null || /^[ \t]*#/m.test(source.slice(end, limit))) return null;
    return end;
  }
}

function isSequencing(operator: BinaryOperator): boolean {
  return operator === ',' || operator === '&&' || operator === '||';
}

function closingParen(source: string, from: number, limit: number): number | null {
  const index = source.indexOf(')', from);
  return index >= 0 && index < limit ? index + 1 : null;
}

function keywordEnd(source: string, keyword: string, from: number, limit: number): number | null {
  const index = source.indexOf(keyword, from);
  return index >= 0 && index + keyword.length <= limit ? index + keyword.length : null;
}

function isBoundaryLink(node: SyntaxNode): boolean {
  return isExpression(node) || node.kind === 'variable' || node.kind === 'declaration-statement';
}

function memberOperator(member: MemberExpression): string {
  return member.arrow ? '->' : '.';
}

/** `base.getX()` */
export function getterCall(base: string, member: MemberExpression, binding: FieldBinding): string {
  return `${base}${memberOperator(member)}${binding.getterName}()`;
}

/** `base.setX( value )` */
export function setterCall(base: string, member: MemberExpression, binding: FieldBinding, value: string): string {
  return `${base}${memberOperator(member)}${binding.setterName}( ${value} )`;
}

/** `base.setX( base.getX() + 1)` */
export function stepCall(
  base: string,
  member: MemberExpression,
  binding: FieldBinding,
  direction: IncDecDirection
): string {
  const sign = direction === 'increment' ? '+' : '-';
  return `${base}${memberOperator(member)}${binding.setterName}( ${getterCall(base, member, binding)} ${sign} 1)`;
}
