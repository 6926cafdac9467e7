/**
 * Access-site classifier.
 *
 * Walks an executable body, decides for every access to a tracked field
 * whether it reads, assigns, compound-assigns or steps the field, and
 * records the edits that turn it into accessor calls.
 *
 * Sub-expressions are rendered through a scoped buffer: the rewritten text
 * of a base or right-hand side is spliced into the enclosing call text, so
 * nested tracked accesses compose. Hoisted statements and braces always go
 * to the unit's buffer through the planner.
 */
import {
  ASSIGNMENT_OPERATORS,
  type AssignmentOperator,
  type BinaryOperator,
  type Expression,
  type MemberExpression,
  type SyntaxNode,
} from '../ast/types.js';
import { assertNever, childrenOf, outermostParen, unwrapParens, type ParentIndex } from '../ast/traverse.js';
import { EditBuffer } from '../edits/edit-buffer.js';
import { locationAt } from '../edits/source-text.js';
import { getterCall, setterCall, stepCall, type Placement, type RewritePlanner } from './planner.js';
import type { RewriteSession } from './session.js';
import type { FieldBinding, OperationKind, RewriteStrategy } from './types.js';

const ASSIGNMENTS: ReadonlySet<string> = new Set(ASSIGNMENT_OPERATORS);

function isAssignmentOperator(operator: BinaryOperator): operator is AssignmentOperator {
  return ASSIGNMENTS.has(operator);
}

function assignmentOperation(operator: AssignmentOperator): OperationKind {
  switch (operator) {
    case '=':
      return { kind: 'assign' };
    case '+=':
      return { kind: 'compound-assign', operator: '+' };
    case '-=':
      return { kind: 'compound-assign', operator: '-' };
    case '*=':
      return { kind: 'compound-assign', operator: '*' };
    case '/=':
      return { kind: 'compound-assign', operator: '/' };
    case '%=':
      return { kind: 'compound-assign', operator: '%' };
    case '<<=':
      return { kind: 'compound-assign', operator: '<<' };
    case '>>=':
      return { kind: 'compound-assign', operator: '>>' };
    case '&=':
      return { kind: 'compound-assign', operator: '&' };
    case '^=':
      return { kind: 'compound-assign', operator: '^' };
    case '|=':
      return { kind: 'compound-assign', operator: '|' };
    default:
      return assertNever(operator);
  }
}

/**
 * A write to a tracked field.
 */
interface WriteSite {
  /** The assignment or increment/decrement expression */
  node: Expression;
  member: MemberExpression;
  binding: FieldBinding;
  operation: OperationKind;
  /** Right-hand side of an assignment, null for `++`/`--` */
  value: Expression | null;
}

/**
 * True when evaluating `node` writes something or calls a function.
 */
function hasSideEffects(node: SyntaxNode): boolean {
  if (node.kind === 'call') return true;
  if (node.kind === 'unary' && (node.operator === '++' || node.operator === '--')) return true;
  if (node.kind === 'binary' && isAssignmentOperator(node.operator)) return true;
  return childrenOf(node).some((child) => child !== null && hasSideEffects(child));
}

export class AccessSiteClassifier {
  constructor(
    private readonly session: RewriteSession,
    private readonly planner: RewritePlanner,
    private readonly parents: ParentIndex
  ) {}

  /**
   * Classify every tracked access under `node`, recording edits in `sink`.
   */
  classify(node: SyntaxNode, sink: EditBuffer): void {
    switch (node.kind) {
      case 'binary': {
        const target = unwrapParens(node.left);
        const binding = target.kind === 'member' ? this.session.lookup(target) : undefined;
        if (target.kind === 'member' && binding && isAssignmentOperator(node.operator)) {
          this.classifyWrite(
            { node, member: target, binding, operation: assignmentOperation(node.operator), value: node.right },
            sink
          );
          return;
        }
        this.classify(node.left, sink);
        this.classify(node.right, sink);
        return;
      }
      case 'unary': {
        const target = unwrapParens(node.operand);
        const stepping = node.operator === '++' || node.operator === '--';
        const binding = stepping && target.kind === 'member' ? this.session.lookup(target) : undefined;
        if (target.kind === 'member' && binding) {
          const operation: OperationKind = {
            kind: 'inc-dec',
            direction: node.operator === '++' ? 'increment' : 'decrement',
            position: node.prefix ? 'prefix' : 'postfix',
          };
          this.classifyWrite({ node, member: target, binding, operation, value: null }, sink);
          return;
        }
        this.classify(node.operand, sink);
        return;
      }
      case 'member': {
        const binding = this.session.lookup(node);
        if (binding) {
          this.classifyRead(node, binding, sink);
        } else {
          this.classify(node.base, sink);
        }
        return;
      }
      case 'identifier':
      case 'literal':
      case 'call':
      case 'paren':
      case 'conditional':
      case 'subscript':
      case 'cast':
      case 'variable':
      case 'block':
      case 'expression-statement':
      case 'declaration-statement':
      case 'if':
      case 'while':
      case 'do':
      case 'for':
      case 'switch':
      case 'case':
      case 'return':
      case 'break':
      case 'continue':
      case 'empty':
        for (const child of childrenOf(node)) {
          if (child) this.classify(child, sink);
        }
        return;
      default:
        assertNever(node);
    }
  }

  /**
   * Source text of an expression with every tracked access in it rewritten.
   */
  render(expression: Expression): string {
    const scoped = new EditBuffer();
    this.classify(expression, scoped);
    if (scoped.isEmpty()) {
      return this.session.unit.printer.print(expression);
    }
    return scoped.apply(this.session.unit.source, expression.span);
  }

  private classifyWrite(site: WriteSite, sink: EditBuffer): void {
    const { node, member, binding, operation, value } = site;
    const placement = this.planner.place(node);

    if (binding.blocked) {
      this.session.reportCollision(binding, member);
      this.recordSite(site, placement, 'skipped');
      this.classify(member.base, sink);
      if (value) this.classify(value, sink);
      return;
    }

    // Compound and step updates spell the receiver twice.
    if (operation.kind !== 'assign' && hasSideEffects(member.base)) {
      this.writeThroughReference(
        site,
        placement,
        sink,
        `Receiver of ${binding.qualifiedName} has side effects and cannot be repeated; ` +
          `the write goes through the reference returned by ${binding.getterName}() and bypasses ${binding.setterName}()`
      );
      return;
    }

    const anchor = placement.anchor;
    const postfix = operation.kind === 'inc-dec' && operation.position === 'postfix';

    if (placement.statementLevel) {
      sink.replace(placement.target.span, this.updateText(site, this.render(member.base)));
      // A rewritten step in an unbraced body still gets its own block.
      if (operation.kind === 'inc-dec' && anchor) this.planner.brace(anchor);
      this.recordSite(site, placement, 'in-place');
      return;
    }

    const hoist = postfix ? 'after' : 'before';
    if (
      anchor &&
      anchor[hoist] &&
      !this.planner.crossesSequencedAccess(node, placement.boundary, hoist, (other) => this.touches(other, binding))
    ) {
      const base = this.render(member.base);
      const update = this.updateText(site, base);
      if (postfix) {
        this.planner.hoistAfter(anchor, update);
      } else {
        this.planner.hoistBefore(anchor, update);
      }
      sink.replace(placement.target.span, getterCall(base, member, binding));
      this.recordSite(site, placement, 'hoisted');
      return;
    }

    this.writeThroughReference(
      site,
      placement,
      sink,
      `Write to ${binding.qualifiedName} cannot be moved out of its expression; ` +
        `it goes through the reference returned by ${binding.getterName}() and bypasses ${binding.setterName}()`
    );
  }

  private writeThroughReference(site: WriteSite, placement: Placement, sink: EditBuffer, message: string): void {
    const { member, binding, value } = site;
    this.session.warn('write-through-reference', binding, member, message);
    this.replaceWithGetter(member, binding, sink);
    if (value) this.classify(value, sink);
    this.recordSite(site, placement, 'by-reference');
  }

  private classifyRead(member: MemberExpression, binding: FieldBinding, sink: EditBuffer): void {
    const placement = this.planner.place(member);
    const site: WriteSite = { node: member, member, binding, operation: { kind: 'read' }, value: null };

    if (binding.blocked) {
      this.session.reportCollision(binding, member);
      this.recordSite(site, placement, 'skipped');
      this.classify(member.base, sink);
      return;
    }

    this.replaceWithGetter(member, binding, sink);
    this.checkEscape(member, binding);
    this.recordSite(site, placement, 'in-place');
  }

  /**
   * True when `node` accesses the field of `binding` anywhere within it.
   */
  private touches(node: SyntaxNode, binding: FieldBinding): boolean {
    if (node.kind === 'member' && this.session.lookup(node) === binding) return true;
    return childrenOf(node).some((child) => child !== null && this.touches(child, binding));
  }

  private replaceWithGetter(member: MemberExpression, binding: FieldBinding, sink: EditBuffer): void {
    sink.replace(member.span, getterCall(this.render(member.base), member, binding));
  }

  private updateText(site: WriteSite, base: string): string {
    const { member, binding, operation } = site;
    switch (operation.kind) {
      case 'assign':
        return setterCall(base, member, binding, this.renderValue(site));
      case 'compound-assign':
        return setterCall(
          base,
          member,
          binding,
          `${getterCall(base, member, binding)} ${operation.operator} ${this.renderValue(site)}`
        );
      case 'inc-dec':
        return stepCall(base, member, binding, operation.direction);
      case 'read':
        return getterCall(base, member, binding);
      default:
        return assertNever(operation);
    }
  }

  private renderValue(site: WriteSite): string {
    return site.value ? this.render(site.value) : '';
  }

  /**
   * Warn when a read hands out a mutable handle to the field: its address,
   * or a non-const reference bound to it.
   */
  private checkEscape(member: MemberExpression, binding: FieldBinding): void {
    const target = outermostParen(member, this.parents);
    const context = this.parents.get(target);
    if (context === undefined) return;

    if (context.kind === 'unary' && context.operator === '&') {
      const pointer = outermostParen(context, this.parents);
      const holder = this.parents.get(pointer);
      if (
        holder?.kind === 'variable' &&
        holder.initializer === pointer &&
        holder.type.indirection === 'pointer' &&
        holder.type.isConst
      ) {
        return;
      }
      this.session.warn(
        'escaping-reference',
        binding,
        context,
        `Address of ${binding.qualifiedName} escapes; writes through it bypass ${binding.setterName}()`
      );
      return;
    }

    if (
      context.kind === 'variable' &&
      context.initializer === target &&
      context.type.indirection === 'reference' &&
      !context.type.isConst
    ) {
      this.session.warn(
        'escaping-reference',
        binding,
        context,
        `Non-const reference '${context.name}' binds to ${binding.qualifiedName}; ` +
          `writes through it bypass ${binding.setterName}()`
      );
    }
  }

  private recordSite(site: WriteSite, placement: Placement, strategy: RewriteStrategy): void {
    this.session.record({
      binding: site.binding,
      operation: site.operation,
      strategy,
      node: site.node,
      member: site.member,
      boundary: placement.boundary,
      location: locationAt(this.session.unit.source, site.node.span.start),
    });
  }
}
