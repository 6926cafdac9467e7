/**
 * Per-unit state of one accessors run: the tracked bindings, the sites
 * classified so far and the diagnostics raised on the way.
 */
import type { CompilationUnit, MemberExpression, SyntaxNode } from '../ast/types.js';
import { locationAt } from '../edits/source-text.js';
import type { Diagnostic, DiagnosticCode } from '../transforms/types.js';
import type { AccessSite, FieldBinding } from './types.js';

export class RewriteSession {
  readonly sites: AccessSite[] = [];
  readonly diagnostics: Diagnostic[] = [];
  private readonly rewritten = new Set<FieldBinding>();
  private readonly collisions = new Set<FieldBinding>();

  constructor(
    readonly unit: CompilationUnit,
    private readonly bindings: ReadonlyMap<string, FieldBinding>
  ) {}

  lookup(member: MemberExpression): FieldBinding | undefined {
    return this.bindings.get(member.member.id);
  }

  record(site: AccessSite): void {
    this.sites.push(site);
    if (site.strategy !== 'skipped') {
      this.rewritten.add(site.binding);
    }
  }

  warn(code: DiagnosticCode, binding: FieldBinding, node: SyntaxNode, message: string): void {
    this.diagnostics.push({
      severity: 'warning',
      code,
      message,
      field: binding.qualifiedName,
      path: this.unit.path,
      location: locationAt(this.unit.source, node.span.start),
    });
  }

  /**
   * Report a blocked binding the first time one of its sites is seen.
   */
  reportCollision(binding: FieldBinding, node: SyntaxNode): void {
    if (this.collisions.has(binding)) return;
    this.collisions.add(binding);
    this.warn(
      'accessor-collision',
      binding,
      node,
      `${binding.owner.qualifiedName} already declares ${binding.getterName}() or ${binding.setterName}(); ` +
        `accesses to ${binding.qualifiedName} are left unchanged`
    );
  }

  /**
   * Bindings with at least one rewritten site.
   */
  rewrittenBindings(): FieldBinding[] {
    return [...this.rewritten];
  }
}
