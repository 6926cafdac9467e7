/**
 * Accessor synthesizer: the getter and setter declarations of each
 * rewritten field, grouped per aggregate with their insertion anchor.
 */
import type { CompilationUnit, MethodDeclaration, RecordDeclaration } from '../ast/types.js';
import type { EditBuffer } from '../edits/edit-buffer.js';
import { isLineLeading, lineIndentAt, lineStartOf } from '../edits/source-text.js';
import type { AggregateRewritePlan, FieldBinding } from './types.js';

/**
 * Declarations for one field, one per line, unindented.
 */
export function synthesizeAccessors(binding: FieldBinding): string[] {
  const { name, constType, valueType, getterName, setterName } = binding;
  const lines = [
    `${constType} &${getterName}() const { return ${name}; }`,
    `${valueType} &${getterName}() { return ${name}; }`,
  ];
  if (!binding.isConst) {
    lines.push(`void ${setterName}(${constType} &_${name}) { ${name} = _${name}; }`);
  }
  return lines;
}

export function planAggregateRewrites(unit: CompilationUnit, bindings: Iterable<FieldBinding>): AggregateRewritePlan[] {
  const byOwner = new Map<RecordDeclaration, FieldBinding[]>();
  for (const binding of bindings) {
    const group = byOwner.get(binding.owner);
    if (group) {
      group.push(binding);
    } else {
      byOwner.set(binding.owner, [binding]);
    }
  }

  const plans: AggregateRewritePlan[] = [];
  for (const [owner, group] of byOwner) {
    group.sort((a, b) => owner.fields.indexOf(a.field) - owner.fields.indexOf(b.field));
    plans.push(planAggregate(unit, owner, group));
  }
  return plans.sort((a, b) => a.owner.span.start - b.owner.span.start);
}

function planAggregate(unit: CompilationUnit, owner: RecordDeclaration, bindings: FieldBinding[]): AggregateRewritePlan {
  const { source } = unit;
  const indent = lineIndentAt(source, bindings[0].field.span.start);
  const lines = bindings.flatMap(synthesizeAccessors);

  const lastMethod = lastUserMethodEnd(owner.methods);
  if (lastMethod !== null) {
    return {
      owner,
      bindings,
      text: lines.map((line) => `\n${indent}${line}`).join(''),
      anchor: { offset: lastMethod, mode: 'insert-after' },
    };
  }

  if (isLineLeading(source, owner.bodyEnd)) {
    return {
      owner,
      bindings,
      text: lines.map((line) => `${indent}${line}\n`).join(''),
      anchor: { offset: lineStartOf(source, owner.bodyEnd), mode: 'insert-before' },
    };
  }

  return {
    owner,
    bindings,
    text: lines.map((line) => `\n${indent}${line}`).join('') + '\n',
    anchor: { offset: owner.bodyEnd, mode: 'insert-before' },
  };
}

function lastUserMethodEnd(methods: MethodDeclaration[]): number | null {
  let end: number | null = null;
  for (const method of methods) {
    if (method.userProvided && method.span) {
      end = method.span.end;
    }
  }
  return end;
}

export function applyAggregatePlan(plan: AggregateRewritePlan, edits: EditBuffer): void {
  if (plan.anchor.mode === 'insert-after') {
    edits.insertAfter(plan.anchor.offset, plan.text);
  } else {
    edits.insertBefore(plan.anchor.offset, plan.text);
  }
}
