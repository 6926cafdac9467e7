/**
 * Zod schemas for compilation-unit documents written by the front end.
 */
import { z } from 'zod';
import {
  BINARY_OPERATORS,
  INDIRECTIONS,
  UNARY_OPERATORS,
  type BlockStatement,
  type Declaration,
  type Expression,
  type Statement,
} from './types.js';

export const SpanSchema = z
  .object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  })
  .refine((span) => span.end >= span.start, { message: 'span ends before it starts' });

export const QualTypeSchema = z.object({
  spelling: z.string().min(1),
  isConst: z.boolean().default(false),
  indirection: z.enum(INDIRECTIONS).default('none'),
});

const MemberRefSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export const ExpressionSchema: z.ZodType<Expression> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('identifier'), span: SpanSchema, name: z.string() }),
    z.object({ kind: z.literal('literal'), span: SpanSchema, text: z.string() }),
    z.object({
      kind: z.literal('member'),
      span: SpanSchema,
      base: ExpressionSchema,
      member: MemberRefSchema,
      arrow: z.boolean().default(false),
    }),
    z.object({
      kind: z.literal('binary'),
      span: SpanSchema,
      operator: z.enum(BINARY_OPERATORS),
      left: ExpressionSchema,
      right: ExpressionSchema,
    }),
    z.object({
      kind: z.literal('unary'),
      span: SpanSchema,
      operator: z.enum(UNARY_OPERATORS),
      prefix: z.boolean().default(true),
      operand: ExpressionSchema,
    }),
    z.object({
      kind: z.literal('call'),
      span: SpanSchema,
      callee: ExpressionSchema,
      arguments: z.array(ExpressionSchema).default([]),
    }),
    z.object({ kind: z.literal('paren'), span: SpanSchema, expression: ExpressionSchema }),
    z.object({
      kind: z.literal('conditional'),
      span: SpanSchema,
      condition: ExpressionSchema,
      whenTrue: ExpressionSchema,
      whenFalse: ExpressionSchema,
    }),
    z.object({ kind: z.literal('subscript'), span: SpanSchema, base: ExpressionSchema, index: ExpressionSchema }),
    z.object({ kind: z.literal('cast'), span: SpanSchema, type: QualTypeSchema, expression: ExpressionSchema }),
  ])
);

export const VariableDeclaratorSchema = z.object({
  kind: z.literal('variable'),
  span: SpanSchema,
  name: z.string().min(1),
  type: QualTypeSchema,
  initializer: ExpressionSchema.nullable().default(null),
});

function blockObject() {
  return z.object({
    kind: z.literal('block'),
    span: SpanSchema,
    statements: z.array(StatementSchema).default([]),
  });
}

export const StatementSchema: z.ZodType<Statement> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    blockObject(),
    z.object({ kind: z.literal('expression-statement'), span: SpanSchema, expression: ExpressionSchema }),
    z.object({
      kind: z.literal('declaration-statement'),
      span: SpanSchema,
      declarators: z.array(VariableDeclaratorSchema).min(1),
    }),
    z.object({
      kind: z.literal('if'),
      span: SpanSchema,
      condition: ExpressionSchema,
      then: StatementSchema,
      else: StatementSchema.nullable().default(null),
    }),
    z.object({ kind: z.literal('while'), span: SpanSchema, condition: ExpressionSchema, body: StatementSchema }),
    z.object({ kind: z.literal('do'), span: SpanSchema, body: StatementSchema, condition: ExpressionSchema }),
    z.object({
      kind: z.literal('for'),
      span: SpanSchema,
      init: StatementSchema.nullable().default(null),
      condition: ExpressionSchema.nullable().default(null),
      increment: ExpressionSchema.nullable().default(null),
      body: StatementSchema,
    }),
    z.object({ kind: z.literal('switch'), span: SpanSchema, condition: ExpressionSchema, body: StatementSchema }),
    z.object({
      kind: z.literal('case'),
      span: SpanSchema,
      value: ExpressionSchema.nullable().default(null),
      body: StatementSchema,
    }),
    z.object({ kind: z.literal('return'), span: SpanSchema, value: ExpressionSchema.nullable().default(null) }),
    z.object({ kind: z.literal('break'), span: SpanSchema }),
    z.object({ kind: z.literal('continue'), span: SpanSchema }),
    z.object({ kind: z.literal('empty'), span: SpanSchema }),
  ])
);

const BlockSchema: z.ZodType<BlockStatement> = z.lazy(() => blockObject());

export const FieldDeclarationSchema = z.object({
  kind: z.literal('field'),
  id: z.string().min(1),
  span: SpanSchema,
  name: z.string().min(1),
  qualifiedName: z.string().min(1),
  type: QualTypeSchema,
  bitWidth: z.number().int().positive().nullable().default(null),
});

export const MethodDeclarationSchema = z.object({
  kind: z.literal('method'),
  name: z.string().min(1),
  userProvided: z.boolean().default(true),
  span: SpanSchema.nullable().default(null),
});

export const DeclarationSchema: z.ZodType<Declaration> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('namespace'),
      span: SpanSchema,
      name: z.string(),
      declarations: z.array(DeclarationSchema).default([]),
    }),
    z.object({
      kind: z.literal('record'),
      id: z.string().min(1),
      span: SpanSchema,
      tag: z.enum(['struct', 'class', 'union']).default('struct'),
      name: z.string().min(1),
      qualifiedName: z.string().min(1),
      bodyEnd: z.number().int().nonnegative(),
      fields: z.array(FieldDeclarationSchema).default([]),
      methods: z.array(MethodDeclarationSchema).default([]),
      declarations: z.array(DeclarationSchema).default([]),
    }),
    z.object({
      kind: z.literal('function'),
      span: SpanSchema,
      name: z.string().min(1),
      qualifiedName: z.string().min(1),
      body: BlockSchema.nullable().default(null),
    }),
    VariableDeclaratorSchema,
  ])
);

export const CompilationUnitDocumentSchema = z.object({
  path: z.string().min(1),
  language: z.string().default('cpp'),
  source: z.string(),
  root: z.object({
    kind: z.literal('translation-unit'),
    span: SpanSchema,
    declarations: z.array(DeclarationSchema).default([]),
  }),
});
