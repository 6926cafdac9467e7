/**
 * Resolved syntax tree handed over by the front end.
 *
 * The node set is closed: every declaration, statement and expression the
 * rewrite engine understands is one variant of a tagged union, discriminated
 * by `kind`. Consumers switch over `kind` exhaustively.
 */

/**
 * A span in source code.
 */
export interface Span {
  /** Start offset in characters */
  start: number;
  /** End offset in characters (exclusive) */
  end: number;
}

/**
 * A 1-based position in source code.
 */
export interface SourceLocation {
  line: number;
  column: number;
}

export const INDIRECTIONS = ['none', 'pointer', 'reference'] as const;
export type Indirection = (typeof INDIRECTIONS)[number];

/**
 * A declared type as the front end resolved it.
 * For pointers and references, `isConst` qualifies the referent
 * (`const int &` has isConst true).
 */
export interface QualType {
  /** Spelling of the value type without indirection or const (e.g. `int`, `std::string`) */
  spelling: string;
  isConst: boolean;
  indirection: Indirection;
}

/* =============================================================================
 * EXPRESSIONS
 * ============================================================================= */

export const ASSIGNMENT_OPERATORS = ['=', '+=', '-=', '*=', '/=', '%=', '<<=', '>>=', '&=', '^=', '|='] as const;
export type AssignmentOperator = (typeof ASSIGNMENT_OPERATORS)[number];

export const BINARY_OPERATORS = [
  ...ASSIGNMENT_OPERATORS,
  '+', '-', '*', '/', '%', '<<', '>>',
  '<', '>', '<=', '>=', '==', '!=',
  '&', '^', '|', '&&', '||', ',',
] as const;
export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

export const UNARY_OPERATORS = ['++', '--', '+', '-', '!', '~', '&', '*'] as const;
export type UnaryOperator = (typeof UNARY_OPERATORS)[number];

export interface IdentifierExpression {
  kind: 'identifier';
  span: Span;
  name: string;
}

export interface LiteralExpression {
  kind: 'literal';
  span: Span;
  text: string;
}

/**
 * The declaration a member access resolves to.
 * `id` is the front end's identity for the field or method.
 */
export interface MemberRef {
  id: string;
  name: string;
}

export interface MemberExpression {
  kind: 'member';
  span: Span;
  base: Expression;
  member: MemberRef;
  /** True for `base->member` */
  arrow: boolean;
}

export interface BinaryExpression {
  kind: 'binary';
  span: Span;
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryExpression {
  kind: 'unary';
  span: Span;
  operator: UnaryOperator;
  /** False for postfix `++`/`--` */
  prefix: boolean;
  operand: Expression;
}

export interface CallExpression {
  kind: 'call';
  span: Span;
  callee: Expression;
  arguments: Expression[];
}

export interface ParenExpression {
  kind: 'paren';
  span: Span;
  expression: Expression;
}

export interface ConditionalExpression {
  kind: 'conditional';
  span: Span;
  condition: Expression;
  whenTrue: Expression;
  whenFalse: Expression;
}

export interface SubscriptExpression {
  kind: 'subscript';
  span: Span;
  base: Expression;
  index: Expression;
}

export interface CastExpression {
  kind: 'cast';
  span: Span;
  type: QualType;
  expression: Expression;
}

export type Expression =
  | IdentifierExpression
  | LiteralExpression
  | MemberExpression
  | BinaryExpression
  | UnaryExpression
  | CallExpression
  | ParenExpression
  | ConditionalExpression
  | SubscriptExpression
  | CastExpression;

/* =============================================================================
 * STATEMENTS
 * ============================================================================= */

/**
 * A single declared variable, local or global.
 */
export interface VariableDeclarator {
  kind: 'variable';
  span: Span;
  name: string;
  type: QualType;
  initializer: Expression | null;
}

export interface BlockStatement {
  kind: 'block';
  span: Span;
  statements: Statement[];
}

export interface ExpressionStatement {
  kind: 'expression-statement';
  span: Span;
  expression: Expression;
}

export interface DeclarationStatement {
  kind: 'declaration-statement';
  span: Span;
  declarators: VariableDeclarator[];
}

export interface IfStatement {
  kind: 'if';
  span: Span;
  condition: Expression;
  then: Statement;
  else: Statement | null;
}

export interface WhileStatement {
  kind: 'while';
  span: Span;
  condition: Expression;
  body: Statement;
}

export interface DoStatement {
  kind: 'do';
  span: Span;
  body: Statement;
  condition: Expression;
}

export interface ForStatement {
  kind: 'for';
  span: Span;
  init: Statement | null;
  condition: Expression | null;
  increment: Expression | null;
  body: Statement;
}

export interface SwitchStatement {
  kind: 'switch';
  span: Span;
  condition: Expression;
  body: Statement;
}

/**
 * A `case value:` or `default:` label with the statement it labels.
 */
export interface CaseStatement {
  kind: 'case';
  span: Span;
  /** Null for `default:` */
  value: Expression | null;
  body: Statement;
}

export interface ReturnStatement {
  kind: 'return';
  span: Span;
  value: Expression | null;
}

export interface BreakStatement {
  kind: 'break';
  span: Span;
}

export interface ContinueStatement {
  kind: 'continue';
  span: Span;
}

export interface EmptyStatement {
  kind: 'empty';
  span: Span;
}

export type Statement =
  | BlockStatement
  | ExpressionStatement
  | DeclarationStatement
  | IfStatement
  | WhileStatement
  | DoStatement
  | ForStatement
  | SwitchStatement
  | CaseStatement
  | ReturnStatement
  | BreakStatement
  | ContinueStatement
  | EmptyStatement;

/**
 * Any node of an executable body.
 */
export type SyntaxNode = Statement | VariableDeclarator | Expression;

/* =============================================================================
 * DECLARATIONS
 * ============================================================================= */

export type RecordTag = 'struct' | 'class' | 'union';

export interface FieldDeclaration {
  kind: 'field';
  id: string;
  span: Span;
  name: string;
  qualifiedName: string;
  type: QualType;
  /** Width in bits for bitfields, null otherwise */
  bitWidth: number | null;
}

export interface MethodDeclaration {
  kind: 'method';
  name: string;
  /** False for methods the compiler declares implicitly */
  userProvided: boolean;
  /** Null for implicit methods, which have no source */
  span: Span | null;
}

export interface RecordDeclaration {
  kind: 'record';
  id: string;
  span: Span;
  tag: RecordTag;
  name: string;
  qualifiedName: string;
  /** Offset of the closing brace of the body */
  bodyEnd: number;
  fields: FieldDeclaration[];
  /** Methods in declaration order, implicit ones included */
  methods: MethodDeclaration[];
  /** Nested type declarations */
  declarations: Declaration[];
}

export interface NamespaceDeclaration {
  kind: 'namespace';
  span: Span;
  name: string;
  declarations: Declaration[];
}

export interface FunctionDeclaration {
  kind: 'function';
  span: Span;
  name: string;
  qualifiedName: string;
  /** Null for a declaration without a definition */
  body: BlockStatement | null;
}

export type Declaration =
  | NamespaceDeclaration
  | RecordDeclaration
  | FunctionDeclaration
  | VariableDeclarator;

export interface TranslationUnit {
  kind: 'translation-unit';
  span: Span;
  declarations: Declaration[];
}

/* =============================================================================
 * COMPILATION UNIT
 * ============================================================================= */

/**
 * Renders an expression subtree back to source text under the front end's
 * printing conventions.
 */
export interface ExpressionPrinter {
  print(expression: Expression): string;
}

/**
 * A compilation-unit document as the front end writes it.
 */
export interface CompilationUnitDocument {
  /** Path of the source file the tree was built from */
  path: string;
  /** Source language tag, informational (e.g. `cpp`) */
  language: string;
  source: string;
  root: TranslationUnit;
}

/**
 * A loaded compilation unit, ready for transforms.
 */
export interface CompilationUnit extends CompilationUnitDocument {
  printer: ExpressionPrinter;
}
