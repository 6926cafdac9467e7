/**
 * Loads compilation-unit documents produced by the front end.
 */
import { CompilationUnitDocumentSchema } from './schema.js';
import { SourceSlicePrinter } from './printer.js';
import { assertNever, childrenOf } from './traverse.js';
import type {
  CompilationUnit,
  CompilationUnitDocument,
  Declaration,
  Span,
  SyntaxNode,
} from './types.js';
import { FrontEndError, SystemError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { readFile, fileExists } from '../../utils/file-system.js';

/**
 * Attach a printer to a document after checking its spans against the source.
 */
export function createCompilationUnit(document: CompilationUnitDocument): CompilationUnit {
  const length = document.source.length;
  visitDeclarationSpans(document.root.declarations, (span, what) => {
    if (span.end > length) {
      throw new FrontEndError(
        ErrorCodes.SPAN_OUT_OF_RANGE,
        `Span of ${what} [${span.start}, ${span.end}) lies outside the source (${length} characters) in ${document.path}`,
        { path: document.path, span, what }
      );
    }
  });
  return { ...document, printer: new SourceSlicePrinter(document.source) };
}

/**
 * Parse a compilation-unit document from JSON text.
 * @param origin Where the text came from, for error messages
 */
export function parseCompilationUnit(content: string, origin: string): CompilationUnit {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new FrontEndError(
      ErrorCodes.INVALID_UNIT,
      `Compilation unit ${origin} is not valid JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { origin }
    );
  }

  const result = CompilationUnitDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new FrontEndError(
      ErrorCodes.INVALID_UNIT,
      `Compilation unit ${origin} is malformed: ${formatZodError(result.error)}`,
      { origin, errors: result.error.issues }
    );
  }

  return createCompilationUnit(result.data);
}

/**
 * Load a compilation-unit document from disk.
 */
export async function loadCompilationUnit(filePath: string): Promise<CompilationUnit> {
  if (!(await fileExists(filePath))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Compilation unit not found: ${filePath}`, { filePath });
  }
  const content = await readFile(filePath);
  return parseCompilationUnit(content, filePath);
}

type SpanVisitor = (span: Span, what: string) => void;

function visitDeclarationSpans(declarations: Declaration[], visit: SpanVisitor): void {
  for (const declaration of declarations) {
    switch (declaration.kind) {
      case 'namespace':
        visit(declaration.span, `namespace ${declaration.name}`);
        visitDeclarationSpans(declaration.declarations, visit);
        break;
      case 'record':
        visit(declaration.span, `record ${declaration.qualifiedName}`);
        visit({ start: declaration.bodyEnd, end: declaration.bodyEnd + 1 }, `closing brace of ${declaration.qualifiedName}`);
        for (const field of declaration.fields) {
          visit(field.span, `field ${field.qualifiedName}`);
        }
        for (const method of declaration.methods) {
          if (method.span) visit(method.span, `method ${method.name}`);
        }
        visitDeclarationSpans(declaration.declarations, visit);
        break;
      case 'function':
        visit(declaration.span, `function ${declaration.qualifiedName}`);
        if (declaration.body) visitNodeSpans(declaration.body, visit);
        break;
      case 'variable':
        visitNodeSpans(declaration, visit);
        break;
      default:
        assertNever(declaration);
    }
  }
}

function visitNodeSpans(node: SyntaxNode, visit: SpanVisitor): void {
  visit(node.span, node.kind);
  for (const child of childrenOf(node)) {
    if (child) visitNodeSpans(child, visit);
  }
}
