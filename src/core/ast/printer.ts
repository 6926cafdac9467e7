import type { Expression, ExpressionPrinter } from './types.js';

/**
 * Printer for front ends whose spans cover the exact source text of each
 * expression: printing a subtree is slicing the source.
 */
export class SourceSlicePrinter implements ExpressionPrinter {
  constructor(private readonly source: string) {}

  print(expression: Expression): string {
    return this.source.slice(expression.span.start, expression.span.end);
  }
}
