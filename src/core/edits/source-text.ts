import type { SourceLocation } from '../ast/types.js';

/**
 * Offset of the first character of the line containing `offset`.
 */
export function lineStartOf(source: string, offset: number): number {
  if (offset <= 0) return 0;
  return source.lastIndexOf('\n', offset - 1) + 1;
}

/**
 * Leading whitespace of the line containing `offset`.
 */
export function lineIndentAt(source: string, offset: number): string {
  const start = lineStartOf(source, offset);
  const match = /^[ \t]*/.exec(source.slice(start));
  return match ? match[0] : '';
}

/**
 * True when only whitespace precedes `offset` on its line.
 */
export function isLineLeading(source: string, offset: number): boolean {
  return source.slice(lineStartOf(source, offset), offset).trim() === '';
}

/**
 * 1-based line and column of an offset.
 */
export function locationAt(source: string, offset: number): SourceLocation {
  let line = 1;
  let index = source.indexOf('\n');
  while (index !== -1 && index < offset) {
    line++;
    index = source.indexOf('\n', index + 1);
  }
  return { line, column: offset - lineStartOf(source, offset) + 1 };
}
