/**
 * Tests for source text helpers.
 */
import { describe, it, expect } from 'vitest';
import { isLineLeading, lineIndentAt, lineStartOf, locationAt } from '../../../../src/core/edits/source-text.js';

const source = 'int main() {\n  foo.x = 1;\n\tbar();\n}\n';

describe('lineStartOf', () => {
  it('should find the start of the containing line', () => {
    expect(lineStartOf(source, 0)).toBe(0);
    expect(lineStartOf(source, 5)).toBe(0);
    expect(lineStartOf(source, 15)).toBe(13);
  });

  it('should treat an offset at a line start as that line', () => {
    expect(lineStartOf(source, 13)).toBe(13);
  });
});

describe('lineIndentAt', () => {
  it('should return leading spaces or tabs', () => {
    expect(lineIndentAt(source, 20)).toBe('  ');
    expect(lineIndentAt(source, 26)).toBe('\t');
    expect(lineIndentAt(source, 3)).toBe('');
  });
});

describe('isLineLeading', () => {
  it('should be true only when whitespace precedes the offset', () => {
    expect(isLineLeading(source, 15)).toBe(true);
    expect(isLineLeading(source, 19)).toBe(false);
    expect(isLineLeading(source, 34)).toBe(true);
  });
});

describe('locationAt', () => {
  it('should return 1-based line and column', () => {
    expect(locationAt(source, 0)).toEqual({ line: 1, column: 1 });
    expect(locationAt(source, 15)).toEqual({ line: 2, column: 3 });
    expect(locationAt(source, 34)).toEqual({ line: 4, column: 1 });
  });
});
