/**
 * Tests for loading compilation-unit documents.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  createCompilationUnit,
  loadCompilationUnit,
  parseCompilationUnit,
} from '../../../../src/core/ast/loader.js';
import type { CompilationUnitDocument } from '../../../../src/core/ast/types.js';
import { FrontEndError, SystemError } from '../../../../src/utils/errors.js';

const source = 'int main() {\n  a->x++;\n}\n';

function document(): Record<string, unknown> {
  return {
    path: 'mini.cpp',
    source,
    root: {
      kind: 'translation-unit',
      span: { start: 0, end: 25 },
      declarations: [
        {
          kind: 'function',
          span: { start: 0, end: 24 },
          name: 'main',
          qualifiedName: 'main',
          body: {
            kind: 'block',
            span: { start: 11, end: 24 },
            statements: [
              {
                kind: 'expression-statement',
                span: { start: 15, end: 22 },
                expression: {
                  kind: 'unary',
                  span: { start: 15, end: 21 },
                  operator: '++',
                  prefix: false,
                  operand: {
                    kind: 'member',
                    span: { start: 15, end: 19 },
                    base: { kind: 'identifier', span: { start: 15, end: 16 }, name: 'a' },
                    member: { id: 'S::x', name: 'x' },
                    arrow: true,
                  },
                },
              },
            ],
          },
        },
      ],
    },
  };
}

describe('parseCompilationUnit', () => {
  it('should parse a document and fill defaults', () => {
    const unit = parseCompilationUnit(JSON.stringify(document()), 'mini.ast.json');

    expect(unit.path).toBe('mini.cpp');
    expect(unit.language).toBe('cpp');
    const [main] = unit.root.declarations;
    expect(main.kind).toBe('function');
    if (main.kind !== 'function' || !main.body) return;
    const [statement] = main.body.statements;
    expect(statement.kind).toBe('expression-statement');
    if (statement.kind !== 'expression-statement') return;
    expect(unit.printer.print(statement.expression)).toBe('a->x++');
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseCompilationUnit('{ nope', 'bad.ast.json')).toThrow(FrontEndError);
    expect(() => parseCompilationUnit('{ nope', 'bad.ast.json')).toThrow(/bad\.ast\.json is not valid JSON/);
  });

  it('should reject unknown node kinds with code F001', () => {
    const doc = document();
    doc.root = { kind: 'translation-unit', span: { start: 0, end: 25 }, declarations: [{ kind: 'lambda' }] };

    try {
      parseCompilationUnit(JSON.stringify(doc), 'bad.ast.json');
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(FrontEndError);
      expect(error).toMatchObject({ code: 'F001' });
    }
  });

  it('should reject spans that end before they start', () => {
    const doc = document();
    doc.root = { kind: 'translation-unit', span: { start: 5, end: 2 }, declarations: [] };

    expect(() => parseCompilationUnit(JSON.stringify(doc), 'bad.ast.json')).toThrow(/span ends before it starts/);
  });
});

describe('createCompilationUnit', () => {
  it('should reject spans outside the source with code F002', () => {
    const doc: CompilationUnitDocument = {
      path: 'short.cpp',
      language: 'cpp',
      source: 'int x;',
      root: {
        kind: 'translation-unit',
        span: { start: 0, end: 6 },
        declarations: [
          {
            kind: 'variable',
            span: { start: 0, end: 40 },
            name: 'x',
            type: { spelling: 'int', isConst: false, indirection: 'none' },
            initializer: null,
          },
        ],
      },
    };

    try {
      createCompilationUnit(doc);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(FrontEndError);
      expect(error).toMatchObject({ code: 'F002' });
    }
  });
});

describe('loadCompilationUnit', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `accessorize-loader-test-${Date.now()}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load a document from disk', async () => {
    const file = join(tempDir, 'mini.ast.json');
    writeFileSync(file, JSON.stringify(document()));

    const unit = await loadCompilationUnit(file);

    expect(unit.source).toBe(source);
  });

  it('should throw SystemError for a missing file', async () => {
    await expect(loadCompilationUnit(join(tempDir, 'none.ast.json'))).rejects.toThrow(SystemError);
  });
});
