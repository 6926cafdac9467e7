/**
 * Tests for applying several transforms to one unit.
 */
import { describe, it, expect, vi } from 'vitest';
import { AccessorsTransform } from '../../../../src/core/accessors/transform.js';
import { applyTransforms } from '../../../../src/core/transforms/runner.js';
import type { Transform } from '../../../../src/core/transforms/types.js';
import { Logger } from '../../../../src/utils/logger.js';
import { bin, exprStmt, field, id, lit, main, member, program, record } from '../../../helpers/program-builder.js';

function quietLogger(): Logger {
  const log = new Logger();
  log.setLevel('silent');
  return log;
}

const unit = program(
  record('Foo', [field('int', 'x'), field('int', 'y')]),
  main(exprStmt(bin(member(id('foo'), 'Foo::x'), '=', lit('1'))), exprStmt(bin(member(id('foo'), 'Foo::y'), '=', lit('2'))))
);

describe('applyTransforms', () => {
  it('should return the source unchanged without transforms', () => {
    const result = applyTransforms(unit, [], quietLogger());

    expect(result).toEqual({ path: 'test.cpp', text: unit.source, changed: false, edits: 0, diagnostics: [] });
  });

  it('should apply the edits of every transform against the original source', () => {
    const result = applyTransforms(
      unit,
      [new AccessorsTransform({ fields: ['Foo::x'] }), new AccessorsTransform({ fields: ['Foo::y'] })],
      quietLogger()
    );

    expect(result.changed).toBe(true);
    expect(result.text.slice(result.text.indexOf('int main()'))).toBe(
      'int main() {\n  foo.setX( 1 );\n  foo.setY( 2 );\n}\n'
    );
  });

  it('should collect reported diagnostics', () => {
    const reporting: Transform = {
      name: 'reporting',
      apply: (target, context) => {
        context.report({
          severity: 'info',
          code: 'unsupported-field',
          message: 'noted',
          field: 'Foo::x',
          path: target.path,
          location: { line: 1, column: 1 },
        });
      },
    };

    const result = applyTransforms(unit, [reporting], quietLogger());

    expect(result.diagnostics.map((diagnostic) => diagnostic.message)).toEqual(['noted']);
    expect(result.changed).toBe(false);
  });

  it('should log each transform at debug level', () => {
    const log = quietLogger();
    const debug = vi.spyOn(log, 'debug');

    applyTransforms(unit, [new AccessorsTransform({ fields: ['Foo::x'] })], log);

    expect(debug).toHaveBeenCalledWith('Applying accessors to test.cpp');
  });

  it('should hand each transform a logger prefixed with its name', () => {
    const log = new Logger();
    log.setLevel('debug');
    const print = vi.spyOn(console, 'log').mockImplementation(() => {});
    const noting: Transform = {
      name: 'noting',
      apply: (_target, context) => context.logger.debug('visited'),
    };

    applyTransforms(unit, [noting], log);

    expect(print).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] [noting] visited'));
    print.mockRestore();
  });
});
