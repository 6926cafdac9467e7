/**
 * Results and plans shared by the formatter tests.
 */
import { AccessorsTransform } from '../../../../src/core/accessors/transform.js';
import type { UnitResult } from '../../../../src/core/driver/driver.js';
import type { Diagnostic } from '../../../../src/core/transforms/types.js';
import type { PlanReport } from '../../../../src/cli/formatters/types.js';
import {
  bin,
  decl,
  exprStmt,
  field,
  id,
  lit,
  main,
  member,
  program,
  record,
  type,
} from '../../../helpers/program-builder.js';

export const escapeWarning: Diagnostic = {
  severity: 'warning',
  code: 'escaping-reference',
  message: "Non-const reference 'r' binds to Foo::x; writes through it bypass setX()",
  field: 'Foo::x',
  path: 'src/c.cpp',
  location: { line: 6, column: 3 },
};

export function unitResult(overrides: Partial<UnitResult>): UnitResult {
  return {
    path: 'src/a.cpp',
    text: '',
    changed: false,
    edits: 0,
    diagnostics: [],
    section: 1,
    unitFile: '/p/units/a.ast.json',
    output: 'in-place',
    outputPath: null,
    ...overrides,
  };
}

export const runResults: UnitResult[] = [
  unitResult({ path: 'src/a.cpp', text: 'patched a', changed: true, edits: 4, outputPath: '/p/src/a.cpp' }),
  unitResult({ path: 'src/b.cpp', text: 'original b', unitFile: '/p/units/b.ast.json' }),
  unitResult({ path: 'src/c.cpp', text: 'original c', unitFile: '/p/units/c.ast.json', diagnostics: [escapeWarning] }),
];

/**
 * `foo.x += 2;` and `int &r = foo.y;` in main, planned for Foo::x and Foo::y.
 */
export function planReport(): PlanReport {
  const unit = program(
    record('Foo', [field('int', 'x'), field('int', 'y')]),
    main(
      exprStmt(bin(member(id('foo'), 'Foo::x'), '+=', lit('2'))),
      decl(type('int', { indirection: 'reference' }), 'r', member(id('foo'), 'Foo::y'))
    )
  );
  const plan = new AccessorsTransform({ fields: ['Foo::x', 'Foo::y'] }).plan(unit);
  return { path: unit.path, ...plan };
}
