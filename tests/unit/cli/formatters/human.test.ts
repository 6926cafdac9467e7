/**
 * Tests for the human formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { planReport, runResults, unitResult } from './fixtures.js';

describe('HumanFormatter', () => {
  describe('formatRun', () => {
    it('should list changed units and units with warnings', () => {
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatRun(runResults)).toBe(
        [
          '✓ src/a.cpp (4 edits) -> /p/src/a.cpp',
          '- src/c.cpp (0 edits)',
          "   ⚠ 6:3 Non-const reference 'r' binds to Foo::x; writes through it bypass setX() [escaping-reference]",
          '',
          '1/3 units changed, 1 warning',
        ].join('\n')
      );
    });

    it('should list every unit when verbose', () => {
      const formatter = new HumanFormatter({ colors: false, verbose: true });

      const lines = formatter.formatRun(runResults).split('\n');

      expect(lines[1]).toBe('- src/b.cpp (0 edits)');
      expect(lines).toHaveLength(6);
    });

    it('should use the singular for one edit and one unit', () => {
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatRun([unitResult({ changed: true, edits: 1 })])).toBe(
        '✓ src/a.cpp (1 edit)\n\n1/1 unit changed, 0 warnings'
      );
    });

    it('should only print the summary when nothing happened', () => {
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatRun([])).toBe('0/0 units changed, 0 warnings');
    });
  });

  describe('formatPlan', () => {
    it('should list sites, aggregates and diagnostics', () => {
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatPlan(planReport())).toBe(
        [
          'test.cpp: 2 access sites',
          '   7:3  Foo::x  +=  in-place',
          '   8:12  Foo::y  read  in-place',
          '   accessors Foo: x, y',
          "   ⚠ 8:3 Non-const reference 'r' binds to Foo::y; writes through it bypass setY() [escaping-reference]",
        ].join('\n')
      );
    });
  });
});
