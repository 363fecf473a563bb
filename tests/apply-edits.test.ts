import { describe, it, expect } from 'vitest';
import { applyEdits } from '../src/patching/apply-edits.js';
import type { EditPlanEntry } from '../src/core/types.js';

function edit(searchText: string, replaceText: string, scope: EditPlanEntry['scope'] = 'first'): EditPlanEntry {
  return { searchText, replaceText, scope, strategy: 'exact-literal' };
}

describe('applyEdits', () => {
  it('replaces only the first occurrence for first-scope edits', () => {
    const result = applyEdits('"a" "a"', [edit('"a"', '"b"')]);
    expect(result).toEqual({ content: '"b" "a"', appliedCount: 1, skipped: [] });
  });

  it('replaces every occurrence for global-scope edits', () => {
    const result = applyEdits('cost=1 cost=1 cost=2', [edit('cost=1', 'cost=3', 'global')]);
    expect(result.content).toBe('cost=3 cost=3 cost=2');
    expect(result.appliedCount).toBe(1);
  });

  it('lets later edits see the effect of earlier ones', () => {
    const result = applyEdits('x y', [edit('x', 'y'), edit('y y', 'z')]);
    expect(result.content).toBe('z');
    expect(result.appliedCount).toBe(2);
  });

  it('applies duplicate first-scope edits to successive occurrences', () => {
    const result = applyEdits('"a"\n"a"\n', [edit('"a"', '"b"'), edit('"a"', '"b"')]);
    expect(result.content).toBe('"b"\n"b"\n');
    expect(result.appliedCount).toBe(2);
  });

  it('skips and does not count edits whose search text is absent', () => {
    const missing = edit('"gone"', '"new"');
    const result = applyEdits('"here"', [missing]);
    expect(result).toEqual({ content: '"here"', appliedCount: 0, skipped: [missing] });
  });

  it('inserts replacement text literally', () => {
    const result = applyEdits('"x"', [edit('"x"', '"$& $1"')]);
    expect(result.content).toBe('"$& $1"');
  });

  it('skips an empty search text', () => {
    const result = applyEdits('abc', [edit('', 'z', 'global')]);
    expect(result.content).toBe('abc');
    expect(result.appliedCount).toBe(0);
  });

  describe('with a boundary', () => {
    const tokenBoundary = { before: '[A-Za-z0-9_]', after: '[\\d.]' };

    it('replaces only whole-token occurrences globally', () => {
      const result = applyEdits('rows=1 rows=15 xrows=1 rows=1.5 rows=1', [
        { ...edit('rows=1', 'rows=2', 'global'), boundary: tokenBoundary },
      ]);
      expect(result.content).toBe('rows=2 rows=15 xrows=1 rows=1.5 rows=2');
      expect(result.appliedCount).toBe(1);
    });

    it('replaces the first clear occurrence for first-scope edits', () => {
      const result = applyEdits('"x\\"a" "a" "a"', [{ ...edit('"a"', '"b"'), boundary: { before: '\\\\' } }]);
      expect(result.content).toBe('"x\\"a" "b" "a"');
    });

    it('skips the edit when every occurrence touches the boundary', () => {
      const entry = { ...edit('rows=1', 'rows=2', 'global'), boundary: tokenBoundary };
      const result = applyEdits('rows=15', [entry]);
      expect(result.content).toBe('rows=15');
      expect(result.appliedCount).toBe(0);
      expect(result.skipped).toEqual([entry]);
    });

    it('inserts replacement text literally', () => {
      const result = applyEdits('cost=1', [{ ...edit('cost=1', '$&=$1', 'global'), boundary: tokenBoundary }]);
      expect(result.content).toBe('$&=$1');
    });
  });
});
