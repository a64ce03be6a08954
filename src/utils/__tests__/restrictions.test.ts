import { describe, it, expect } from 'vitest';
import { applyShortcut, normalizeRestrictions, parseRowColSet, shortcutRange } from '../restrictions';

describe('parseRowColSet', () => {
  it('reads comma and space separated lists', () => {
    expect(parseRowColSet('1,2,3').values).toEqual(new Set([1, 2, 3]));
    expect(parseRowColSet('1 3, 5').values).toEqual(new Set([1, 3, 5]));
    expect(parseRowColSet('1,,2').values).toEqual(new Set([1, 2]));
    expect(parseRowColSet([2, 4]).values).toEqual(new Set([2, 4]));
  });

  it('treats blank input as unrestricted', () => {
    for (const v of ['', '   ', null, undefined]) {
      expect(parseRowColSet(v)).toEqual({ values: null, invalid: [] });
    }
  });

  it('voids the whole field on a bad token', () => {
    expect(parseRowColSet('1,a')).toEqual({ values: null, invalid: ['a'] });
    expect(parseRowColSet('1.5')).toEqual({ values: null, invalid: ['1.5'] });
  });
});

describe('normalizeRestrictions', () => {
  it('parses limits per student and reports problems', () => {
    const { limits, errors } = normalizeRestrictions(
      [
        { studentId: 1, rows: '1,2' },
        { studentId: '2', cols: 'x' },
        { studentId: 7, rows: '1' },
      ],
      new Set([1, 2]),
    );
    expect(limits.get(1)).toEqual({ rows: new Set([1, 2]), cols: null });
    expect(limits.get(2)).toEqual({ rows: null, cols: null });
    expect(limits.has(7)).toBe(false);
    expect(errors.map((e) => e.kind)).toEqual(['invalid_restriction', 'unknown_student']);
    expect(errors[0].message).toBe('Student 2: cols "x" not understood, left unrestricted');
  });
});

describe('shortcutRange', () => {
  it.each([
    ['front', 2, 6, '1,2'],
    ['back', 2, 6, '5,6'],
    ['front', 9, 6, '1,2,3,4,5,6'],
    ['back', 9, 6, '1,2,3,4,5,6'],
    ['left', 1, 6, '1'],
    ['right', 3, 6, '4,5,6'],
    ['none', 3, 6, ''],
    ['front', 0, 6, ''],
    ['back', 0, 6, ''],
  ] as const)('%s %i of %i -> "%s"', (mode, n, max, expected) => {
    expect(shortcutRange(mode, n, max)).toBe(expected);
  });
});

describe('applyShortcut', () => {
  it('overwrites one axis for listed students and adds missing ones', () => {
    const input = [
      { studentId: 1, rows: '3', cols: '2' },
      { studentId: 2, rows: '1' },
    ];
    const out = applyShortcut(input, [1, 3], 'rows', 'back', 2, { maxRow: 7, maxCol: 6 });
    expect(out).toEqual([
      { studentId: 1, rows: '6,7', cols: '2' },
      { studentId: 2, rows: '1' },
      { studentId: 3, rows: '6,7' },
    ]);
    expect(input[0]).toEqual({ studentId: 1, rows: '3', cols: '2' });
  });

  it('clears a field with "none"', () => {
    const out = applyShortcut([{ studentId: 4, cols: '1,2' }], [4], 'cols', 'none', 0, { maxRow: 2, maxCol: 2 });
    expect(out).toEqual([{ studentId: 4, cols: '' }]);
  });
});
