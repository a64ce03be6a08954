import { describe, it, expect } from 'vitest';
import { buildSeatGrid, formatSeatLabel } from '../formatters';
import { parseIdList, toInteger } from '../ids';
import { normalizeRoster } from '../roster';
import { seat } from './helpers';

describe('formatSeatLabel', () => {
  it('joins id and name', () => {
    expect(formatSeatLabel(3, 'Amy')).toBe('3 Amy');
    expect(formatSeatLabel(3, '')).toBe('3');
    expect(formatSeatLabel(3, undefined)).toBe('3');
  });
});

describe('buildSeatGrid', () => {
  it('marks gaps, empty seats and seated students', () => {
    const seats = [seat(1, 1, 1), seat(2, 1, 2), seat(3, 2, 2)];
    const grid = buildSeatGrid(
      new Map([
        [10, 1],
        [11, 3],
      ]),
      seats,
      new Map([
        [10, 'Amy'],
        [11, ''],
      ]),
    );
    expect(grid).toEqual([
      ['10 Amy', ''],
      [null, '11'],
    ]);
  });
});

describe('ids', () => {
  it('accepts integers and integer strings only', () => {
    expect(toInteger(7)).toBe(7);
    expect(toInteger(' 07 ')).toBe(7);
    expect(toInteger('+3')).toBe(3);
    expect(toInteger('-2')).toBe(-2);
    expect(toInteger(1.5)).toBeNull();
    expect(toInteger('1e3')).toBeNull();
    expect(toInteger('')).toBeNull();
    expect(toInteger(true)).toBeNull();
    expect(toInteger('99999999999999999999')).toBeNull();
  });

  it('splits id lists and keeps the bad tokens', () => {
    expect(parseIdList('1, 2 x 4')).toEqual({ ids: [1, 2, 4], invalid: ['x'] });
    expect(parseIdList(null)).toEqual({ ids: [], invalid: [] });
  });
});

describe('normalizeRoster', () => {
  it('coerces ids and trims names', () => {
    const { students, errors } = normalizeRoster([{ id: '4', name: '  Dee ' }, { id: 5 }, { id: 6, name: null }]);
    expect(errors).toEqual([]);
    expect(students).toEqual([
      { id: 4, name: 'Dee' },
      { id: 5, name: '' },
      { id: 6, name: '' },
    ]);
  });

  it('reports invalid and repeated ids', () => {
    const { students, errors } = normalizeRoster([{ id: 'x' }, { id: 1 }, { id: '1' }]);
    expect(students).toEqual([{ id: 1, name: '' }]);
    expect(errors.map((e) => e.kind)).toEqual(['invalid_student_id', 'duplicate_student']);
    expect(errors[1].message).toBe('Duplicate student id: 1');
  });

  it('reports an empty roster', () => {
    expect(normalizeRoster([]).errors.map((e) => e.kind)).toEqual(['empty_roster']);
  });
});
