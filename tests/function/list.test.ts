import { describe, expect, test } from 'vitest';
import { DataTable } from '../../src/data/table';
import { ConfigurationError, DataError } from '../../src/errors';
import { Const, Eq, Get, IfThenReplace, ListOf, col } from '../../src/function';
import { TableSource } from '../../src/io/source';

const ds = new TableSource(DataTable.from(['a', 'b', 'c'], []));

describe('Get', () => {
  test('one position returns a scalar, several a tuple', () => {
    expect(new Get(col(['a', 'b', 'c']), 1).prepare(ds).eval([1, 2, 3])).toBe(2);
    expect(new Get(col(['a', 'b', 'c']), [2, 0]).prepare(ds).eval([1, 2, 3])).toEqual([3, 1]);
  });

  test('a scalar counts as a one-element tuple', () => {
    expect(new Get(col('a'), 0).prepare(ds).eval(['x', 2, 3])).toBe('x');
  });

  test('positions outside the value', () => {
    expect(new Get(new Const([1, 2]), 5).eval([])).toBeNull();
    expect(new Get(new Const([1, 2]), [0, 5], { onError: { default: -1 } }).eval([])).toEqual([1, -1]);
    expect(() => new Get(new Const([1, 2]), 5, { onError: 'raise' }).eval([])).toThrow(DataError);
  });
});

describe('ListOf', () => {
  test('splices tuple results', () => {
    const list = new ListOf(col('a'), col(['b', 'c']), new Const('k')).prepare(ds);
    expect(list.eval([1, 2, 3])).toEqual([1, 2, 3, 'k']);
  });
});

describe('IfThenReplace', () => {
  test('value for matching rows, otherwise for the rest', () => {
    const replace = new IfThenReplace(new Eq(col('a'), 'N.Y.'), 'NY', col('a')).prepare(ds);
    expect(replace.eval(['N.Y.', null, null])).toBe('NY');
    expect(replace.eval(['MA', null, null])).toBe('MA');
  });

  test('needs a fallback to be prepared', () => {
    const replace = new IfThenReplace(new Eq(col('a'), 1), 0);
    expect(replace.hasOtherwise).toBe(false);
    expect(() => replace.prepare(ds)).toThrow(ConfigurationError);
    const completed = replace.withOtherwise(col('b'));
    expect(completed.hasOtherwise).toBe(true);
    expect(completed.prepare(ds).eval([2, 'kept', null])).toBe('kept');
  });
});
