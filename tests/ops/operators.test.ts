import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { type TestLogger, createTestLogger, setLogger } from '../../src/core/logging';
import { DataTable } from '../../src/data/table';
import {
  ColumnNotFoundError,
  ConfigurationError,
  DataError,
  PredicateTypeError,
  SchemaError,
} from '../../src/errors';
import { Add, Const, Eq, Gt, col } from '../../src/function';
import { TableSource } from '../../src/io/source';
import {
  Collector,
  DataFrame,
  Filter,
  Insert,
  Limit,
  Move,
  Rename,
  Sample,
  Select,
  type StreamOperator,
  Update,
  runPipeline,
} from '../../src/ops';
import type { RowEntry } from '../../src/types/row';

const abc = new TableSource(
  DataTable.from(
    ['a', 'b', 'c'],
    [
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
    ],
  ),
);

function entries(source: TableSource, ...ops: StreamOperator[]): RowEntry[] {
  const result = runPipeline(source, [...ops, new Collector()]);
  if (!Array.isArray(result)) throw new Error('expected collected rows');
  return result;
}

function table(source: TableSource, ...ops: StreamOperator[]): DataTable {
  const result = runPipeline(source, [...ops, new DataFrame()]);
  if (!(result instanceof DataTable)) throw new Error('expected a table');
  return result;
}

let logger: TestLogger;

beforeEach(() => {
  logger = createTestLogger();
  setLogger(logger);
});

afterEach(() => {
  setLogger(null);
});

describe('Select', () => {
  test('narrows and reorders, keeping row ids', () => {
    expect(entries(abc, new Select(['c', 'a']))).toEqual([
      [0, [3, 1]],
      [1, [6, 4]],
      [2, [9, 7]],
    ]);
  });

  test('output schema and renaming', () => {
    expect(table(abc, new Select([2, 'a'])).columns).toEqual(['c', 'a']);
    expect(table(abc, new Select(['a', 'b'], ['x', 'y'])).columns).toEqual(['x', 'y']);
  });

  test('invalid selections', () => {
    expect(() => new Select(['a'], ['x', 'y'])).toThrow(ConfigurationError);
    expect(() => table(abc, new Select(['a', 'a']))).toThrow(SchemaError);
    expect(() => table(abc, new Select('zip'))).toThrow(ColumnNotFoundError);
  });
});

describe('Rename', () => {
  test('changes names only', () => {
    const result = table(abc, new Rename(['c', 0], ['z', 'x']));
    expect(result.columns).toEqual(['x', 'b', 'z']);
    expect(result.rows[0]).toEqual([1, 2, 3]);
  });

  test('rejects duplicate names', () => {
    expect(() => table(abc, new Rename('a', 'b'))).toThrow(SchemaError);
    expect(() => new Rename(['a', 'b'], 'x')).toThrow(ConfigurationError);
  });
});

describe('Move', () => {
  test('first moved column lands at the target position', () => {
    const result = table(abc, new Move(['c', 'a'], 1));
    expect(result.columns).toEqual(['b', 'c', 'a']);
    expect(result.rows[0]).toEqual([2, 3, 1]);
  });

  test('positions past the end append', () => {
    expect(table(abc, new Move('a', 10)).columns).toEqual(['b', 'c', 'a']);
    expect(table(abc, new Move('c', 0)).columns).toEqual(['c', 'a', 'b']);
  });

  test('invalid moves', () => {
    expect(() => new Move('a', -1)).toThrow(ConfigurationError);
    expect(() => table(abc, new Move(['a', 0], 1))).toThrow(ConfigurationError);
  });
});

describe('Insert', () => {
  test('constant column at a position', () => {
    const result = table(abc, new Insert('z', 0, 1));
    expect(result.columns).toEqual(['a', 'z', 'b', 'c']);
    expect(result.rows[1]).toEqual([4, 0, 5, 6]);
  });

  test('a scalar fills several new columns', () => {
    const result = table(abc, new Insert(['y', 'z'], 'k'));
    expect(result.columns).toEqual(['a', 'b', 'c', 'y', 'z']);
    expect(result.rows[0]).toEqual([1, 2, 3, 'k', 'k']);
  });

  test('computed values', () => {
    const result = table(abc, new Insert('sum', new Add(col('a'), col('b')), 0));
    expect(result.column('sum')).toEqual([3, 9, 15]);
  });

  test('value count must match the new columns', () => {
    expect(() => table(abc, new Insert(['y', 'z'], new Const(1)))).toThrow(DataError);
    expect(() => table(abc, new Insert('a', 1))).toThrow(SchemaError);
    expect(() => new Insert([], 1)).toThrow(ConfigurationError);
  });
});

describe('Update', () => {
  test('callable over one column', () => {
    const result = table(abc, new Update('a', (v) => Number(v) * 10));
    expect(result.column('a')).toEqual([10, 40, 70]);
    expect(result.column('b')).toEqual([2, 5, 8]);
  });

  test('constant over several columns', () => {
    expect(table(abc, new Update(['a', 'c'], 0)).rows[0]).toEqual([0, 2, 0]);
  });

  test('mapping', () => {
    expect(table(abc, new Update('b', { '5': 'five' })).column('b')).toEqual([2, 5, 8]);
    expect(table(abc, new Update('b', new Map([[5, 'five']]))).column('b')).toEqual([2, 'five', 8]);
  });

  test('width mismatch', () => {
    expect(() => table(abc, new Update(['a', 'b'], new Const([1, 2, 3])))).toThrow(DataError);
  });
});

describe('Filter', () => {
  test('keeps matching rows', () => {
    expect(entries(abc, new Filter(new Gt(col('a'), 3))).map(([id]) => id)).toEqual([1, 2]);
  });

  test('negated keeps the rest', () => {
    expect(entries(abc, new Filter(new Gt(col('a'), 3), { negated: true })).map(([id]) => id)).toEqual([0]);
  });

  test('custom truth value', () => {
    const filter = new Filter(new Add(col('a'), 1), { truthValue: 5 });
    expect(entries(abc, filter).map(([id]) => id)).toEqual([1]);
  });

  test('a result of another type than the truth value fails', () => {
    expect(() => entries(abc, new Filter(col('a')))).toThrow(PredicateTypeError);
  });

  test('null results never match and do not fail', () => {
    const source = new TableSource(DataTable.from(['flag'], [[null], [true]]));
    expect(entries(source, new Filter(col('flag')))).toEqual([[1, [true]]]);
  });

  test('a null truth value keeps the rows whose predicate returns null', () => {
    const filter = new Filter(col('flag'), { truthValue: null });
    expect(filter.truthValue).toBeNull();
    const source = new TableSource(DataTable.from(['flag'], [[null], [true], [null]]));
    expect(entries(source, filter).map(([id]) => id)).toEqual([0, 2]);
  });

  test('warns when no row matched', () => {
    entries(abc, new Filter(new Eq(col('a'), 100)));
    const warnings = logger.getLogsByLevel('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.message).toBe('filter predicate never returned the truth value');
    expect(warnings[0]?.context?.rows).toBe(3);
  });

  test('no warning for an empty stream', () => {
    entries(new TableSource(DataTable.empty(['a'])), new Filter(new Eq(col('a'), 1)));
    expect(logger.getLogsByLevel('warn')).toHaveLength(0);
  });
});

describe('Limit', () => {
  test('passes the first n rows', () => {
    expect(entries(abc, new Limit(2)).map(([id]) => id)).toEqual([0, 1]);
    expect(entries(abc, new Limit(0))).toEqual([]);
    expect(entries(abc, new Limit(10))).toHaveLength(3);
  });

  test('counts rows after a filter', () => {
    expect(entries(abc, new Filter(new Gt(col('a'), 1)), new Limit(1))).toEqual([[1, [4, 5, 6]]]);
  });

  test('rejects invalid limits', () => {
    expect(() => new Limit(-1)).toThrow(ConfigurationError);
    expect(() => new Limit(1.5)).toThrow(ConfigurationError);
  });
});

describe('Sample', () => {
  const numbers = new TableSource(
    DataTable.from(
      ['n'],
      Array.from({ length: 20 }, (_, i) => [i]),
    ),
  );

  test('draws n distinct rows from the stream', () => {
    const ids = entries(numbers, new Sample(5, { seed: 7 })).map(([id]) => id);
    expect(ids).toHaveLength(5);
    expect(new Set(ids).size).toBe(5);
    for (const id of ids) {
      expect(typeof id === 'number' && id >= 0 && id < 20).toBe(true);
    }
  });

  test('a seed makes the sample reproducible', () => {
    const first = entries(numbers, new Sample(5, { seed: 42 }));
    const second = entries(numbers, new Sample(5, { seed: 42 }));
    expect(second).toEqual(first);
  });

  test('keeps every row, in order, when the stream is small', () => {
    expect(entries(abc, new Sample(10, { seed: 1 })).map(([id]) => id)).toEqual([0, 1, 2]);
  });

  test('a downstream limit stops the replay', () => {
    expect(entries(numbers, new Sample(5, { seed: 3 }), new Limit(2))).toHaveLength(2);
  });

  test('rejects invalid sizes', () => {
    expect(() => new Sample(-1)).toThrow(ConfigurationError);
    expect(entries(abc, new Sample(0))).toEqual([]);
  });
});
