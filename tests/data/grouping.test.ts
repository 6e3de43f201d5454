import { describe, expect, test } from 'vitest';
import { DataGrouping } from '../../src/data/grouping';
import { DataTable } from '../../src/data/table';
import { InvalidOperationError } from '../../src/errors';

const table = DataTable.from(
  ['state', 'city'],
  [
    ['NY', 'Albany'],
    ['MA', 'Boston'],
    ['NY', 'Buffalo'],
  ],
);

describe('DataGrouping', () => {
  test('builds lazy sub-tables per key', () => {
    const groups = new DataGrouping(table);
    groups.add('NY', 0);
    groups.add('MA', 1);
    groups.add('NY', 2);
    expect(groups.keys()).toEqual(['NY', 'MA']);
    expect(groups.rowIds('NY')).toEqual([0, 2]);
    expect(groups.get('NY')?.column('city')).toEqual(['Albany', 'Buffalo']);
    expect(groups.get('CA')).toBeUndefined();
  });

  test('sub-tables are cached', () => {
    const groups = new DataGrouping(table);
    groups.add('NY', 0);
    expect(groups.get('NY')).toBe(groups.get('NY'));
  });

  test('tuple keys', () => {
    const groups = new DataGrouping(table);
    groups.add(['NY', 1], 0);
    groups.add(['NY', 1], 2);
    expect(groups.size).toBe(1);
    expect(groups.has(['NY', 1])).toBe(true);
  });

  test('is frozen after the first read', () => {
    const groups = new DataGrouping(table);
    groups.add('NY', 0);
    expect(groups.size).toBe(1);
    expect(() => groups.add('MA', 1)).toThrow(InvalidOperationError);
  });

  test('iterates keys with tables', () => {
    const groups = new DataGrouping(table);
    groups.add('MA', 1);
    const items = [...groups];
    expect(items).toHaveLength(1);
    expect(items[0]?.[0]).toBe('MA');
    expect(items[0]?.[1].shape).toEqual([1, 2]);
  });
});
