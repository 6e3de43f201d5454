/**
 * Aggregate reducer.
 *
 * Reduces each group of a grouping to one output row. The output table is
 * indexed by group key, in the order the keys were first seen.
 */

import type { DataGrouping } from '../data/grouping';
import { DataTable } from '../data/table';
import { ColumnNotFoundError, SchemaError } from '../errors';
import { type Row, type Scalar, type Value, isScalar } from '../types/row';

/** One value, or named values that become one column each. */
export type AggregateResult = Scalar | Readonly<Record<string, Scalar>>;

/** Reduces a whole group sub-table. */
export type GroupAggregate = (group: DataTable) => AggregateResult;

/** Reduces the values of one column within a group. */
export type ColumnAggregate = (values: Scalar[]) => AggregateResult;

/** A group function, or column functions keyed by column name. */
export type AggregateSpec = GroupAggregate | Readonly<Record<string, ColumnAggregate>>;

/**
 * Aggregate groups with a single function over each group table, or with
 * one function per column over that column's values.
 *
 * Output columns: a scalar result gives one column, named after the group
 * function (`'value'` for anonymous ones) or after the column. A record
 * result gives one column per key, prefixed with `column.` in per-column
 * mode. Groups that lack a key get `null` there. An explicit schema renames
 * the output columns and must have one name per column.
 */
export class Aggregate {
  readonly func: AggregateSpec;
  readonly schema?: readonly string[];

  constructor(func: AggregateSpec, schema?: readonly string[]) {
    this.func = func;
    this.schema = schema;
  }

  reduce(groups: DataGrouping): DataTable {
    const func = this.func;
    const available = groups.table.columns;

    if (typeof func !== 'function') {
      for (const column of Object.keys(func)) {
        if (!available.includes(column)) {
          throw new ColumnNotFoundError(column, available);
        }
      }
    }

    const columns: string[] = [];
    const known = new Set<string>();
    const records: Map<string, Scalar>[] = [];
    const keys: Value[] = [];

    const put = (record: Map<string, Scalar>, name: string, value: Scalar): void => {
      if (!known.has(name)) {
        known.add(name);
        columns.push(name);
      }
      record.set(name, value);
    };

    for (const [key, group] of groups.items()) {
      const record = new Map<string, Scalar>();
      if (typeof func === 'function') {
        spread(func(group), func.name || 'value', '', record, put);
      } else {
        for (const [column, reducer] of Object.entries(func)) {
          spread(reducer(group.column(column)), column, `${column}.`, record, put);
        }
      }
      records.push(record);
      keys.push(key);
    }

    if (records.length === 0) {
      columns.push(...(typeof func === 'function' ? [func.name || 'value'] : Object.keys(func)));
    }

    let names: readonly string[] = columns;
    if (this.schema !== undefined) {
      if (this.schema.length !== columns.length) {
        throw new SchemaError(
          `aggregate produced ${columns.length} columns (${columns.join(', ')}) but the schema names ${this.schema.length}`,
          'pass one name per output column',
        );
      }
      names = this.schema;
    }

    const rows: Row[] = records.map((record) => columns.map((name) => record.get(name) ?? null));
    return DataTable.from(names, rows, keys);
  }
}

function spread(
  result: AggregateResult,
  name: string,
  prefix: string,
  record: Map<string, Scalar>,
  put: (record: Map<string, Scalar>, name: string, value: Scalar) => void,
): void {
  if (isScalar(result)) {
    put(record, name, result);
    return;
  }
  for (const [key, value] of Object.entries(result)) {
    put(record, `${prefix}${key}`, value);
  }
}

/**
 * Aggregate a grouping into a table with one row per group.
 *
 * @example
 * ```ts
 * const groups = groupBy(table, 'state');
 * aggregate(groups, function count(group) { return group.length; });
 * aggregate(groups, { price: (values) => Math.max(...values.map(Number)) });
 * ```
 */
export function aggregate(groups: DataGrouping, func: AggregateSpec, schema?: readonly string[]): DataTable {
  return new Aggregate(func, schema).reduce(groups);
}
