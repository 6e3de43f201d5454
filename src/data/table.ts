import { SchemaError } from '../errors';
import type { ColumnRef, Row, RowEntry, RowId, Scalar, Schema } from '../types/row';
import { assertUniqueColumns, columnIndex } from '../types/schema';
import { keyOf } from '../utils/key';
import { type PrintOptions, formatTable } from './print';

/**
 * Immutable in-memory table: a schema, positional rows and one row id per row.
 *
 * @example
 * ```ts
 * const table = DataTable.from(['name', 'age'], [['Ann', 42], ['Bob', null]]);
 * table.shape;          // [2, 2]
 * table.column('age');  // [42, null]
 * ```
 */
export class DataTable {
  readonly columns: Schema;
  readonly rows: readonly Row[];
  readonly index: readonly RowId[];

  private constructor(columns: Schema, rows: readonly Row[], index: readonly RowId[]) {
    this.columns = columns;
    this.rows = rows;
    this.index = index;
  }

  // ===============================================================
  // Factory Methods
  // ===============================================================

  /**
   * Create a table from rows. Row ids default to zero-based positions.
   */
  static from(columns: readonly string[], rows: readonly Row[], index?: readonly RowId[]): DataTable {
    assertUniqueColumns(columns);

    rows.forEach((row, i) => {
      if (row.length !== columns.length) {
        throw new SchemaError(
          `row ${i} has ${row.length} values but the schema has ${columns.length} columns`,
          'every row must have one value per column',
        );
      }
    });

    if (index !== undefined && index.length !== rows.length) {
      throw new SchemaError(
        `index has ${index.length} entries for ${rows.length} rows`,
        'pass exactly one row id per row',
      );
    }

    return new DataTable(
      [...columns],
      rows.map((row) => [...row]),
      index === undefined ? rows.map((_, i) => i) : [...index],
    );
  }

  /**
   * Create a table from objects. Columns default to the keys of all records
   * in first-seen order; missing keys become `null`.
   */
  static fromRecords(records: readonly Record<string, Scalar>[], columns?: readonly string[]): DataTable {
    const schema = columns ? [...columns] : collectKeys(records);
    const rows = records.map((record) => schema.map((name) => record[name] ?? null));
    return DataTable.from(schema, rows);
  }

  static empty(columns: readonly string[] = []): DataTable {
    return DataTable.from(columns, []);
  }

  // ===============================================================
  // Access
  // ===============================================================

  /** [rows, columns] */
  get shape(): [number, number] {
    return [this.rows.length, this.columns.length];
  }

  get length(): number {
    return this.rows.length;
  }

  /**
   * All values of one column, in row order.
   */
  column(ref: ColumnRef): Scalar[] {
    const idx = columnIndex(this.columns, ref);
    return this.rows.map((row) => row[idx] ?? null);
  }

  /**
   * Value at a row position and column.
   */
  at(position: number, ref: ColumnRef): Scalar {
    const idx = columnIndex(this.columns, ref);
    return this.rows[position]?.[idx] ?? null;
  }

  *iterrows(): IterableIterator<RowEntry> {
    for (let i = 0; i < this.rows.length; i++) {
      const row = this.rows[i];
      if (row !== undefined) {
        yield [this.index[i] ?? i, row];
      }
    }
  }

  /**
   * Sub-table of the rows whose id is in `rowIds`, in table order.
   */
  select(rowIds: Iterable<RowId>): DataTable {
    const wanted = new Set<string>();
    for (const id of rowIds) {
      wanted.add(keyOf(id));
    }
    const rows: Row[] = [];
    const index: RowId[] = [];
    for (const [id, row] of this.iterrows()) {
      if (wanted.has(keyOf(id))) {
        rows.push(row);
        index.push(id);
      }
    }
    return new DataTable(this.columns, rows, index);
  }

  head(n = 10): DataTable {
    return new DataTable(this.columns, this.rows.slice(0, n), this.index.slice(0, n));
  }

  /**
   * Rows as objects keyed by column name.
   */
  toRecords(): Record<string, Scalar>[] {
    return this.rows.map((row) => {
      const record: Record<string, Scalar> = {};
      this.columns.forEach((name, i) => {
        record[name] = row[i] ?? null;
      });
      return record;
    });
  }

  // ===============================================================
  // Display
  // ===============================================================

  toString(options?: PrintOptions): string {
    return formatTable(this, options);
  }

  print(options?: PrintOptions): void {
    console.log(this.toString(options));
  }
}

function collectKeys(records: readonly Record<string, Scalar>[]): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      keys.add(key);
    }
  }
  return [...keys];
}
