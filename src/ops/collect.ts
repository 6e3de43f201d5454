import { DataTable } from '../data/table';
import type { ColumnRef, Row, RowEntry, RowId, Schema, Value } from '../types/row';
import { asColumnList, columnIndexes } from '../types/schema';
import { Counter } from '../utils/counter';
import { BaseConsumer, type StreamConsumer } from './consumer';
import { CollectorOperator } from './operator';

// =============================================================================
// DataFrame
// =============================================================================

/**
 * Collects all rows, with their ids as index, into a `DataTable`.
 */
export class DataFrame extends CollectorOperator<DataTable> {
  readonly name = 'dataframe';

  protected createCollector(schema: Schema): DataFrameConsumer {
    return new DataFrameConsumer(schema);
  }
}

export class DataFrameConsumer extends BaseConsumer<DataTable> {
  private readonly rows: Row[] = [];
  private readonly index: RowId[] = [];

  consume(rowId: RowId, row: Row): Row {
    this.rows.push(row);
    this.index.push(rowId);
    return row;
  }

  protected finish(): DataTable {
    return DataTable.from(this.columns, this.rows, this.index);
  }
}

// =============================================================================
// RowCount
// =============================================================================

export class RowCount extends CollectorOperator<number> {
  readonly name = 'count';

  protected createCollector(schema: Schema): RowCountConsumer {
    return new RowCountConsumer(schema);
  }
}

export class RowCountConsumer extends BaseConsumer<number> {
  private count = 0;

  consume(_rowId: RowId, row: Row): Row {
    this.count++;
    return row;
  }

  protected finish(): number {
    return this.count;
  }
}

// =============================================================================
// Distinct
// =============================================================================

/**
 * Counts distinct values. The key of a row is the single value for one
 * column and the tuple of values for several (default: all columns).
 */
export class Distinct extends CollectorOperator<Counter> {
  readonly name = 'distinct';
  readonly columns?: readonly ColumnRef[];

  constructor(columns?: ColumnRef | readonly ColumnRef[]) {
    super();
    this.columns = columns === undefined ? undefined : asColumnList(columns);
  }

  protected createCollector(schema: Schema): DistinctConsumer {
    const positions = this.columns ? columnIndexes(schema, this.columns) : schema.map((_, i) => i);
    return new DistinctConsumer(schema, positions);
  }
}

export class DistinctConsumer extends BaseConsumer<Counter> {
  private readonly positions: readonly number[];
  private readonly counter = new Counter();

  constructor(columns: Schema, positions: readonly number[]) {
    super(columns);
    this.positions = positions;
  }

  consume(_rowId: RowId, row: Row): Row {
    const values = this.positions.map((i) => row[i] ?? null);
    const key: Value = values.length === 1 ? (values[0] ?? null) : values;
    this.counter.add(key);
    return row;
  }

  protected finish(): Counter {
    return this.counter;
  }
}

// =============================================================================
// Collector
// =============================================================================

/**
 * Collects `[rowId, row]` pairs in stream order.
 */
export class Collector extends CollectorOperator<RowEntry[]> {
  readonly name = 'collector';

  protected createCollector(schema: Schema): CollectorConsumer {
    return new CollectorConsumer(schema);
  }
}

export class CollectorConsumer extends BaseConsumer<RowEntry[]> {
  private readonly entries: RowEntry[] = [];

  consume(rowId: RowId, row: Row): Row {
    this.entries.push([rowId, row]);
    return row;
  }

  protected finish(): RowEntry[] {
    return this.entries;
  }
}

// =============================================================================
// Collect
// =============================================================================

/**
 * Terminal stage built from any consumer factory.
 *
 * @example
 * ```ts
 * const op = new Collect((columns) => new MyConsumer(columns));
 * stream(file).stream(op);
 * ```
 */
export class Collect<R = unknown> extends CollectorOperator<R> {
  readonly name = 'collect';
  private readonly factory: (schema: Schema) => StreamConsumer<R>;

  constructor(factory: (schema: Schema) => StreamConsumer<R>) {
    super();
    this.factory = factory;
  }

  protected createCollector(schema: Schema): StreamConsumer<R> {
    return this.factory(schema);
  }
}
