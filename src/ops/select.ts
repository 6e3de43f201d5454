import { ConfigurationError } from '../errors';
import type { RowStream } from '../io/source';
import type { ColumnRef, Row, RowId, Schema } from '../types/row';
import { asColumnList, assertUniqueColumns, columnIndexes } from '../types/schema';
import { type StreamConsumer, ProducingConsumer } from './consumer';
import { type PreparedStage, ProducingOperator } from './operator';

/**
 * Narrows and reorders rows to the given columns, optionally renaming them.
 */
export class Select extends ProducingOperator {
  readonly name = 'select';
  readonly columns: readonly ColumnRef[];
  readonly names?: readonly string[];

  constructor(columns: ColumnRef | readonly ColumnRef[], names?: readonly string[]) {
    super();
    this.columns = asColumnList(columns);
    if (names !== undefined && names.length !== this.columns.length) {
      throw new ConfigurationError(
        `${names.length} names given for ${this.columns.length} selected columns`,
        'pass one name per selected column',
      );
    }
    this.names = names;
  }

  protected prepareStage(ds: RowStream): PreparedStage {
    const positions = columnIndexes(ds.columns, this.columns);
    const columns = this.names ? [...this.names] : positions.map((i) => ds.columns[i] ?? String(i));
    assertUniqueColumns(columns);
    return {
      columns,
      consumer: (downstream) => new SelectConsumer(columns, downstream, positions),
    };
  }
}

/**
 * Builds each output row from fixed input positions.
 */
export class SelectConsumer extends ProducingConsumer {
  readonly positions: readonly number[];

  constructor(columns: Schema, downstream: StreamConsumer | null, positions: readonly number[]) {
    super(columns, downstream);
    this.positions = positions;
  }

  protected handle(_rowId: RowId, row: Row): Row {
    return this.positions.map((i) => row[i] ?? null);
  }
}

/**
 * Changes column names; rows pass through unchanged.
 */
export class Rename extends ProducingOperator {
  readonly name = 'rename';
  readonly columns: readonly ColumnRef[];
  readonly names: readonly string[];

  constructor(columns: ColumnRef | readonly ColumnRef[], names: string | readonly string[]) {
    super();
    this.columns = asColumnList(columns);
    this.names = typeof names === 'string' ? [names] : [...names];
    if (this.names.length !== this.columns.length) {
      throw new ConfigurationError(
        `${this.names.length} names given for ${this.columns.length} renamed columns`,
        'pass one new name per column',
      );
    }
  }

  protected prepareStage(ds: RowStream): PreparedStage {
    const columns = [...ds.columns];
    columnIndexes(ds.columns, this.columns).forEach((pos, i) => {
      columns[pos] = this.names[i] ?? columns[pos] ?? '';
    });
    assertUniqueColumns(columns);
    return {
      columns,
      consumer: (downstream) => new PassThroughConsumer(columns, downstream),
    };
  }
}

export class PassThroughConsumer extends ProducingConsumer {
  protected handle(_rowId: RowId, row: Row): Row {
    return row;
  }
}
