import type { DataTable } from '../data/table';
import type { RowEntry, Schema } from '../types/row';

/**
 * A dataset that can be streamed any number of times.
 *
 * Every call to `rows()` starts a new, finite pass over the data. Evaluation
 * functions receive a `RowStream` in `prepare()` and may read it fully.
 */
export interface RowStream {
  readonly columns: Schema;
  rows(): Iterable<RowEntry>;
}

/**
 * Row source over an in-memory table.
 */
export class TableSource implements RowStream {
  readonly table: DataTable;

  constructor(table: DataTable) {
    this.table = table;
  }

  get columns(): Schema {
    return this.table.columns;
  }

  rows(): Iterable<RowEntry> {
    return this.table.iterrows();
  }
}
