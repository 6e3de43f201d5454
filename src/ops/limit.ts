import { ConfigurationError, LimitReachedSignal } from '../errors';
import type { RowStream } from '../io/source';
import type { Row, RowId, Schema } from '../types/row';
import { type StreamConsumer, ProducingConsumer } from './consumer';
import { type PreparedStage, ProducingOperator } from './operator';

/**
 * Passes on the first `n` rows. The row after them raises the limit
 * signal, which tells the driver to stop reading the source.
 */
export class Limit extends ProducingOperator {
  readonly name = 'limit';
  readonly limit: number;

  constructor(limit: number) {
    super();
    if (!Number.isInteger(limit) || limit < 0) {
      throw new ConfigurationError(`limit must be a non-negative integer, got ${limit}`);
    }
    this.limit = limit;
  }

  protected prepareStage(ds: RowStream): PreparedStage {
    return {
      columns: ds.columns,
      consumer: (downstream) => new LimitConsumer(ds.columns, downstream, this.limit),
    };
  }
}

export class LimitConsumer extends ProducingConsumer {
  readonly limit: number;
  private count = 0;

  constructor(columns: Schema, downstream: StreamConsumer | null, limit: number) {
    super(columns, downstream);
    this.limit = limit;
  }

  /** Rows passed on so far. */
  get rows(): number {
    return this.count;
  }

  protected handle(_rowId: RowId, row: Row): Row {
    if (this.count >= this.limit) {
      throw new LimitReachedSignal(this.limit);
    }
    this.count++;
    return row;
  }
}
