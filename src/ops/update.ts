import { type UpdateSpec, getUpdateFunction } from '../function/update';
import type { EvalFunction } from '../function/base';
import type { RowStream } from '../io/source';
import type { ColumnRef, Row, RowId, Schema } from '../types/row';
import { asColumnList, columnIndexes } from '../types/schema';
import { type StreamConsumer, ProducingConsumer } from './consumer';
import { spreadValue } from './insert';
import { type PreparedStage, ProducingOperator } from './operator';

/**
 * Replaces the values of one or more columns with the result of a
 * function. Updating several columns needs a tuple of matching length.
 *
 * @example
 * ```ts
 * new Update('name', (v) => String(v).toUpperCase());
 * new Update(['lat', 'lon'], new Const([0, 0]));
 * ```
 */
export class Update extends ProducingOperator {
  readonly name = 'update';
  readonly columns: readonly ColumnRef[];
  readonly func: EvalFunction;

  constructor(columns: ColumnRef | readonly ColumnRef[], func: UpdateSpec) {
    super();
    this.columns = asColumnList(columns);
    this.func = getUpdateFunction(this.columns, func);
  }

  protected prepareStage(ds: RowStream): PreparedStage {
    const positions = columnIndexes(ds.columns, this.columns);
    const func = this.func.prepare(ds);
    return {
      columns: ds.columns,
      consumer: (downstream) => new UpdateConsumer(ds.columns, downstream, func, positions),
    };
  }
}

export class UpdateConsumer extends ProducingConsumer {
  private readonly func: EvalFunction;
  private readonly positions: readonly number[];

  constructor(columns: Schema, downstream: StreamConsumer | null, func: EvalFunction, positions: readonly number[]) {
    super(columns, downstream);
    this.func = func;
    this.positions = positions;
  }

  protected handle(_rowId: RowId, row: Row): Row {
    const values = spreadValue(this.func.eval(row), this.positions.length, 'update');
    const out = [...row];
    this.positions.forEach((pos, i) => {
      out[pos] = values[i] ?? null;
    });
    return out;
  }
}
