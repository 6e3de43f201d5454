import { ConfigurationError, DataError } from '../errors';
import type { EvalFunction } from '../function/base';
import { Const, asFunction } from '../function/constant';
import type { RowStream } from '../io/source';
import { type Row, type RowId, type Scalar, type Schema, type Value, isScalar, isTuple } from '../types/row';
import { assertUniqueColumns } from '../types/schema';
import { type StreamConsumer, ProducingConsumer } from './consumer';
import { type PreparedStage, ProducingOperator } from './operator';

/**
 * Split a function result into exactly `width` cell values.
 */
export function spreadValue(value: Value, width: number, target: string): Scalar[] {
  if (isTuple(value)) {
    if (value.length !== width) {
      throw new DataError(value, `${target}: expected ${width} values, got ${value.length}`);
    }
    return [...value];
  }
  if (width !== 1) {
    throw new DataError(value, `${target}: expected ${width} values, got a single value`);
  }
  return [value];
}

/**
 * Adds new columns at a position (default: after the last column), filled
 * by a constant or an evaluation function. A constant fills every new
 * column when several are inserted.
 */
export class Insert extends ProducingOperator {
  readonly name = 'insert';
  readonly names: readonly string[];
  readonly values: EvalFunction;
  readonly position?: number;

  constructor(names: string | readonly string[], values: EvalFunction | Value, position?: number) {
    super();
    this.names = typeof names === 'string' ? [names] : [...names];
    if (this.names.length === 0) {
      throw new ConfigurationError('insert needs at least one column name');
    }
    if (position !== undefined && (!Number.isInteger(position) || position < 0)) {
      throw new ConfigurationError(`insert position must be a non-negative integer, got ${position}`);
    }
    const value = values;
    this.values =
      this.names.length > 1 && isScalar(value) ? new Const(this.names.map(() => value)) : asFunction(value);
    this.position = position;
  }

  protected prepareStage(ds: RowStream): PreparedStage {
    const at = Math.min(this.position ?? ds.columns.length, ds.columns.length);
    const columns = [...ds.columns.slice(0, at), ...this.names, ...ds.columns.slice(at)];
    assertUniqueColumns(columns);
    const values = this.values.prepare(ds);
    return {
      columns,
      consumer: (downstream) => new InsertConsumer(columns, downstream, values, at, this.names.length),
    };
  }
}

export class InsertConsumer extends ProducingConsumer {
  private readonly values: EvalFunction;
  private readonly at: number;
  private readonly width: number;

  constructor(columns: Schema, downstream: StreamConsumer | null, values: EvalFunction, at: number, width: number) {
    super(columns, downstream);
    this.values = values;
    this.at = at;
    this.width = width;
  }

  protected handle(_rowId: RowId, row: Row): Row {
    const inserted = spreadValue(this.values.eval(row), this.width, 'insert');
    return [...row.slice(0, this.at), ...inserted, ...row.slice(this.at)];
  }
}
