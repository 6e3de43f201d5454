import { UnpreparedFunctionError } from '../errors';
import type { RowStream } from '../io/source';
import type { ColumnRef, Row, Scalar, Tuple } from '../types/row';
import { asColumnList, columnIndex } from '../types/schema';
import type { EvalFunction } from './base';

/**
 * Value of a single column. The column position is resolved in `prepare`.
 */
export class Col implements EvalFunction<Scalar> {
  readonly ref: ColumnRef;
  private readonly index?: number;

  constructor(ref: ColumnRef, index?: number) {
    this.ref = ref;
    this.index = index;
  }

  get name(): string {
    return String(this.ref);
  }

  prepare(ds: RowStream): Col {
    return new Col(this.ref, columnIndex(ds.columns, this.ref));
  }

  eval(row: Row): Scalar {
    if (this.index === undefined) {
      throw new UnpreparedFunctionError(`Col(${this.name})`);
    }
    return row[this.index] ?? null;
  }
}

/**
 * Values of several columns as a tuple, in the given order.
 */
export class Cols implements EvalFunction<Tuple> {
  readonly refs: readonly ColumnRef[];
  private readonly indexes?: readonly number[];

  constructor(refs: readonly ColumnRef[], indexes?: readonly number[]) {
    this.refs = [...refs];
    this.indexes = indexes;
  }

  get name(): string {
    return this.refs.map(String).join(',');
  }

  prepare(ds: RowStream): Cols {
    return new Cols(
      this.refs,
      this.refs.map((ref) => columnIndex(ds.columns, ref)),
    );
  }

  eval(row: Row): Tuple {
    const indexes = this.indexes;
    if (indexes === undefined) {
      throw new UnpreparedFunctionError(`Cols(${this.name})`);
    }
    return indexes.map((i) => row[i] ?? null);
  }
}

/**
 * Column accessor for one or more columns: a single reference yields the
 * scalar value, several references yield a tuple.
 */
export function col(refs: ColumnRef | readonly ColumnRef[]): Col | Cols {
  const list = asColumnList(refs);
  const [first] = list;
  if (list.length === 1 && first !== undefined) {
    return new Col(first);
  }
  return new Cols(list);
}
