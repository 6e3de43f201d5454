import { DataError, UnpreparedFunctionError } from '../errors';
import type { RowStream } from '../io/source';
import { type ColumnRef, type Row, type Scalar, type Value, isTuple } from '../types/row';
import { asColumnList } from '../types/schema';
import { type EvalFunction, type RowValueFunction, ValueFunction } from './base';
import { Col, type Cols, col } from './column';

export interface EvalOptions {
  /**
   * Apply the function to each column separately and return a tuple of
   * results. Only meaningful for several columns.
   */
  unary?: boolean;
  /** Name used for result columns (default: the function's name) */
  name?: string;
}

interface PreparedEval {
  producer: Col | Cols;
  columns: Col[];
  funcs: ValueFunction[];
}

/**
 * Apply a callable or a value function to the values of one or more columns.
 *
 * A plain callable receives the column values as arguments. A value function
 * receives the scalar (one column) or the tuple (several columns). Unless it
 * is already prepared, it is first prepared over all those values, in one
 * pass over the dataset. In unary mode every column is handled on its own,
 * with a separately prepared value function per column.
 *
 * @example
 * ```ts
 * new Eval(['first', 'last'], (a, b) => `${a} ${b}`);
 * new Eval('price', new MinMaxScale());
 * ```
 */
export class Eval implements EvalFunction {
  readonly columns: readonly ColumnRef[];
  readonly func: RowValueFunction | ValueFunction;
  readonly unary: boolean;
  private readonly label?: string;
  private readonly prepared?: PreparedEval;

  constructor(
    columns: ColumnRef | readonly ColumnRef[],
    func: RowValueFunction | ValueFunction,
    options: EvalOptions = {},
    prepared?: PreparedEval,
  ) {
    this.columns = asColumnList(columns);
    this.func = func;
    this.unary = options.unary ?? false;
    this.label = options.name;
    this.prepared = prepared;
  }

  get name(): string {
    if (this.label !== undefined) return this.label;
    return this.func instanceof ValueFunction ? this.func.name : this.func.name || 'eval';
  }

  prepare(ds: RowStream): Eval {
    const producer = col(this.columns).prepare(ds);
    const columns = this.columns.map((ref) => new Col(ref).prepare(ds));
    const funcs: ValueFunction[] = [];

    // Functions that are already prepared (lookups, plain mappings) need no pass
    const func = this.func;
    if (func instanceof ValueFunction && !func.isPrepared()) {
      if (this.unary) {
        const values: Value[][] = columns.map(() => []);
        for (const [, row] of ds.rows()) {
          columns.forEach((c, i) => values[i]?.push(c.eval(row)));
        }
        for (const list of values) {
          funcs.push(func.prepare(list));
        }
      } else {
        const values: Value[] = [];
        for (const [, row] of ds.rows()) {
          values.push(producer.eval(row));
        }
        funcs.push(func.prepare(values));
      }
    }

    return new Eval(this.columns, this.func, { unary: this.unary, name: this.label }, {
      producer,
      columns,
      funcs,
    });
  }

  eval(row: Row): Value {
    const prepared = this.prepared;
    if (!prepared) {
      throw new UnpreparedFunctionError(`Eval(${this.name})`);
    }
    const func = this.func;

    if (this.unary) {
      return prepared.columns.map((c, i) => {
        const value = c.eval(row);
        return toScalar(func instanceof ValueFunction ? applyValue(prepared.funcs[i], func, value) : func(value));
      });
    }

    const value = prepared.producer.eval(row);
    if (func instanceof ValueFunction) {
      return applyValue(prepared.funcs[0], func, value);
    }
    return isTuple(value) ? func(...value) : func(value);
  }
}

function applyValue(prepared: ValueFunction | undefined, original: ValueFunction, value: Value): Value {
  return (prepared ?? original).eval(value);
}

// Unary results fill one column each
function toScalar(value: Value): Scalar {
  if (isTuple(value)) {
    if (value.length === 1) return value[0] ?? null;
    throw new DataError(value, `a per-column function returned ${value.length} values instead of one`);
  }
  return value;
}
