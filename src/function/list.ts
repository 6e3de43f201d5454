import { DataError } from '../errors';
import type { RowStream } from '../io/source';
import { type Row, type Scalar, type Value, isTuple } from '../types/row';
import { type ErrorPolicy, type EvalFunction, applyPolicy } from './base';

export interface GetOptions {
  /** Policy for positions outside the value (default: `null`) */
  onError?: ErrorPolicy;
}

/**
 * Element(s) of a multi-column value. A scalar counts as a one-element
 * tuple. Several positions return a tuple.
 */
export class Get implements EvalFunction {
  readonly operand: EvalFunction;
  readonly positions: readonly number[];
  readonly onError: ErrorPolicy;

  constructor(operand: EvalFunction, positions: number | readonly number[], options: GetOptions = {}) {
    this.operand = operand;
    this.positions = typeof positions === 'number' ? [positions] : [...positions];
    this.onError = options.onError ?? { default: null };
  }

  get name(): string {
    return 'get';
  }

  prepare(ds: RowStream): Get {
    return new Get(this.operand.prepare(ds), this.positions, { onError: this.onError });
  }

  eval(row: Row): Value {
    const value = this.operand.eval(row);
    const list: readonly Scalar[] = isTuple(value) ? value : [value];
    const picked: Value[] = this.positions.map((pos) => {
      const item = list[pos];
      if (item === undefined) {
        return applyPolicy(this.onError, value, new DataError(value, `position ${pos} is outside a value of ${list.length} elements`));
      }
      return item;
    });
    if (picked.length === 1) {
      return picked[0] ?? null;
    }
    return picked.flat();
  }
}

/**
 * Tuple built from several operands. Tuple results are spliced in.
 */
export class ListOf implements EvalFunction {
  readonly operands: readonly EvalFunction[];

  constructor(...operands: EvalFunction[]) {
    this.operands = operands;
  }

  get name(): string {
    return 'list';
  }

  prepare(ds: RowStream): ListOf {
    return new ListOf(...this.operands.map((op) => op.prepare(ds)));
  }

  eval(row: Row): Value {
    return this.operands.map((op) => op.eval(row)).flat();
  }
}
