import type { RowStream } from '../io/source';
import type { Row, Value } from '../types/row';
import { type EvalFunction, type ErrorPolicy } from './base';
import { asFunction } from './constant';

/**
 * Base for functions over two operands. Operands that are not evaluation
 * functions are treated as constants.
 */
export abstract class BinaryFunction implements EvalFunction {
  readonly lhs: EvalFunction;
  readonly rhs: EvalFunction;
  readonly onError: ErrorPolicy;

  constructor(lhs: EvalFunction | Value, rhs: EvalFunction | Value, onError: ErrorPolicy) {
    this.lhs = asFunction(lhs);
    this.rhs = asFunction(rhs);
    this.onError = onError;
  }

  abstract get name(): string;

  /** Build the same function over different operands. */
  protected abstract withOperands(lhs: EvalFunction, rhs: EvalFunction): BinaryFunction;

  protected abstract compute(lhs: Value, rhs: Value): Value;

  prepare(ds: RowStream): BinaryFunction {
    const lhs = this.lhs.prepare(ds);
    const rhs = this.rhs.prepare(ds);
    return this.withOperands(lhs, rhs);
  }

  eval(row: Row): Value {
    return this.compute(this.lhs.eval(row), this.rhs.eval(row));
  }
}
