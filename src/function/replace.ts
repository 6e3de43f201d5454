import { ConfigurationError } from '../errors';
import type { RowStream } from '../io/source';
import type { Row, Value } from '../types/row';
import type { EvalFunction } from './base';
import { asFunction } from './constant';

/**
 * Conditional replacement: the `value` operand for rows where the predicate
 * is `true`, the `otherwise` operand for all other rows.
 *
 * Without `otherwise` the function is only usable in an update, which
 * fills in the current values of the updated columns.
 *
 * @example
 * ```ts
 * stream(file).update('state', new IfThenReplace(new Eq(col('state'), 'N.Y.'), 'NY'));
 * ```
 */
export class IfThenReplace implements EvalFunction {
  readonly predicate: EvalFunction;
  readonly value: EvalFunction;
  readonly otherwise?: EvalFunction;

  constructor(predicate: EvalFunction, value: EvalFunction | Value, otherwise?: EvalFunction | Value) {
    this.predicate = predicate;
    this.value = asFunction(value);
    this.otherwise = otherwise === undefined ? undefined : asFunction(otherwise);
  }

  get name(): string {
    return 'ifThenReplace';
  }

  get hasOtherwise(): boolean {
    return this.otherwise !== undefined;
  }

  /** Same replacement with a different fallback. */
  withOtherwise(otherwise: EvalFunction | Value): IfThenReplace {
    return new IfThenReplace(this.predicate, this.value, otherwise);
  }

  prepare(ds: RowStream): IfThenReplace {
    if (!this.otherwise) {
      throw new ConfigurationError(
        'IfThenReplace has no value for rows that do not match',
        'pass an otherwise operand, or use the function in an update',
      );
    }
    const predicate = this.predicate.prepare(ds);
    const value = this.value.prepare(ds);
    const otherwise = this.otherwise.prepare(ds);
    return new IfThenReplace(predicate, value, otherwise);
  }

  eval(row: Row): Value {
    if (this.predicate.eval(row) === true) {
      return this.value.eval(row);
    }
    if (!this.otherwise) {
      throw new ConfigurationError('IfThenReplace was evaluated without a fallback operand');
    }
    return this.otherwise.eval(row);
  }
}
