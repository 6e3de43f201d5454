import type { DataError } from '../errors';
import type { RowStream } from '../io/source';
import type { Row, Scalar, Value } from '../types/row';

/**
 * What a function does with a value it cannot process:
 * - `'raise'` throws a `DataError`
 * - `'pass'` returns the input value unchanged
 * - `{ default: v }` returns `v`
 */
export type ErrorPolicy = 'raise' | 'pass' | { readonly default: Value };

/**
 * A computation over a row, with a one-time preparation pass.
 *
 * `prepare` receives the dataset stream that reaches the function's stage
 * and returns a prepared instance; the receiver itself is never modified, so
 * an unprepared function can be shared by any number of pipelines. Only the
 * returned instance may be evaluated.
 */
export interface EvalFunction<T extends Value = Value> {
  readonly name: string;
  eval(row: Row): T;
  prepare(ds: RowStream): EvalFunction<T>;
}

/**
 * A computation over a single value (or a tuple of values).
 *
 * Functions that depend on statistics of all values (normalizers, frequency
 * features) compute them in `prepare`, which returns a new instance.
 */
export abstract class ValueFunction {
  abstract readonly name: string;

  abstract eval(value: Value): Value;

  /**
   * Prepare against all values the function will see. The default needs no
   * preparation.
   */
  prepare(_values: readonly Value[]): ValueFunction {
    return this;
  }

  /** Whether `eval` can be called on this instance. */
  isPrepared(): boolean {
    return true;
  }
}

/** Plain callable used by `Eval` and by updates. */
export type RowValueFunction = (...values: Scalar[]) => Value;

export function isEvalFunction(value: unknown): value is EvalFunction {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof ValueFunction) &&
    'eval' in value &&
    typeof value.eval === 'function' &&
    'prepare' in value &&
    typeof value.prepare === 'function'
  );
}

/**
 * Apply an error policy to a value that failed.
 */
export function applyPolicy(policy: ErrorPolicy, input: Value, error: DataError): Value {
  if (policy === 'raise') {
    throw error;
  }
  if (policy === 'pass') {
    return input;
  }
  return policy.default;
}
