import { type Row, type Value, isScalar } from '../types/row';
import type { EvalFunction } from './base';

/**
 * Returns the same value for every row.
 */
export class Const<T extends Value = Value> implements EvalFunction<T> {
  readonly value: T;

  constructor(value: T) {
    this.value = value;
  }

  get name(): string {
    return 'const';
  }

  prepare(): Const<T> {
    return this;
  }

  eval(_row: Row): T {
    return this.value;
  }
}

/**
 * Use an evaluation function as is; wrap any other value in `Const`.
 */
export function asFunction(value: EvalFunction | Value): EvalFunction {
  if (isValue(value)) {
    return new Const(value);
  }
  return value;
}

export function isValue(value: unknown): value is Value {
  return isScalar(value) || (Array.isArray(value) && value.every(isScalar));
}
