import { DataError, UnpreparedFunctionError } from '../errors';
import type { Value } from '../types/row';
import { toNumber } from '../utils/numeric';
import { type ErrorPolicy, ValueFunction, applyPolicy } from './base';

export interface NormalizeOptions {
  /** Policy for non-numeric values (default: 'raise') */
  onError?: ErrorPolicy;
}

/**
 * Base for normalizers that need statistics over all numeric values.
 * Non-numeric values are ignored while preparing.
 */
export abstract class Normalizer extends ValueFunction {
  readonly onError: ErrorPolicy;

  constructor(options: NormalizeOptions = {}) {
    super();
    this.onError = options.onError ?? 'raise';
  }

  protected abstract scale(value: number): number;

  protected abstract withStatistics(values: readonly number[]): Normalizer;

  override prepare(values: readonly Value[]): Normalizer {
    const numbers: number[] = [];
    for (const value of values) {
      const n = toNumber(value);
      if (n !== undefined) numbers.push(n);
    }
    return this.withStatistics(numbers);
  }

  eval(value: Value): Value {
    if (!this.isPrepared()) {
      throw new UnpreparedFunctionError(this.name);
    }
    const n = toNumber(value);
    if (n === undefined) {
      return applyPolicy(this.onError, value, new DataError(value, `${this.name}: ${JSON.stringify(value)} is not a number`));
    }
    return this.scale(n);
  }
}

/**
 * Scale values to [0, 1] using the minimum and maximum seen in `prepare`.
 * When all values are equal the result is 0.
 */
export class MinMaxScale extends Normalizer {
  private readonly minimum?: number;
  private readonly maximum?: number;

  constructor(options: NormalizeOptions = {}, minimum?: number, maximum?: number) {
    super(options);
    this.minimum = minimum;
    this.maximum = maximum;
  }

  get name(): string {
    return 'minMaxScale';
  }

  override isPrepared(): boolean {
    return this.minimum !== undefined && this.maximum !== undefined;
  }

  protected withStatistics(values: readonly number[]): MinMaxScale {
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (const v of values) {
      if (v < min) min = v;
      if (v > max) max = v;
    }
    if (values.length === 0) {
      min = 0;
      max = 0;
    }
    return new MinMaxScale({ onError: this.onError }, min, max);
  }

  protected scale(value: number): number {
    const min = this.minimum ?? 0;
    const max = this.maximum ?? 0;
    return max === min ? 0 : (value - min) / (max - min);
  }
}

/**
 * Divide values by the largest absolute value seen in `prepare`.
 * A zero maximum yields 0.
 */
export class MaxAbsScale extends Normalizer {
  private readonly maximum?: number;

  constructor(options: NormalizeOptions = {}, maximum?: number) {
    super(options);
    this.maximum = maximum;
  }

  get name(): string {
    return 'maxAbsScale';
  }

  override isPrepared(): boolean {
    return this.maximum !== undefined;
  }

  protected withStatistics(values: readonly number[]): MaxAbsScale {
    let max = 0;
    for (const v of values) {
      max = Math.max(max, Math.abs(v));
    }
    return new MaxAbsScale({ onError: this.onError }, max);
  }

  protected scale(value: number): number {
    return this.maximum ? value / this.maximum : 0;
  }
}

/**
 * Divide values by the sum of all values seen in `prepare`.
 * A zero sum yields 0.
 */
export class DivideByTotal extends Normalizer {
  private readonly total?: number;

  constructor(options: NormalizeOptions = {}, total?: number) {
    super(options);
    this.total = total;
  }

  get name(): string {
    return 'divideByTotal';
  }

  override isPrepared(): boolean {
    return this.total !== undefined;
  }

  protected withStatistics(values: readonly number[]): DivideByTotal {
    return new DivideByTotal(
      { onError: this.onError },
      values.reduce((sum, v) => sum + v, 0),
    );
  }

  protected scale(value: number): number {
    return this.total ? value / this.total : 0;
  }
}
