import { DataError } from '../errors';
import { type Value, isTuple } from '../types/row';
import { valuesEqual } from '../utils/key';
import { toNumber } from '../utils/numeric';
import { type ErrorPolicy, type EvalFunction, applyPolicy } from './base';
import { BinaryFunction } from './binary';

export interface EqualityOptions {
  /** Compare strings case-insensitively (default: false) */
  ignoreCase?: boolean;
}

export interface CompareOptions {
  /** Policy for operands that cannot be ordered (default: `false`) */
  onError?: ErrorPolicy;
}

const COMPARE_DEFAULT: ErrorPolicy = { default: false };

function fold(value: Value): Value {
  if (typeof value === 'string') return value.toLowerCase();
  if (isTuple(value)) return value.map((v) => (typeof v === 'string' ? v.toLowerCase() : v));
  return value;
}

/**
 * Structural equality of two operands. Values of different types are never
 * equal (`1` and `'1'` differ).
 */
export class Eq extends BinaryFunction {
  readonly ignoreCase: boolean;

  constructor(lhs: EvalFunction | Value, rhs: EvalFunction | Value, options: EqualityOptions = {}) {
    super(lhs, rhs, 'raise');
    this.ignoreCase = options.ignoreCase ?? false;
  }

  get name(): string {
    return 'eq';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Eq {
    return new Eq(lhs, rhs, { ignoreCase: this.ignoreCase });
  }

  protected compute(lhs: Value, rhs: Value): boolean {
    return this.ignoreCase ? valuesEqual(fold(lhs), fold(rhs)) : valuesEqual(lhs, rhs);
  }
}

export class Neq extends Eq {
  override get name(): string {
    return 'neq';
  }

  protected override withOperands(lhs: EvalFunction, rhs: EvalFunction): Neq {
    return new Neq(lhs, rhs, { ignoreCase: this.ignoreCase });
  }

  protected override compute(lhs: Value, rhs: Value): boolean {
    return !super.compute(lhs, rhs);
  }
}

type Ordering = (cmp: number) => boolean;

/**
 * Ordering comparison. Two numeric operands (numbers or numeric strings)
 * compare as numbers, two other strings compare by code units. Anything
 * else is handed to the error policy.
 */
export abstract class OrderComparison extends BinaryFunction {
  constructor(lhs: EvalFunction | Value, rhs: EvalFunction | Value, options: CompareOptions = {}) {
    super(lhs, rhs, options.onError ?? COMPARE_DEFAULT);
  }

  protected abstract readonly holds: Ordering;

  protected compute(lhs: Value, rhs: Value): Value {
    const a = toNumber(lhs);
    const b = toNumber(rhs);
    if (a !== undefined && b !== undefined) {
      return this.holds(a === b ? 0 : a < b ? -1 : 1);
    }
    if (typeof lhs === 'string' && typeof rhs === 'string') {
      return this.holds(lhs === rhs ? 0 : lhs < rhs ? -1 : 1);
    }
    return applyPolicy(
      this.onError,
      lhs,
      new DataError([lhs, rhs].flat(), `cannot compare ${JSON.stringify(lhs)} with ${JSON.stringify(rhs)}`),
    );
  }
}

export class Gt extends OrderComparison {
  protected readonly holds: Ordering = (cmp) => cmp > 0;

  get name(): string {
    return 'gt';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Gt {
    return new Gt(lhs, rhs, { onError: this.onError });
  }
}

export class Geq extends OrderComparison {
  protected readonly holds: Ordering = (cmp) => cmp >= 0;

  get name(): string {
    return 'geq';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Geq {
    return new Geq(lhs, rhs, { onError: this.onError });
  }
}

export class Lt extends OrderComparison {
  protected readonly holds: Ordering = (cmp) => cmp < 0;

  get name(): string {
    return 'lt';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Lt {
    return new Lt(lhs, rhs, { onError: this.onError });
  }
}

export class Leq extends OrderComparison {
  protected readonly holds: Ordering = (cmp) => cmp <= 0;

  get name(): string {
    return 'leq';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Leq {
    return new Leq(lhs, rhs, { onError: this.onError });
  }
}
