import { DataError } from '../errors';
import type { Value } from '../types/row';
import { toNumber } from '../utils/numeric';
import { type ErrorPolicy, type EvalFunction, applyPolicy } from './base';
import { BinaryFunction } from './binary';

export interface ArithmeticOptions {
  /** Policy for non-numeric operands and division by zero (default: `0`) */
  onError?: ErrorPolicy;
}

const ARITHMETIC_DEFAULT: ErrorPolicy = { default: 0 };

type Operation = (a: number, b: number) => number;

/**
 * Arithmetic over two numeric operands. Numeric strings are parsed.
 */
export abstract class Arithmetic extends BinaryFunction {
  constructor(lhs: EvalFunction | Value, rhs: EvalFunction | Value, options: ArithmeticOptions = {}) {
    super(lhs, rhs, options.onError ?? ARITHMETIC_DEFAULT);
  }

  protected abstract readonly operation: Operation;

  protected compute(lhs: Value, rhs: Value): Value {
    const a = toNumber(lhs);
    const b = toNumber(rhs);
    if (a === undefined || b === undefined) {
      const bad = a === undefined ? lhs : rhs;
      return applyPolicy(this.onError, lhs, new DataError(bad, `${this.name}: ${JSON.stringify(bad)} is not a number`));
    }
    return this.operation(a, b);
  }
}

export abstract class Division extends Arithmetic {
  protected override compute(lhs: Value, rhs: Value): Value {
    if (toNumber(rhs) === 0) {
      return applyPolicy(this.onError, lhs, new DataError(rhs, `${this.name}: division by zero`));
    }
    return super.compute(lhs, rhs);
  }
}

export class Add extends Arithmetic {
  protected readonly operation: Operation = (a, b) => a + b;

  get name(): string {
    return 'add';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Add {
    return new Add(lhs, rhs, { onError: this.onError });
  }
}

export class Subtract extends Arithmetic {
  protected readonly operation: Operation = (a, b) => a - b;

  get name(): string {
    return 'subtract';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Subtract {
    return new Subtract(lhs, rhs, { onError: this.onError });
  }
}

export class Multiply extends Arithmetic {
  protected readonly operation: Operation = (a, b) => a * b;

  get name(): string {
    return 'multiply';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Multiply {
    return new Multiply(lhs, rhs, { onError: this.onError });
  }
}

export class Divide extends Division {
  protected readonly operation: Operation = (a, b) => a / b;

  get name(): string {
    return 'divide';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): Divide {
    return new Divide(lhs, rhs, { onError: this.onError });
  }
}

export class FloorDivide extends Division {
  protected readonly operation: Operation = (a, b) => Math.floor(a / b);

  get name(): string {
    return 'floorDivide';
  }

  protected withOperands(lhs: EvalFunction, rhs: EvalFunction): FloorDivide {
    return new FloorDivide(lhs, rhs, { onError: this.onError });
  }
}
