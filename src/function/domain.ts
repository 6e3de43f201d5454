import type { RowStream } from '../io/source';
import { type Row, type Value, isTuple } from '../types/row';
import { keyOf } from '../utils/key';
import type { EvalFunction } from './base';

export interface DomainOptions {
  /** Compare strings case-insensitively (default: false) */
  ignoreCase?: boolean;
}

function normalize(value: Value, ignoreCase: boolean): string {
  if (!ignoreCase) return keyOf(value);
  if (typeof value === 'string') return keyOf(value.toLowerCase());
  if (isTuple(value)) return keyOf(value.map((v) => (typeof v === 'string' ? v.toLowerCase() : v)));
  return keyOf(value);
}

/**
 * True when the operand's value belongs to a fixed domain of values.
 * Tuples match tuples element-wise.
 */
export class IsIn implements EvalFunction<boolean> {
  readonly operand: EvalFunction;
  readonly domain: readonly Value[];
  readonly ignoreCase: boolean;
  protected readonly keys: ReadonlySet<string>;

  constructor(operand: EvalFunction, domain: Iterable<Value>, options: DomainOptions = {}) {
    this.operand = operand;
    this.domain = [...domain];
    this.ignoreCase = options.ignoreCase ?? false;
    this.keys = new Set(this.domain.map((v) => normalize(v, this.ignoreCase)));
  }

  get name(): string {
    return 'isIn';
  }

  prepare(ds: RowStream): IsIn {
    return new IsIn(this.operand.prepare(ds), this.domain, { ignoreCase: this.ignoreCase });
  }

  eval(row: Row): boolean {
    return this.keys.has(normalize(this.operand.eval(row), this.ignoreCase));
  }
}

export class IsNotIn extends IsIn {
  override get name(): string {
    return 'isNotIn';
  }

  override prepare(ds: RowStream): IsNotIn {
    return new IsNotIn(this.operand.prepare(ds), this.domain, { ignoreCase: this.ignoreCase });
  }

  override eval(row: Row): boolean {
    return !super.eval(row);
  }
}
