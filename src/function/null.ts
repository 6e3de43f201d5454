import { UnpreparedFunctionError } from '../errors';
import type { RowStream } from '../io/source';
import type { ColumnRef, Row, Scalar } from '../types/row';
import { asColumnList } from '../types/schema';
import type { EvalFunction } from './base';
import { Col } from './column';

/** Whether every column must satisfy the check, or at least one. */
export type ColumnQuantifier = 'all' | 'any';

export interface EmptyOptions {
  /** Treat whitespace-only strings as empty (default: false) */
  ignoreWhitespace?: boolean;
  /** How several columns combine (default: 'all') */
  quantifier?: ColumnQuantifier;
}

export function isEmptyValue(value: Scalar, ignoreWhitespace = false): boolean {
  if (value === null) return true;
  if (typeof value !== 'string') return false;
  return ignoreWhitespace ? value.trim() === '' : value === '';
}

/**
 * Base for per-column checks that combine over several columns.
 */
export abstract class ColumnCheck implements EvalFunction<boolean> {
  readonly refs: readonly ColumnRef[];
  readonly quantifier: ColumnQuantifier;
  protected readonly columns?: readonly Col[];

  constructor(refs: ColumnRef | readonly ColumnRef[], quantifier: ColumnQuantifier, columns?: readonly Col[]) {
    this.refs = asColumnList(refs);
    this.quantifier = quantifier;
    this.columns = columns;
  }

  abstract get name(): string;

  abstract prepare(ds: RowStream): ColumnCheck;

  protected abstract check(value: Scalar): boolean;

  protected resolve(ds: RowStream): Col[] {
    return this.refs.map((ref) => new Col(ref).prepare(ds));
  }

  eval(row: Row): boolean {
    const columns = this.columns;
    if (!columns) {
      throw new UnpreparedFunctionError(this.name);
    }
    const test = (c: Col): boolean => this.check(c.eval(row));
    return this.quantifier === 'all' ? columns.every(test) : columns.some(test);
  }
}

/**
 * True for `null` and empty strings.
 */
export class IsEmpty extends ColumnCheck {
  readonly ignoreWhitespace: boolean;

  constructor(refs: ColumnRef | readonly ColumnRef[], options: EmptyOptions = {}, columns?: readonly Col[]) {
    super(refs, options.quantifier ?? 'all', columns);
    this.ignoreWhitespace = options.ignoreWhitespace ?? false;
  }

  get name(): string {
    return 'isEmpty';
  }

  prepare(ds: RowStream): IsEmpty {
    return new IsEmpty(this.refs, this.options(), this.resolve(ds));
  }

  protected check(value: Scalar): boolean {
    return isEmptyValue(value, this.ignoreWhitespace);
  }

  protected options(): EmptyOptions {
    return { ignoreWhitespace: this.ignoreWhitespace, quantifier: this.quantifier };
  }
}

export class IsNotEmpty extends IsEmpty {
  override get name(): string {
    return 'isNotEmpty';
  }

  override prepare(ds: RowStream): IsNotEmpty {
    return new IsNotEmpty(this.refs, this.options(), this.resolve(ds));
  }

  protected override check(value: Scalar): boolean {
    return !isEmptyValue(value, this.ignoreWhitespace);
  }
}
