import type { RowStream } from '../io/source';
import type { ColumnRef, Scalar } from '../types/row';
import type { Col } from './column';
import { type ColumnQuantifier, ColumnCheck } from './null';

export interface MatchOptions {
  /** The whole value must match, not just a part of it (default: false) */
  fullMatch?: boolean;
  /** How several columns combine (default: 'all') */
  quantifier?: ColumnQuantifier;
}

function compile(pattern: string | RegExp, fullMatch: boolean): RegExp {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  // Stateful flags would make test() depend on the previous call
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  return new RegExp(fullMatch ? `^(?:${source})$` : source, flags);
}

/**
 * True when column values match a regular expression. `null` never
 * matches; numbers and booleans are matched as their string form.
 */
export class IsMatch extends ColumnCheck {
  readonly pattern: string | RegExp;
  readonly fullMatch: boolean;
  private readonly regex: RegExp;

  constructor(
    refs: ColumnRef | readonly ColumnRef[],
    pattern: string | RegExp,
    options: MatchOptions = {},
    columns?: readonly Col[],
  ) {
    super(refs, options.quantifier ?? 'all', columns);
    this.pattern = pattern;
    this.fullMatch = options.fullMatch ?? false;
    this.regex = compile(pattern, this.fullMatch);
  }

  get name(): string {
    return 'isMatch';
  }

  prepare(ds: RowStream): IsMatch {
    return new IsMatch(this.refs, this.pattern, this.options(), this.resolve(ds));
  }

  protected check(value: Scalar): boolean {
    return value !== null && this.regex.test(String(value));
  }

  protected options(): MatchOptions {
    return { fullMatch: this.fullMatch, quantifier: this.quantifier };
  }
}

/**
 * True when column values do not match. `null` counts as not matching.
 */
export class IsNotMatch extends IsMatch {
  override get name(): string {
    return 'isNotMatch';
  }

  override prepare(ds: RowStream): IsNotMatch {
    return new IsNotMatch(this.refs, this.pattern, this.options(), this.resolve(ds));
  }

  protected override check(value: Scalar): boolean {
    return !super.check(value);
  }
}
