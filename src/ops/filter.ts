import { getLogger } from '../core/logging';
import { PredicateTypeError } from '../errors';
import type { EvalFunction } from '../function/base';
import type { RowStream } from '../io/source';
import { type Row, type RowId, type Schema, type Value, isTuple } from '../types/row';
import { valuesEqual } from '../utils/key';
import { type StreamConsumer, ProducingConsumer } from './consumer';
import { type PreparedStage, ProducingOperator } from './operator';

export interface FilterOptions {
  /** Predicate result that selects a row (default: true) */
  truthValue?: Value;
  /** Keep the rows that do not match instead (default: false) */
  negated?: boolean;
}

function kindOf(value: Value): string {
  if (value === null) return 'null';
  if (isTuple(value)) return 'tuple';
  return typeof value;
}

/**
 * Keeps the rows for which the predicate returns the truth value.
 *
 * A predicate result of another type than the truth value (other than
 * `null`) means the two can never match and fails the run. A `null` truth
 * value keeps the rows whose predicate returns `null`. A run that sees rows
 * but matches none logs a warning.
 */
export class Filter extends ProducingOperator {
  readonly name = 'filter';
  readonly predicate: EvalFunction;
  readonly truthValue: Value;
  readonly negated: boolean;

  constructor(predicate: EvalFunction, options: FilterOptions = {}) {
    super();
    this.predicate = predicate;
    this.truthValue = options.truthValue === undefined ? true : options.truthValue;
    this.negated = options.negated ?? false;
  }

  protected prepareStage(ds: RowStream): PreparedStage {
    const predicate = this.predicate.prepare(ds);
    return {
      columns: ds.columns,
      consumer: (downstream) =>
        new FilterConsumer(ds.columns, downstream, predicate, this.truthValue, this.negated),
    };
  }
}

export class FilterConsumer extends ProducingConsumer {
  private readonly predicate: EvalFunction;
  private readonly truthValue: Value;
  private readonly truthKind: string;
  private readonly negated: boolean;
  private seen = 0;
  private matched = 0;

  constructor(
    columns: Schema,
    downstream: StreamConsumer | null,
    predicate: EvalFunction,
    truthValue: Value,
    negated: boolean,
  ) {
    super(columns, downstream);
    this.predicate = predicate;
    this.truthValue = truthValue;
    this.truthKind = kindOf(truthValue);
    this.negated = negated;
  }

  protected handle(_rowId: RowId, row: Row): Row | null {
    this.seen++;
    const result = this.predicate.eval(row);
    const kind = kindOf(result);
    if (kind !== this.truthKind && kind !== 'null' && this.truthKind !== 'null') {
      throw new PredicateTypeError(this.predicate.name, this.truthValue, result);
    }
    const match = valuesEqual(result, this.truthValue);
    if (match) this.matched++;
    return match !== this.negated ? row : null;
  }

  protected override finish(): unknown {
    if (this.seen > 0 && this.matched === 0) {
      getLogger().warn('filter predicate never returned the truth value', {
        operator: 'filter',
        predicate: this.predicate.name,
        rows: this.seen,
        truthValue: JSON.stringify(this.truthValue),
      });
    }
    return super.finish();
  }
}
