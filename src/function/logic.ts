import type { RowStream } from '../io/source';
import type { Row } from '../types/row';
import type { EvalFunction } from './base';

/**
 * Logical operators over predicates. A predicate result counts as true only
 * when it is the boolean `true`; evaluation stops at the first deciding
 * operand.
 */
export class And implements EvalFunction<boolean> {
  readonly predicates: readonly EvalFunction[];

  constructor(...predicates: EvalFunction[]) {
    this.predicates = predicates;
  }

  get name(): string {
    return 'and';
  }

  prepare(ds: RowStream): And {
    return new And(...this.predicates.map((p) => p.prepare(ds)));
  }

  eval(row: Row): boolean {
    return this.predicates.every((p) => p.eval(row) === true);
  }
}

export class Or implements EvalFunction<boolean> {
  readonly predicates: readonly EvalFunction[];

  constructor(...predicates: EvalFunction[]) {
    this.predicates = predicates;
  }

  get name(): string {
    return 'or';
  }

  prepare(ds: RowStream): Or {
    return new Or(...this.predicates.map((p) => p.prepare(ds)));
  }

  eval(row: Row): boolean {
    return this.predicates.some((p) => p.eval(row) === true);
  }
}

export class Not implements EvalFunction<boolean> {
  readonly predicate: EvalFunction;

  constructor(predicate: EvalFunction) {
    this.predicate = predicate;
  }

  get name(): string {
    return 'not';
  }

  prepare(ds: RowStream): Not {
    return new Not(this.predicate.prepare(ds));
  }

  eval(row: Row): boolean {
    return this.predicate.eval(row) !== true;
  }
}
