import type { Value } from '../types/row';
import { ConfigurationError } from './configuration-error';

/**
 * Error thrown when a filter predicate returns a value that can never
 * equal the configured truth value.
 */
export class PredicateTypeError extends ConfigurationError {
  readonly truthValue: Value;
  readonly actual: Value;

  constructor(predicate: string, truthValue: Value, actual: Value) {
    super(
      `predicate '${predicate}' returned ${describe(actual)} but the truth value is ${describe(truthValue)}`,
      'pass a truthValue of the same type as the predicate result',
      'predicate type mismatch',
    );
    this.name = 'PredicateTypeError';
    this.truthValue = truthValue;
    this.actual = actual;
  }

  protected override _getExpression(): string {
    return 'filter(predicate, { truthValue })';
  }
}

function describe(value: Value): string {
  if (Array.isArray(value)) return `a tuple (${JSON.stringify(value)})`;
  return `${typeof value} ${JSON.stringify(value)}`;
}
