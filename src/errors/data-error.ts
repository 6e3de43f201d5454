import type { Value } from '../types/row';
import { ScrublineError } from './base';

/**
 * Error thrown when a value cannot be processed by a function whose
 * error policy is `'raise'`.
 */
export class DataError extends ScrublineError {
  readonly value: Value;
  readonly reason: string;

  constructor(value: Value, reason: string, hint?: string) {
    super(`data error: ${reason}`, hint);
    this.name = 'DataError';
    this.value = value;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return JSON.stringify(this.value) ?? String(this.value);
  }

  protected override _getDetail(): string {
    return this.reason;
  }
}
