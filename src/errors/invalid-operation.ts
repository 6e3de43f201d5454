import { ConfigurationError } from './configuration-error';

/**
 * Error thrown when an operation cannot be performed in the current state.
 */
export class InvalidOperationError extends ConfigurationError {
  readonly operation: string;
  readonly reason: string;

  constructor(operation: string, reason: string, hint?: string) {
    super(`'${operation}' ${reason}`, hint, 'invalid operation');
    this.name = 'InvalidOperationError';
    this.operation = operation;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return `${this.operation}(...)`;
  }
}
