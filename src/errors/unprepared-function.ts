import { ConfigurationError } from './configuration-error';

/**
 * Error thrown when a function that needs a preparation pass is evaluated
 * before `prepare()` was called on it. This is a programmer error.
 */
export class UnpreparedFunctionError extends ConfigurationError {
  readonly functionName: string;

  constructor(functionName: string) {
    super(
      `'${functionName}' was evaluated before it was prepared`,
      'evaluate the instance returned by prepare(), not the original function',
      'unprepared function',
    );
    this.name = 'UnpreparedFunctionError';
    this.functionName = functionName;
  }

  protected override _getExpression(): string {
    return `${this.functionName}.eval(row)`;
  }
}
