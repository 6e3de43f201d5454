import { ConfigurationError } from './configuration-error';

/**
 * Error thrown when a schema does not fit the data it describes.
 */
export class SchemaError extends ConfigurationError {
  constructor(detail: string, hint?: string) {
    super(detail, hint, 'schema error');
    this.name = 'SchemaError';
  }

  protected override _getExpression(): string {
    return 'schema definition';
  }
}
