import type { ColumnRef } from '../types/row';
import { ConfigurationError } from './configuration-error';

/**
 * Error thrown when a column reference does not resolve against a schema.
 */
export class ColumnNotFoundError extends ConfigurationError {
  readonly column: ColumnRef;
  readonly available: string[];

  constructor(column: ColumnRef, available: readonly string[]) {
    const hint =
      available.length > 0
        ? `available columns are: ${available.map((c) => `'${c}'`).join(', ')}`
        : 'the schema has no columns';

    const detail =
      typeof column === 'number'
        ? `column index ${column} is outside the schema (${available.length} columns)`
        : `column '${column}' does not exist`;

    super(detail, hint, 'column not found');
    this.name = 'ColumnNotFoundError';
    this.column = column;
    this.available = [...available];
  }

  protected override _getExpression(): string {
    return typeof this.column === 'number' ? `column(${this.column})` : `column('${this.column}')`;
  }
}
