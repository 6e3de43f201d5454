import { ScrublineError } from './base';

/**
 * Programmer misuse detected while building or opening a pipeline:
 * bad column references, schema mismatches, functions used before
 * they were prepared. Never recovered from; the run aborts.
 */
export class ConfigurationError extends ScrublineError {
  readonly detail: string;

  constructor(detail: string, hint?: string, summary = 'configuration error') {
    super(`${summary}: ${detail}`, hint);
    this.name = 'ConfigurationError';
    this.detail = detail;
  }

  protected override _getExpression(): string {
    return 'pipeline definition';
  }

  protected override _getDetail(): string {
    return this.detail;
  }
}
