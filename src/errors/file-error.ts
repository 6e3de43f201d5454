import { ScrublineError } from './base';

/**
 * Error thrown when file operations fail.
 */
export class FileError extends ScrublineError {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string, hint?: string) {
    super(`file error: cannot access '${path}': ${reason}`, hint);
    this.name = 'FileError';
    this.path = path;
    this.reason = reason;
  }

  protected override _getExpression(): string {
    return `stream('${this.path}')`;
  }

  protected override _getDetail(): string {
    return `cannot access '${this.path}': ${this.reason}`;
  }
}
