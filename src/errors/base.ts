import { fileURLToPath } from 'node:url';

// Frames under this directory belong to the library itself
const LIBRARY_ROOT = fileURLToPath(new URL('..', import.meta.url));

function frameFile(file: string): string {
  return file.startsWith('file://') ? fileURLToPath(file) : file;
}

/**
 * Base error class for all scrubline errors.
 * Provides formatted error output with location tracking and hints.
 *
 * The location is the first stack frame outside the library, which is
 * where the caller built or ran the pipeline that failed.
 */
export class ScrublineError extends Error {
  readonly hint?: string;
  readonly location?: { file: string; line: number; column: number };

  constructor(message: string, hint?: string) {
    super(message);
    this.name = 'ScrublineError';
    this.hint = hint;
    this.location = this._extractLocation();
  }

  private _extractLocation(): { file: string; line: number; column: number } | undefined {
    const stack = this.stack;
    if (!stack) return undefined;

    const lines = stack.split('\n');
    for (const line of lines) {
      if (line.includes('node_modules') || line.includes('node:internal')) continue;

      const match = line.match(/at .+? \((.+?):(\d+):(\d+)\)/) ?? line.match(/at (.+?):(\d+):(\d+)/);

      if (match?.[1] && match[2] && match[3]) {
        const file = frameFile(match[1]);
        if (file.startsWith(LIBRARY_ROOT)) continue;
        return {
          file,
          line: Number.parseInt(match[2], 10),
          column: Number.parseInt(match[3], 10),
        };
      }
    }
    return undefined;
  }

  format(): string {
    const lines: string[] = [];

    const loc = this.location
      ? ` at ${this.location.file.split('/').slice(-1)[0]}:${this.location.line}:${this.location.column}`
      : '';

    lines.push(`error: ${this.message}${loc}`);
    lines.push(`  --> ${this._getExpression()}`);
    lines.push('   |');
    lines.push(`   └── ${this._getDetail()}`);

    if (this.hint) {
      lines.push('');
      lines.push(`help: ${this.hint}`);
    }

    return lines.join('\n');
  }

  protected _getExpression(): string {
    return '(expression)';
  }

  protected _getDetail(): string {
    return this.message;
  }
}
