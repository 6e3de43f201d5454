import { closeSync, openSync, writeSync } from 'node:fs';
import { FileError } from '../../errors';
import type { Scalar } from '../../types/row';
import { type CsvWriteOptions, type ResolvedCsvWriteOptions, resolveCsvWriteOptions } from './options';
import { escapeField } from './parser';

/**
 * Buffered, synchronous CSV writer.
 *
 * The file is created (or truncated) and the header written when the
 * writer is opened. `close()` flushes and releases the file handle; calling
 * it again has no effect.
 */
export class CsvWriter {
  readonly path: string;
  readonly columns: readonly string[];
  private readonly options: ResolvedCsvWriteOptions;
  private fd: number | null;
  private buffer: string[] = [];
  private bufferedBytes = 0;
  private rowCount = 0;

  private constructor(path: string, columns: readonly string[], options: ResolvedCsvWriteOptions, fd: number) {
    this.path = path;
    this.columns = columns;
    this.options = options;
    this.fd = fd;
  }

  static open(path: string, columns: readonly string[], options?: CsvWriteOptions): CsvWriter {
    const resolved = resolveCsvWriteOptions(path, options);
    let fd: number;
    try {
      fd = openSync(path, 'w');
    } catch (error) {
      throw new FileError(path, describeIoError(error), 'check that the directory exists and is writable');
    }
    const writer = new CsvWriter(path, [...columns], resolved, fd);
    writer.append(columns.map((name) => escapeField(name, resolved.delimiter, resolved.quote)));
    return writer;
  }

  /** Data rows written so far, header excluded. */
  get rows(): number {
    return this.rowCount;
  }

  get delimiter(): string {
    return this.options.delimiter;
  }

  get quote(): string {
    return this.options.quote;
  }

  get nullToken(): string | null {
    return this.options.nullToken;
  }

  get closed(): boolean {
    return this.fd === null;
  }

  write(row: readonly Scalar[]): void {
    if (this.fd === null) {
      throw new FileError(this.path, 'the writer is closed');
    }
    this.append(row.map((value) => this.formatValue(value)));
    this.rowCount++;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    try {
      this.flush();
    } finally {
      this.fd = null;
      closeSync(fd);
    }
  }

  private formatValue(value: Scalar): string {
    const { delimiter, quote, nullToken } = this.options;
    if (value === null) {
      return nullToken ?? '';
    }
    const text = String(value);
    // Quoting keeps a string equal to the null token from reading back as null
    return escapeField(text, delimiter, quote, nullToken !== null && text === nullToken);
  }

  private append(fields: string[]): void {
    const line = `${fields.join(this.options.delimiter)}\n`;
    this.buffer.push(line);
    this.bufferedBytes += line.length;
    if (this.bufferedBytes >= this.options.bufferBytes) {
      this.flush();
    }
  }

  private flush(): void {
    if (this.fd === null || this.buffer.length === 0) return;
    const text = this.buffer.join('');
    this.buffer = [];
    this.bufferedBytes = 0;
    try {
      writeSync(this.fd, text);
    } catch (error) {
      throw new FileError(this.path, describeIoError(error));
    }
  }
}

export function describeIoError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
