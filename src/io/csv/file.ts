import { closeSync, openSync, readSync } from 'node:fs';
import { DataError, FileError } from '../../errors';
import type { RowEntry, Scalar, Schema } from '../../types/row';
import type { RowStream } from '../source';
import { type CsvOptions, type CsvWriteOptions, type ResolvedCsvOptions, resolveCsvOptions } from './options';
import { type CsvRecord, CsvParser } from './parser';
import { CsvWriter, describeIoError } from './writer';

/**
 * A delimited text file used as a row source.
 *
 * The file is read in fixed-size chunks each time `rows()` is iterated,
 * so it is never held in memory as a whole. Row ids are zero-based data
 * row positions.
 *
 * @example
 * ```ts
 * const file = new CsvFile('people.tsv', { nullToken: 'NA' });
 * file.columns;                  // ['name', 'age']
 * for (const [id, row] of file.rows()) { ... }
 * ```
 */
export class CsvFile implements RowStream {
  readonly path: string;
  private readonly options: ResolvedCsvOptions;
  private header?: string[];

  constructor(path: string, options?: CsvOptions) {
    this.path = path;
    this.options = resolveCsvOptions(path, options);
  }

  get delimiter(): string {
    return this.options.delimiter;
  }

  get nullToken(): string | null {
    return this.options.nullToken;
  }

  /**
   * Column names. Reads the first record of the file once, unless an
   * explicit header was given.
   */
  get columns(): Schema {
    if (!this.header) {
      this.header = this.readHeader();
    }
    return this.header;
  }

  *rows(): Generator<RowEntry> {
    const columns = this.columns;
    const { hasHeader } = this.options;
    let rowId = 0;
    let first = true;
    let line = 0;

    for (const record of this.records()) {
      line++;
      if (first) {
        first = false;
        if (hasHeader) continue;
      }
      yield [rowId++, this.toRow(record, columns.length, line)];
    }
  }

  /**
   * Raw records of the file, header included.
   */
  *records(): Generator<CsvRecord> {
    const { chunkBytes, delimiter, quote } = this.options;
    let fd: number;
    try {
      fd = openSync(this.path, 'r');
    } catch (error) {
      throw new FileError(this.path, describeIoError(error), 'check the file path');
    }

    try {
      const parser = new CsvParser(delimiter, quote);
      const decoder = new TextDecoder('utf-8');
      const buffer = Buffer.alloc(chunkBytes);
      for (;;) {
        const bytesRead = readSync(fd, buffer, 0, chunkBytes, null);
        if (bytesRead === 0) break;
        yield* parser.feed(decoder.decode(buffer.subarray(0, bytesRead), { stream: true }));
      }
      yield* parser.feed(decoder.decode());
      yield* parser.finish();
    } finally {
      closeSync(fd);
    }
  }

  /**
   * Open a writer on this file's path using its delimiter and null token.
   */
  writer(columns: readonly string[], options?: CsvWriteOptions): CsvWriter {
    return CsvWriter.open(this.path, columns, {
      delimiter: this.options.delimiter,
      quote: this.options.quote,
      nullToken: this.options.nullToken,
      ...options,
    });
  }

  private readHeader(): string[] {
    const { hasHeader, header } = this.options;
    if (header && !hasHeader) {
      return [...header];
    }
    let first: CsvRecord | undefined;
    for (const record of this.records()) {
      first = record;
      break;
    }
    if (header) {
      return [...header];
    }
    if (!first) {
      return [];
    }
    return hasHeader ? first.fields : first.fields.map((_, i) => `column_${i}`);
  }

  private toRow(record: CsvRecord, width: number, line: number): Scalar[] {
    const { fields, quoted } = record;
    if (fields.length > width) {
      throw new DataError(
        fields,
        `${this.path}: record ${line} has ${fields.length} fields, expected ${width}`,
        'check the delimiter and quoting of the file',
      );
    }
    const { nullToken } = this.options;
    const row: Scalar[] = new Array<Scalar>(width).fill(null);
    for (let i = 0; i < fields.length; i++) {
      const value = fields[i] ?? '';
      row[i] = nullToken !== null && value === nullToken && !quoted[i] ? null : value;
    }
    return row;
  }
}
