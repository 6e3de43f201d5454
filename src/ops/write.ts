import { getLogger } from '../core/logging';
import { CsvFile } from '../io/csv/file';
import type { CsvWriteOptions } from '../io/csv/options';
import { CsvWriter } from '../io/csv/writer';
import type { Row, RowId, Schema } from '../types/row';
import { BaseConsumer } from './consumer';
import { CollectorOperator } from './operator';

/**
 * Writes the stream to a CSV file. The file is created and its header
 * written when the operator is opened; closing the stream closes the file
 * and returns it as a readable `CsvFile`.
 */
export class Write extends CollectorOperator<CsvFile> {
  readonly name = 'write';
  readonly path: string;
  readonly options: CsvWriteOptions;

  constructor(path: string, options: CsvWriteOptions = {}) {
    super();
    this.path = path;
    this.options = options;
  }

  protected createCollector(schema: Schema): WriteConsumer {
    return new WriteConsumer(schema, CsvWriter.open(this.path, schema, this.options));
  }
}

export class WriteConsumer extends BaseConsumer<CsvFile> {
  private readonly writer: CsvWriter;

  constructor(columns: Schema, writer: CsvWriter) {
    super(columns);
    this.writer = writer;
  }

  consume(_rowId: RowId, row: Row): Row {
    this.writer.write(row);
    return row;
  }

  protected finish(): CsvFile {
    this.writer.close();
    getLogger().debug('file written', { operator: 'write', path: this.writer.path, rows: this.writer.rows });
    return new CsvFile(this.writer.path, {
      delimiter: this.writer.delimiter,
      quote: this.writer.quote,
      nullToken: this.writer.nullToken,
    });
  }
}
