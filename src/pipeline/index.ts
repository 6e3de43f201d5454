import type { DataTable } from '../data/table';
import { CsvFile } from '../io/csv/file';
import type { CsvOptions } from '../io/csv/options';
import { type RowStream, TableSource } from '../io/source';
import { DataPipeline } from './data-pipeline';

export { DataPipeline } from './data-pipeline';
export type { PipelineFilterOptions } from './data-pipeline';

/** Anything a pipeline can read from. */
export type StreamSource = string | DataTable | RowStream;

function isRowStream(source: DataTable | RowStream): source is RowStream {
  return 'rows' in source && typeof source.rows === 'function';
}

/**
 * Start a pipeline over a CSV/TSV file path, an in-memory table or any
 * row stream. Reader options only apply to file paths.
 *
 * @example
 * ```ts
 * import { col, Eq, stream } from 'scrubline';
 *
 * stream('cities.tsv', { nullToken: 'NA' })
 *   .filter(new Eq(col('state'), 'NY'))
 *   .write('ny.tsv');
 * ```
 */
export function stream(source: StreamSource, options?: CsvOptions): DataPipeline {
  if (typeof source === 'string') {
    return new DataPipeline(new CsvFile(source, options));
  }
  if (isRowStream(source)) {
    return new DataPipeline(source);
  }
  return new DataPipeline(new TableSource(source));
}
