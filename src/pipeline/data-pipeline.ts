import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getConfig } from '../core/config';
import type { DataGrouping } from '../data/grouping';
import { DataTable } from '../data/table';
import { InvalidOperationError } from '../errors';
import type { EvalFunction } from '../function/base';
import type { UpdateSpec } from '../function/update';
import { CsvFile } from '../io/csv/file';
import type { CsvWriteOptions } from '../io/csv/options';
import type { RowStream } from '../io/source';
import { type AggregateSpec, aggregate } from '../ops/aggregate';
import { DataFrame, Distinct, RowCount } from '../ops/collect';
import { Filter } from '../ops/filter';
import { type GroupKey, groupBy } from '../ops/groupby';
import { Insert } from '../ops/insert';
import { Limit } from '../ops/limit';
import { Move } from '../ops/move';
import { type StreamOperator, isCollector } from '../ops/operator';
import { runPipeline } from '../ops/pipeline';
import { Sample, type SampleOptions } from '../ops/sample';
import { Rename, Select } from '../ops/select';
import { OperatorStream } from '../ops/operator-stream';
import { Update } from '../ops/update';
import { Write } from '../ops/write';
import type { ColumnRef, RowEntry, Schema, Value } from '../types/row';
import { Counter } from '../utils/counter';

export interface PipelineFilterOptions {
  /** Predicate result that selects a row (default: true) */
  truthValue?: Value;
  /** Stop after this many matching rows */
  limit?: number;
}

/**
 * Lazily evaluated pipeline of stream operators over a row source.
 *
 * Every method that adds a stage returns a new pipeline; nothing is read
 * until a terminal method (`count`, `toTable`, `write`, ...) runs the
 * chain or `rows()` is iterated. A pipeline is itself a `RowStream`.
 *
 * @example
 * ```ts
 * const table = stream('people.csv')
 *   .filter(new Gt(col('age'), 30))
 *   .select('name', 'age')
 *   .toTable();
 * ```
 */
export class DataPipeline implements RowStream {
  readonly source: RowStream;
  readonly operators: readonly StreamOperator[];
  private readonly output: OperatorStream;

  constructor(source: RowStream, operators: readonly StreamOperator[] = []) {
    this.source = source;
    this.operators = operators;
    this.output = new OperatorStream(source, operators);
  }

  // ===============================================================
  // RowStream
  // ===============================================================

  /**
   * Output schema of the pipeline. Computing it opens the chain, which
   * prepares its evaluation functions.
   */
  get columns(): Schema {
    return this.output.columns;
  }

  /**
   * Iterate the output rows lazily. The chain is closed when the iteration
   * ends or is stopped early.
   */
  rows(): Generator<RowEntry> {
    return this.output.rows();
  }

  [Symbol.iterator](): Generator<RowEntry> {
    return this.rows();
  }

  // ===============================================================
  // Stages
  // ===============================================================

  /**
   * New pipeline with one more producing stage. Collectors end a pipeline;
   * run them with `stream()`.
   */
  append(op: StreamOperator): DataPipeline {
    if (isCollector(op)) {
      throw new InvalidOperationError(
        'append',
        `cannot add the collector '${op.name}' as an intermediate stage`,
        'run a collector with stream(op)',
      );
    }
    return new DataPipeline(this.source, [...this.operators, op]);
  }

  select(...columns: ColumnRef[]): DataPipeline {
    return this.append(new Select(columns));
  }

  /** Select columns and give them new names. */
  selectAs(columns: readonly ColumnRef[], names: readonly string[]): DataPipeline {
    return this.append(new Select(columns, names));
  }

  rename(columns: ColumnRef | readonly ColumnRef[], names: string | readonly string[]): DataPipeline {
    return this.append(new Rename(columns, names));
  }

  move(columns: ColumnRef | readonly ColumnRef[], to: number): DataPipeline {
    return this.append(new Move(columns, to));
  }

  insert(names: string | readonly string[], values: EvalFunction | Value, position?: number): DataPipeline {
    return this.append(new Insert(names, values, position));
  }

  filter(predicate: EvalFunction, options: PipelineFilterOptions = {}): DataPipeline {
    const filtered = this.append(new Filter(predicate, { truthValue: options.truthValue }));
    return options.limit === undefined ? filtered : filtered.limit(options.limit);
  }

  /** Alias of `filter`. */
  where(predicate: EvalFunction, options: PipelineFilterOptions = {}): DataPipeline {
    return this.filter(predicate, options);
  }

  /** Drop the rows that match the predicate. */
  delete(predicate: EvalFunction, options: Omit<PipelineFilterOptions, 'limit'> = {}): DataPipeline {
    return this.append(new Filter(predicate, { truthValue: options.truthValue, negated: true }));
  }

  limit(n: number): DataPipeline {
    return this.append(new Limit(n));
  }

  update(columns: ColumnRef | readonly ColumnRef[], func: UpdateSpec): DataPipeline {
    return this.append(new Update(columns, func));
  }

  sample(n: number, options?: SampleOptions): DataPipeline {
    return this.append(new Sample(n, options));
  }

  // ===============================================================
  // Terminal Operations
  // ===============================================================

  /**
   * Run the chain with a terminal operator and return its result.
   */
  stream(op: StreamOperator): unknown {
    return runPipeline(this.source, [...this.operators, op]);
  }

  /**
   * Run the chain as it is. A chain ending in a producing stage returns
   * `null`.
   */
  run(): unknown {
    return runPipeline(this.source, this.operators);
  }

  /**
   * Number of rows, or of rows matching a predicate.
   */
  count(predicate?: EvalFunction, truthValue?: Value): number {
    const pipeline = predicate ? this.filter(predicate, { truthValue }) : this;
    const result = pipeline.stream(new RowCount());
    if (typeof result !== 'number') {
      throw unexpectedResult('count', result);
    }
    return result;
  }

  /**
   * Frequency of distinct values over the given columns (default: all).
   */
  distinct(...columns: ColumnRef[]): Counter {
    const result = this.stream(new Distinct(columns.length > 0 ? columns : undefined));
    if (!(result instanceof Counter)) {
      throw unexpectedResult('distinct', result);
    }
    return result;
  }

  /** Distinct values in first-seen order. */
  distinctValues(...columns: ColumnRef[]): Value[] {
    return this.distinct(...columns).keys();
  }

  toTable(): DataTable {
    const result = this.stream(new DataFrame());
    if (!(result instanceof DataTable)) {
      throw unexpectedResult('toTable', result);
    }
    return result;
  }

  /** First rows as a table (default: configured `headRows`). */
  head(n: number = getConfig().headRows): DataTable {
    return this.limit(n).toTable();
  }

  /** All output rows with their ids. */
  collect(): RowEntry[] {
    return Array.from(this.rows());
  }

  /**
   * Write the output to a CSV file and return that file as a row source.
   */
  write(path: string, options?: CsvWriteOptions): CsvFile {
    const result = this.stream(new Write(path, options));
    if (!(result instanceof CsvFile)) {
      throw unexpectedResult('write', result);
    }
    return result;
  }

  /**
   * Materialize the output in a CSV file (a temporary one by default) and
   * continue with a pipeline over that file.
   */
  persist(path?: string, options?: CsvWriteOptions): DataPipeline {
    const target = path ?? join(mkdtempSync(join(tmpdir(), 'scrubline-')), 'data.csv');
    return new DataPipeline(this.write(target, options));
  }

  groupBy(by: GroupKey): DataGrouping {
    return groupBy(this.toTable(), by);
  }

  /** Group the output and reduce every group to one row. */
  aggregate(by: GroupKey, func: AggregateSpec, schema?: readonly string[]): DataTable {
    return aggregate(this.groupBy(by), func, schema);
  }
}

function unexpectedResult(operation: string, result: unknown): InvalidOperationError {
  return new InvalidOperationError(operation, `received an unexpected result of type ${typeof result}`);
}
