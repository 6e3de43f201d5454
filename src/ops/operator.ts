/**
 * Operator interface and base types.
 *
 * Operators are stateless stage descriptors. Opening an operator against
 * the schema of its input builds the consumer for one run; the same
 * operator can be opened any number of times.
 *
 * Key principles:
 * - `open` never reads rows to build the chain; preparation passes of
 *   evaluation functions are the only reads
 * - Each stage is prepared once per open; preparation passes downstream
 *   replay the prepared upstream stages
 * - Producers open their downstream operators recursively
 * - Collectors are terminal and ignore any downstream operators
 */

import type { RowStream } from '../io/source';
import type { Schema } from '../types/row';
import type { StreamConsumer } from './consumer';
import { StageStream } from './stream';

export interface StreamOperator {
  /** Human-readable name for logs and errors */
  readonly name: string;

  /**
   * Build the consumer of this stage.
   *
   * @param ds - root row source of the pipeline
   * @param schema - output schema of the previous stage
   * @param upstream - stages before this one, already prepared
   * @param downstream - operators after this one
   */
  open(
    ds: RowStream,
    schema: Schema,
    upstream: readonly PreparedStage[],
    downstream: readonly StreamOperator[],
  ): StreamConsumer;
}

/**
 * Output schema and consumer factory of a prepared producer stage.
 */
export interface PreparedStage {
  columns: Schema;
  consumer(downstream: StreamConsumer | null): StreamConsumer;
}

/**
 * Base class for operators that transform rows and pass them on.
 */
export abstract class ProducingOperator implements StreamOperator {
  abstract readonly name: string;

  /**
   * Compute the output schema and prepare evaluation functions.
   *
   * @param ds - the rows reaching this stage
   */
  protected abstract prepareStage(ds: RowStream): PreparedStage;

  open(
    ds: RowStream,
    schema: Schema,
    upstream: readonly PreparedStage[],
    downstream: readonly StreamOperator[],
  ): StreamConsumer {
    const stage = this.prepareStage(new StageStream(ds, upstream, schema));
    const [next, ...rest] = downstream;
    const consumer = next ? next.open(ds, stage.columns, [...upstream, stage], rest) : null;
    return stage.consumer(consumer);
  }
}

/**
 * Base class for terminal operators.
 */
export abstract class CollectorOperator<R = unknown> implements StreamOperator {
  abstract readonly name: string;

  protected abstract createCollector(schema: Schema): StreamConsumer<R>;

  open(
    _ds: RowStream,
    schema: Schema,
    _upstream: readonly PreparedStage[],
    _downstream: readonly StreamOperator[],
  ): StreamConsumer<R> {
    return this.createCollector(schema);
  }
}

export function isCollector(op: StreamOperator): boolean {
  return op instanceof CollectorOperator;
}
