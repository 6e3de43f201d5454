import { InvalidOperationError } from '../errors';
import type { RowStream } from '../io/source';
import type { RowEntry, Schema } from '../types/row';
import type { StreamConsumer } from './consumer';
import { type PreparedStage, type StreamOperator, isCollector } from './operator';
import { BufferConsumer, pushRows } from './stream';

class BufferOperator implements StreamOperator {
  readonly name = 'buffer';
  sink: BufferConsumer | null = null;

  open(_ds: RowStream, schema: Schema, _upstream: readonly PreparedStage[]): StreamConsumer {
    this.sink = new BufferConsumer(schema);
    return this.sink;
  }
}

interface OpenChain {
  head: StreamConsumer;
  sink: BufferConsumer;
}

/**
 * The rows produced by a list of operators over a source, as a `RowStream`.
 *
 * Iterating `rows()` opens the operators once, then runs them lazily: each
 * source row is pushed through the chain and whatever reaches the end is
 * yielded before the next source row is read.
 */
export class OperatorStream implements RowStream {
  readonly source: RowStream;
  readonly operators: readonly StreamOperator[];
  private schema?: Schema;

  constructor(source: RowStream, operators: readonly StreamOperator[], columns?: Schema) {
    this.source = source;
    this.operators = operators;
    this.schema = columns;
  }

  get columns(): Schema {
    if (this.schema === undefined) {
      if (this.operators.length === 0) {
        this.schema = this.source.columns;
      } else {
        const { head, sink } = this.openChain();
        head.close();
        this.schema = sink.columns;
      }
    }
    return this.schema;
  }

  *rows(): Generator<RowEntry> {
    if (this.operators.length === 0) {
      yield* this.source.rows();
      return;
    }

    const { head, sink } = this.openChain();
    yield* pushRows(this.source, head, sink);
  }

  private openChain(): OpenChain {
    const [first, ...rest] = this.operators;
    if (!first) {
      throw new InvalidOperationError('open', 'needs at least one operator');
    }
    // Checked before opening so no collector acquires a resource
    const collector = this.operators.find(isCollector);
    if (collector) {
      throw new InvalidOperationError(
        'open',
        `cannot stream rows past the collector '${collector.name}'`,
        'a collector can only be the last operator',
      );
    }
    const buffer = new BufferOperator();
    const head = first.open(this.source, this.source.columns, [], [...rest, buffer]);
    if (!buffer.sink) {
      throw new InvalidOperationError('open', 'did not reach the end of the chain');
    }
    return { head, sink: buffer.sink };
  }
}
