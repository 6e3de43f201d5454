import { getLogger } from '../core/logging';
import { InvalidOperationError, isLimitReached } from '../errors';
import type { RowStream } from '../io/source';
import type { Row, RowEntry, RowId, Schema } from '../types/row';
import type { StreamConsumer } from './consumer';
import type { PreparedStage } from './operator';

/**
 * Terminal consumer that keeps rows until they are drained.
 */
export class BufferConsumer implements StreamConsumer<null> {
  readonly columns: Schema;
  private buffer: RowEntry[] = [];
  private closed = false;

  constructor(columns: Schema) {
    this.columns = columns;
  }

  consume(rowId: RowId, row: Row): Row {
    this.buffer.push([rowId, row]);
    return row;
  }

  close(): null {
    if (this.closed) {
      throw new InvalidOperationError('close', 'was already called on this consumer');
    }
    this.closed = true;
    return null;
  }

  drain(): RowEntry[] {
    const rows = this.buffer;
    this.buffer = [];
    return rows;
  }
}

/**
 * Close a consumer chain after iteration failed. A failure while closing is
 * logged; the caller rethrows the original error.
 */
export function closeAfterFailure(consumer: StreamConsumer, cause: unknown): void {
  try {
    consumer.close();
  } catch (closeError) {
    getLogger().error(
      'closing the pipeline after a failure raised another error',
      closeError instanceof Error ? closeError : undefined,
      { cause: cause instanceof Error ? cause.message : String(cause) },
    );
  }
}

/**
 * Push every source row through `head` and yield what reaches `sink`,
 * one source row at a time. The chain is closed exactly once: at the end of
 * the source, on a limit signal, on an error, or when the caller stops
 * iterating early.
 */
export function* pushRows(source: RowStream, head: StreamConsumer, sink: BufferConsumer): Generator<RowEntry> {
  let closed = false;
  try {
    try {
      for (const [rowId, row] of source.rows()) {
        head.consume(rowId, row);
        yield* sink.drain();
      }
    } catch (error) {
      if (!isLimitReached(error)) throw error;
    }
    closed = true;
    head.close();
    yield* sink.drain();
  } catch (error) {
    if (!closed) {
      closed = true;
      closeAfterFailure(head, error);
    }
    throw error;
  } finally {
    // Reached when the caller stops iterating early
    if (!closed) {
      head.close();
    }
  }
}

/**
 * The rows reaching a stage, replayed through the stages already prepared
 * before it.
 *
 * Each `rows()` call builds fresh consumers from the prepared stages, so a
 * preparation pass never prepares an upstream stage again.
 */
export class StageStream implements RowStream {
  readonly source: RowStream;
  readonly stages: readonly PreparedStage[];
  readonly columns: Schema;

  constructor(source: RowStream, stages: readonly PreparedStage[], columns: Schema) {
    this.source = source;
    this.stages = stages;
    this.columns = columns;
  }

  *rows(): Generator<RowEntry> {
    if (this.stages.length === 0) {
      yield* this.source.rows();
      return;
    }

    const sink = new BufferConsumer(this.columns);
    let head: StreamConsumer = sink;
    for (let i = this.stages.length - 1; i >= 0; i--) {
      const stage = this.stages[i];
      if (stage) head = stage.consumer(head);
    }
    yield* pushRows(this.source, head, sink);
  }
}
