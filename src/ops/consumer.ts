/**
 * Consumer interface and base types.
 *
 * A consumer is the stateful half of a pipeline stage. It is created when
 * an operator is opened, receives rows one at a time through `consume`
 * and produces its result on `close`.
 *
 * Key principles:
 * - One consumer per run; consumers are never reused
 * - `close` runs exactly once; a second call fails
 * - Producing consumers forward rows downstream and close it after
 *   draining their own buffers
 */

import { InvalidOperationError } from '../errors';
import type { Row, RowId, Schema } from '../types/row';

export interface StreamConsumer<R = unknown> {
  /** Schema of the rows this consumer emits (or collects) */
  readonly columns: Schema;

  /**
   * Process one row. Returns the row passed on, or `null` when the row
   * was suppressed or buffered.
   */
  consume(rowId: RowId, row: Row): Row | null;

  /** Finish the run and return the result. */
  close(): R;
}

/**
 * Base class enforcing the single `close` of a consumer.
 */
export abstract class BaseConsumer<R> implements StreamConsumer<R> {
  readonly columns: Schema;
  private closed = false;

  constructor(columns: Schema) {
    this.columns = columns;
  }

  abstract consume(rowId: RowId, row: Row): Row | null;

  close(): R {
    if (this.closed) {
      throw new InvalidOperationError('close', 'was already called on this consumer', 'consumers are closed once by the pipeline driver');
    }
    this.closed = true;
    return this.finish();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  protected abstract finish(): R;
}

/**
 * Consumer that transforms rows and forwards them to a downstream consumer.
 * Without a downstream consumer, `close` returns `null`.
 */
export abstract class ProducingConsumer extends BaseConsumer<unknown> {
  readonly downstream: StreamConsumer | null;

  constructor(columns: Schema, downstream: StreamConsumer | null) {
    super(columns);
    this.downstream = downstream;
  }

  consume(rowId: RowId, row: Row): Row | null {
    const out = this.handle(rowId, row);
    if (out !== null && this.downstream) {
      this.downstream.consume(rowId, out);
    }
    return out;
  }

  /** Transform one row, or return `null` to suppress it. */
  protected abstract handle(rowId: RowId, row: Row): Row | null;

  protected finish(): unknown {
    return this.downstream ? this.downstream.close() : null;
  }
}
