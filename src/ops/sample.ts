import { ConfigurationError, isLimitReached } from '../errors';
import type { RowStream } from '../io/source';
import type { Row, RowEntry, RowId, Schema } from '../types/row';
import { randomInt, randomSeed, seededRandom } from '../utils/random';
import { type StreamConsumer, ProducingConsumer } from './consumer';
import { type PreparedStage, ProducingOperator } from './operator';

export interface SampleOptions {
  /** Seed for a reproducible sample */
  seed?: number;
}

/**
 * Random sample of `n` rows without replacement (reservoir sampling).
 * The sample is passed downstream when the stream closes.
 *
 * Without a seed, one is drawn each time the stage is prepared. Every
 * consumer of that preparation uses it, so the preparation passes of later
 * stages see the same sample as the run itself.
 */
export class Sample extends ProducingOperator {
  readonly name = 'sample';
  readonly size: number;
  readonly seed?: number;

  constructor(n: number, options: SampleOptions = {}) {
    super();
    if (!Number.isInteger(n) || n < 0) {
      throw new ConfigurationError(`sample size must be a non-negative integer, got ${n}`);
    }
    this.size = n;
    this.seed = options.seed;
  }

  protected prepareStage(ds: RowStream): PreparedStage {
    const seed = this.seed ?? randomSeed();
    return {
      columns: ds.columns,
      consumer: (downstream) => new SampleConsumer(ds.columns, downstream, this.size, seededRandom(seed)),
    };
  }
}

export class SampleConsumer extends ProducingConsumer {
  private readonly size: number;
  private readonly random: () => number;
  private readonly reservoir: RowEntry[] = [];
  private seen = 0;

  constructor(columns: Schema, downstream: StreamConsumer | null, size: number, random: () => number) {
    super(columns, downstream);
    this.size = size;
    this.random = random;
  }

  protected handle(rowId: RowId, row: Row): null {
    this.seen++;
    if (this.reservoir.length < this.size) {
      this.reservoir.push([rowId, row]);
    } else {
      const slot = randomInt(this.random, this.seen);
      if (slot < this.size) {
        this.reservoir[slot] = [rowId, row];
      }
    }
    return null;
  }

  protected override finish(): unknown {
    const downstream = this.downstream;
    if (downstream) {
      try {
        for (const [rowId, row] of this.reservoir) {
          downstream.consume(rowId, row);
        }
      } catch (error) {
        if (!isLimitReached(error)) throw error;
      }
    }
    return super.finish();
  }
}
