import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { type TestLogger, createTestLogger, setLogger } from '../../src/core/logging';
import { DataTable } from '../../src/data/table';
import { ColumnNotFoundError, InvalidOperationError } from '../../src/errors';
import { Gt, MinMaxScale, ValueFunction, col } from '../../src/function';
import type { RowStream } from '../../src/io/source';
import {
  BaseConsumer,
  Collect,
  Collector,
  Filter,
  Limit,
  OperatorStream,
  RowCount,
  Select,
  Update,
  Write,
  isCollector,
  openPipeline,
  runPipeline,
} from '../../src/ops';
import type { Row, RowEntry, Schema, Value } from '../../src/types/row';

/** Row source that counts passes and rows read. */
class CountingSource implements RowStream {
  readonly columns: Schema = ['a', 'b'];
  passes = 0;
  read = 0;

  private readonly size: number;

  constructor(size: number) {
    this.size = size;
  }

  *rows(): Generator<RowEntry> {
    this.passes++;
    for (let i = 0; i < this.size; i++) {
      this.read++;
      yield [i, [i, i * 10]];
    }
  }
}

/** Adds one to numbers; records the values of every preparation. */
class RecordingShift extends ValueFunction {
  readonly name = 'recordingShift';
  private readonly log: Value[][];
  private readonly ready: boolean;

  constructor(log: Value[][], ready = false) {
    super();
    this.log = log;
    this.ready = ready;
  }

  override isPrepared(): boolean {
    return this.ready;
  }

  override prepare(values: readonly Value[]): RecordingShift {
    this.log.push([...values]);
    return new RecordingShift(this.log, true);
  }

  eval(value: Value): Value {
    return typeof value === 'number' ? value + 1 : value;
  }
}

let logger: TestLogger;

beforeEach(() => {
  logger = createTestLogger();
  setLogger(logger);
});

afterEach(() => {
  setLogger(null);
});

describe('runPipeline', () => {
  test('needs at least one operator', () => {
    expect(() => runPipeline(new CountingSource(1), [])).toThrow(InvalidOperationError);
  });

  test('fails before reading when an operator cannot open', () => {
    const source = new CountingSource(5);
    expect(() => runPipeline(source, [new Select('zip'), new RowCount()])).toThrow(ColumnNotFoundError);
    expect(source.passes).toBe(0);
  });

  test('stops reading the source at a limit', () => {
    const source = new CountingSource(100);
    expect(runPipeline(source, [new Limit(3), new RowCount()])).toBe(3);
    expect(source.read).toBe(4);
    expect(logger.getLogs().map((entry) => entry.message)).toEqual([
      'pipeline started',
      'pipeline stopped by limit',
      'pipeline finished',
    ]);
  });

  test('logs rows read when finished', () => {
    runPipeline(new CountingSource(4), [new RowCount()]);
    const finished = logger.getLogs().find((entry) => entry.message === 'pipeline finished');
    expect(finished?.context?.rows).toBe(4);
    expect(typeof finished?.context?.durationMs).toBe('number');
  });

  test('closes the chain and rethrows when a row fails', () => {
    const dir = mkdtempSync(join(tmpdir(), 'scrubline-driver-'));
    try {
      const path = join(dir, 'partial.csv');
      const explode = new Update('a', (v) => {
        if (v === 2) throw new Error('boom');
        return v;
      });
      expect(() => runPipeline(new CountingSource(5), [explode, new Write(path)])).toThrow('boom');
      expect(readFileSync(path, 'utf-8')).toBe('a,b\n0,0\n1,10\n');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test('logs a failure while closing after an error', () => {
    class BrokenConsumer extends BaseConsumer<null> {
      consume(): Row {
        throw new Error('consume failed');
      }

      protected finish(): null {
        throw new Error('close failed');
      }
    }

    expect(() => runPipeline(new CountingSource(1), [new Collect((schema) => new BrokenConsumer(schema))])).toThrow(
      'consume failed',
    );
    const errors = logger.getLogsByLevel('error');
    expect(errors).toHaveLength(1);
    expect(errors[0]?.error?.message).toBe('close failed');
    expect(errors[0]?.context?.cause).toBe('consume failed');
  });

  test('value functions are prepared over the rows reaching their stage', () => {
    const source = new CountingSource(5);
    const result = runPipeline(source, [
      new Filter(new Gt(col('a'), 2)),
      new Update('b', new MinMaxScale()),
      new Collector(),
    ]);
    expect(result).toEqual([
      [3, [3, 0]],
      [4, [4, 1]],
    ]);
  });

  test('each stage is prepared once per run', () => {
    const source = new CountingSource(3);
    const log: Value[][] = [];
    const result = runPipeline(source, [
      new Update('a', new RecordingShift(log)),
      new Update('b', new RecordingShift(log)),
      new Update('a', new RecordingShift(log)),
      new Collector(),
    ]);
    expect(log).toEqual([
      [0, 1, 2],
      [0, 10, 20],
      [1, 2, 3],
    ]);
    // One pass per preparing stage plus the run itself
    expect(source.passes).toBe(4);
    expect(result).toEqual([
      [0, [2, 1]],
      [1, [3, 11]],
      [2, [4, 21]],
    ]);
  });

  test('updates through a mapping read the source once', () => {
    const source = new CountingSource(3);
    const updates = Array.from({ length: 8 }, () => new Update('a', new Map([[1, 100]])));
    const result = runPipeline(source, [...updates, new Collector()]);
    expect(source.passes).toBe(1);
    expect(result).toEqual([
      [0, [0, 0]],
      [1, [100, 10]],
      [2, [2, 20]],
    ]);
  });
});

describe('openPipeline', () => {
  test('returns the head consumer', () => {
    const head = openPipeline(new CountingSource(0), [new Select('b'), new RowCount()]);
    expect(head.columns).toEqual(['b']);
    head.consume(0, [1, 2]);
    expect(head.close()).toBe(1);
  });

  test('collectors ignore operators after them', () => {
    expect(isCollector(new RowCount())).toBe(true);
    expect(isCollector(new Limit(1))).toBe(false);
    const head = openPipeline(new CountingSource(0), [new RowCount(), new Select('zip')]);
    expect(head.close()).toBe(0);
  });
});

describe('OperatorStream', () => {
  test('schema of the last operator', () => {
    const stream = new OperatorStream(new CountingSource(3), [new Select(['b', 'a'])]);
    expect(stream.columns).toEqual(['b', 'a']);
  });

  test('rows are produced lazily', () => {
    const source = new CountingSource(10);
    const stream = new OperatorStream(source, [new Filter(new Gt(col('a'), 4))]);
    const iterator = stream.rows()[Symbol.iterator]();
    expect(iterator.next().value).toEqual([5, [5, 50]]);
    expect(source.read).toBe(6);
    iterator.return(undefined);
  });

  test('a limit ends the stream', () => {
    const stream = new OperatorStream(new CountingSource(10), [new Limit(2)]);
    expect([...stream.rows()].map(([id]) => id)).toEqual([0, 1]);
  });

  test('can be iterated again after stopping early', () => {
    const stream = new OperatorStream(new CountingSource(3), [new Select('a')]);
    for (const entry of stream.rows()) {
      expect(entry).toEqual([0, [0]]);
      break;
    }
    expect([...stream.rows()]).toEqual([
      [0, [0]],
      [1, [1]],
      [2, [2]],
    ]);
  });

  test('without operators it is the source', () => {
    const stream = new OperatorStream(new CountingSource(2), []);
    expect(stream.columns).toEqual(['a', 'b']);
    expect([...stream.rows()]).toHaveLength(2);
  });

  test('collectors cannot appear in the chain', () => {
    const stream = new OperatorStream(new CountingSource(2), [new RowCount()]);
    expect(() => [...stream.rows()]).toThrow(InvalidOperationError);
  });

  test('a collector in the chain is rejected before it opens', () => {
    const dir = mkdtempSync(join(tmpdir(), 'scrubline-stream-'));
    try {
      const path = join(dir, 'never.csv');
      const stream = new OperatorStream(new CountingSource(2), [new Select('a'), new Write(path)]);
      expect(() => [...stream.rows()]).toThrow(InvalidOperationError);
      expect(existsSync(path)).toBe(false);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
