import { describe, expect, test } from 'vitest';
import { InvalidOperationError, LimitReachedSignal, isLimitReached } from '../../src/errors';
import { CollectorConsumer, LimitConsumer, RowCountConsumer, SelectConsumer } from '../../src/ops';

describe('consumers', () => {
  test('close can only be called once', () => {
    const consumer = new RowCountConsumer(['a']);
    consumer.consume(0, [1]);
    expect(consumer.close()).toBe(1);
    expect(consumer.isClosed).toBe(true);
    expect(() => consumer.close()).toThrow(InvalidOperationError);
  });

  test('producing consumers forward rows and close downstream', () => {
    const sink = new CollectorConsumer(['c', 'a']);
    const select = new SelectConsumer(['c', 'a'], sink, [2, 0]);
    expect(select.consume('r1', [1, 2, 3])).toEqual([3, 1]);
    expect(select.close()).toEqual([['r1', [3, 1]]]);
    expect(sink.isClosed).toBe(true);
  });

  test('without downstream close returns null', () => {
    const select = new SelectConsumer(['a'], null, [0]);
    select.consume(0, [1]);
    expect(select.close()).toBeNull();
  });
});

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('LimitConsumer', () => {
  test('passes n rows, then signals', () => {
    const limit = new LimitConsumer(['a'], null, 2);
    expect(limit.consume(0, ['x'])).toEqual(['x']);
    expect(limit.consume(1, ['y'])).toEqual(['y']);

    const thrown = thrownBy(() => limit.consume(2, ['z']));
    expect(isLimitReached(thrown)).toBe(true);
    expect(thrown).toBeInstanceOf(LimitReachedSignal);
    expect(thrown).not.toBeInstanceOf(Error);
    expect(limit.rows).toBe(2);
  });

  test('a limit of zero signals on the first row', () => {
    const limit = new LimitConsumer(['a'], null, 0);
    expect(isLimitReached(thrownBy(() => limit.consume(0, ['x'])))).toBe(true);
    expect(limit.rows).toBe(0);
  });

  test('suppressed rows are not forwarded', () => {
    const sink = new CollectorConsumer(['a']);
    const limit = new LimitConsumer(['a'], sink, 1);
    limit.consume(0, ['x']);
    expect(isLimitReached(thrownBy(() => limit.consume(1, ['y'])))).toBe(true);
    expect(limit.close()).toEqual([[0, ['x']]]);
  });
});
