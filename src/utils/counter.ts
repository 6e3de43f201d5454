import type { Value } from '../types/row';
import { keyOf } from './key';

interface CounterEntry {
  key: Value;
  count: number;
}

/**
 * Insertion-ordered frequency map over scalars and tuples.
 * Keys are compared structurally, so `[1, 2]` built twice counts once.
 */
export class Counter {
  private readonly entriesByKey = new Map<string, CounterEntry>();
  private totalCount = 0;

  add(key: Value, count = 1): void {
    const k = keyOf(key);
    const entry = this.entriesByKey.get(k);
    if (entry) {
      entry.count += count;
    } else {
      this.entriesByKey.set(k, { key, count });
    }
    this.totalCount += count;
  }

  get(key: Value): number {
    return this.entriesByKey.get(keyOf(key))?.count ?? 0;
  }

  has(key: Value): boolean {
    return this.entriesByKey.has(keyOf(key));
  }

  /** Number of distinct keys. */
  get size(): number {
    return this.entriesByKey.size;
  }

  /** Sum of all counts. */
  get total(): number {
    return this.totalCount;
  }

  keys(): Value[] {
    return Array.from(this.entriesByKey.values(), (e) => e.key);
  }

  entries(): Array<[Value, number]> {
    return Array.from(this.entriesByKey.values(), (e): [Value, number] => [e.key, e.count]);
  }

  /**
   * Entries ordered by descending count. Ties keep insertion order.
   */
  mostCommon(n?: number): Array<[Value, number]> {
    const sorted = this.entries().sort((a, b) => b[1] - a[1]);
    return n === undefined ? sorted : sorted.slice(0, n);
  }
}
