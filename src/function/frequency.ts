import { UnpreparedFunctionError } from '../errors';
import type { Value } from '../types/row';
import { Counter } from '../utils/counter';
import { ValueFunction } from './base';

export interface FrequencyOptions {
  /** Return counts instead of relative frequencies (default: false) */
  absolute?: boolean;
}

/**
 * Frequency of a value among all values seen in `prepare`: its share of the
 * total by default, or its raw count. Unseen values have frequency 0.
 */
export class Frequency extends ValueFunction {
  readonly absolute: boolean;
  private readonly counts?: Counter;

  constructor(options: FrequencyOptions = {}, counts?: Counter) {
    super();
    this.absolute = options.absolute ?? false;
    this.counts = counts;
  }

  get name(): string {
    return 'frequency';
  }

  override isPrepared(): boolean {
    return this.counts !== undefined;
  }

  override prepare(values: readonly Value[]): Frequency {
    const counts = new Counter();
    for (const value of values) {
      counts.add(value);
    }
    return new Frequency({ absolute: this.absolute }, counts);
  }

  eval(value: Value): number {
    const counts = this.counts;
    if (!counts) {
      throw new UnpreparedFunctionError(this.name);
    }
    const n = counts.get(value);
    if (this.absolute) return n;
    return counts.total === 0 ? 0 : n / counts.total;
  }
}
