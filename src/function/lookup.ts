import { DataError } from '../errors';
import type { Scalar, Value } from '../types/row';
import { keyOf } from '../utils/key';
import { type ErrorPolicy, ValueFunction, applyPolicy } from './base';

export type LookupMapping = ReadonlyMap<Scalar, Value> | Readonly<Record<string, Value>>;

export interface LookupOptions {
  /** Policy for values missing from the mapping (default: 'pass') */
  onMissing?: ErrorPolicy;
}

/**
 * Replace values through a mapping. Plain objects map string keys only;
 * use a `Map` for other key types.
 */
export class Lookup extends ValueFunction {
  readonly onMissing: ErrorPolicy;
  private readonly table: Map<string, Value>;

  constructor(mapping: LookupMapping, options: LookupOptions = {}) {
    super();
    this.onMissing = options.onMissing ?? 'pass';
    this.table = new Map();
    if (isMap(mapping)) {
      for (const [key, value] of mapping) {
        this.table.set(keyOf(key), value);
      }
    } else {
      for (const [key, value] of Object.entries(mapping)) {
        this.table.set(keyOf(key), value);
      }
    }
  }

  get name(): string {
    return 'lookup';
  }

  eval(value: Value): Value {
    const k = keyOf(value);
    if (this.table.has(k)) {
      return this.table.get(k) ?? null;
    }
    return applyPolicy(this.onMissing, value, new DataError(value, `no mapping for ${JSON.stringify(value)}`));
  }
}

function isMap(mapping: LookupMapping): mapping is ReadonlyMap<Scalar, Value> {
  return mapping instanceof Map;
}
