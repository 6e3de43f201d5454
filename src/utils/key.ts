import { type Scalar, type Value, isTuple } from '../types/row';

function encodeScalar(value: Scalar): string {
  // JSON has no encoding for NaN or the infinities
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return `#${String(value)}`;
  }
  return JSON.stringify(value);
}

/**
 * Canonical string key for a scalar or tuple.
 *
 * Values of different types never share a key (`1` and `'1'` differ),
 * and a single-element tuple differs from its scalar.
 */
export function keyOf(value: Value): string {
  if (isTuple(value)) {
    return `[${value.map(encodeScalar).join(',')}]`;
  }
  return encodeScalar(value);
}

/**
 * Structural equality for values, consistent with `keyOf`.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  return keyOf(a) === keyOf(b);
}
