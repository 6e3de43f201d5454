import type { Value } from '../types/row';

/**
 * Numeric reading of a value: finite numbers as they are, numeric strings
 * parsed. Everything else is `undefined`.
 */
export function toNumber(value: Value): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function isNumeric(value: Value): boolean {
  return toNumber(value) !== undefined;
}
