import { ColumnNotFoundError, SchemaError } from '../errors';
import type { ColumnRef, Schema } from './row';

/**
 * Normalize a single column reference or a list of them to a list.
 */
export function asColumnList(refs: ColumnRef | readonly ColumnRef[]): ColumnRef[] {
  if (typeof refs === 'string' || typeof refs === 'number') {
    return [refs];
  }
  return [...refs];
}

/**
 * Resolve a column reference to its position in the schema.
 * Names are matched exactly, numbers must be a valid zero-based position.
 */
export function columnIndex(schema: Schema, ref: ColumnRef): number {
  if (typeof ref === 'number') {
    if (Number.isInteger(ref) && ref >= 0 && ref < schema.length) {
      return ref;
    }
    throw new ColumnNotFoundError(ref, schema);
  }
  const idx = schema.indexOf(ref);
  if (idx === -1) {
    throw new ColumnNotFoundError(ref, schema);
  }
  return idx;
}

export function columnIndexes(schema: Schema, refs: readonly ColumnRef[]): number[] {
  return refs.map((ref) => columnIndex(schema, ref));
}

export function columnNames(schema: Schema, refs: readonly ColumnRef[]): string[] {
  return columnIndexes(schema, refs).map((idx) => schema[idx] ?? String(idx));
}

/**
 * Fail when a schema repeats a column name.
 */
export function assertUniqueColumns(schema: Schema): void {
  const seen = new Set<string>();
  for (const name of schema) {
    if (seen.has(name)) {
      throw new SchemaError(
        `duplicate column name '${name}'`,
        'column names must be unique within a stage output',
      );
    }
    seen.add(name);
  }
}
