/**
 * Row-level data model shared by every pipeline stage.
 */

/** A single cell value. `null` marks a missing value. */
export type Scalar = string | number | boolean | null;

/** Ordered group of scalars, returned by multi-column functions. */
export type Tuple = readonly Scalar[];

/** Anything an evaluation function may return. */
export type Value = Scalar | Tuple;

/** Positional row values. Stages never mutate a row; they build new ones. */
export type Row = readonly Scalar[];

/**
 * Opaque row identifier. Readers use zero-based positions, tables built by
 * an aggregation use the group keys.
 */
export type RowId = Value;

/** A row together with its identifier, as produced by a row source. */
export type RowEntry = readonly [RowId, Row];

/** Ordered column names of a stage's output. */
export type Schema = readonly string[];

/** A column name or a zero-based position in a schema. */
export type ColumnRef = string | number;

export function isTuple(value: Value): value is Tuple {
  return Array.isArray(value);
}

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}
