export type { Scalar, Tuple, Value, Row, RowId, RowEntry, Schema, ColumnRef } from './row';
export { isTuple, isScalar } from './row';
export { asColumnList, columnIndex, columnIndexes, columnNames, assertUniqueColumns } from './schema';
