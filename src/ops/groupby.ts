import { DataGrouping } from '../data/grouping';
import type { DataTable } from '../data/table';
import type { EvalFunction } from '../function/base';
import { col } from '../function/column';
import { TableSource } from '../io/source';
import type { ColumnRef } from '../types/row';

/** Group key definition: key columns or a key function. */
export type GroupKey = ColumnRef | readonly ColumnRef[] | EvalFunction;

function isColumnSelection(by: GroupKey): by is ColumnRef | readonly ColumnRef[] {
  return typeof by === 'string' || typeof by === 'number' || Array.isArray(by);
}

/**
 * Group the rows of a table. One key column gives scalar keys, several
 * give tuple keys; a key function is prepared against the table.
 *
 * @example
 * ```ts
 * const groups = groupBy(table, 'state');
 * groups.get('NY')?.shape;
 * ```
 */
export function groupBy(table: DataTable, by: GroupKey): DataGrouping {
  const source = new TableSource(table);
  const key = (isColumnSelection(by) ? col(by) : by).prepare(source);
  const groups = new DataGrouping(table);
  for (const [rowId, row] of source.rows()) {
    groups.add(key.eval(row), rowId);
  }
  return groups;
}
