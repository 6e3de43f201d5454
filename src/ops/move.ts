import { ConfigurationError } from '../errors';
import type { RowStream } from '../io/source';
import type { ColumnRef } from '../types/row';
import { asColumnList, columnIndexes } from '../types/schema';
import { type PreparedStage, ProducingOperator } from './operator';
import { SelectConsumer } from './select';

/**
 * Moves columns, in the given order, so that the first of them ends up at
 * position `to` of the output schema. Positions past the end append.
 */
export class Move extends ProducingOperator {
  readonly name = 'move';
  readonly columns: readonly ColumnRef[];
  readonly to: number;

  constructor(columns: ColumnRef | readonly ColumnRef[], to: number) {
    super();
    if (!Number.isInteger(to) || to < 0) {
      throw new ConfigurationError(`move position must be a non-negative integer, got ${to}`);
    }
    this.columns = asColumnList(columns);
    this.to = to;
  }

  protected prepareStage(ds: RowStream): PreparedStage {
    const moved = columnIndexes(ds.columns, this.columns);
    if (new Set(moved).size !== moved.length) {
      throw new ConfigurationError('a column is listed twice in move');
    }
    const rest = ds.columns.map((_, i) => i).filter((i) => !moved.includes(i));
    const at = Math.min(this.to, rest.length);
    const positions = [...rest.slice(0, at), ...moved, ...rest.slice(at)];
    const columns = positions.map((i) => ds.columns[i] ?? String(i));
    return {
      columns,
      consumer: (downstream) => new SelectConsumer(columns, downstream, positions),
    };
  }
}
