import { InvalidOperationError } from '../errors';
import type { RowId, Value } from '../types/row';
import { keyOf } from '../utils/key';
import type { DataTable } from './table';

interface Group {
  key: Value;
  rowIds: RowId[];
  table?: DataTable;
}

/**
 * Partition of a table's rows by group key.
 *
 * Row ids are appended with `add()` while the grouping is built. The first
 * read freezes it; from then on `add()` fails. Sub-tables are built on
 * first access and cached.
 */
export class DataGrouping {
  readonly table: DataTable;
  private readonly groups = new Map<string, Group>();
  private frozen = false;

  constructor(table: DataTable) {
    this.table = table;
  }

  add(key: Value, rowId: RowId): void {
    if (this.frozen) {
      throw new InvalidOperationError('add', 'is not allowed after the grouping was read');
    }
    const k = keyOf(key);
    const group = this.groups.get(k);
    if (group) {
      group.rowIds.push(rowId);
    } else {
      this.groups.set(k, { key, rowIds: [rowId] });
    }
  }

  get size(): number {
    this.frozen = true;
    return this.groups.size;
  }

  has(key: Value): boolean {
    this.frozen = true;
    return this.groups.has(keyOf(key));
  }

  /** Group keys in first-seen order. */
  keys(): Value[] {
    this.frozen = true;
    return Array.from(this.groups.values(), (g) => g.key);
  }

  rowIds(key: Value): readonly RowId[] {
    this.frozen = true;
    return this.groups.get(keyOf(key))?.rowIds ?? [];
  }

  /**
   * Rows of one group as a table, or `undefined` for an unknown key.
   */
  get(key: Value): DataTable | undefined {
    this.frozen = true;
    const group = this.groups.get(keyOf(key));
    return group ? this.groupTable(group) : undefined;
  }

  *items(): IterableIterator<[Value, DataTable]> {
    this.frozen = true;
    for (const group of this.groups.values()) {
      yield [group.key, this.groupTable(group)];
    }
  }

  [Symbol.iterator](): IterableIterator<[Value, DataTable]> {
    return this.items();
  }

  private groupTable(group: Group): DataTable {
    if (!group.table) {
      group.table = this.table.select(group.rowIds);
    }
    return group.table;
  }
}
