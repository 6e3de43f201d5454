import { type Value, isTuple } from '../types/row';
import type { DataTable } from './table';

/**
 * Options for table formatting
 */
export interface PrintOptions {
  /** Maximum number of rows to display (default: 10) */
  maxRows?: number;
  /** Maximum column width before values are truncated (default: 20) */
  maxWidth?: number;
}

/**
 * Format a single value for display
 */
export function formatValue(value: Value): string {
  if (value === null) {
    return 'null';
  }
  if (isTuple(value)) {
    return `(${value.map(formatValue).join(', ')})`;
  }
  return String(value);
}

/**
 * Format a table as a readable ASCII grid with its row ids as first column.
 */
export function formatTable(table: DataTable, options?: PrintOptions): string {
  const maxRows = options?.maxRows ?? 10;
  const maxWidth = options?.maxWidth ?? 20;
  const [rowCount, columnCount] = table.shape;

  if (columnCount === 0) {
    return `DataTable (${rowCount} rows x 0 columns)`;
  }

  const lines: string[] = [];
  lines.push(`DataTable (${rowCount} rows x ${columnCount} columns)`);
  lines.push('');

  const displayRows = Math.min(maxRows, rowCount);
  const header = ['', ...table.columns];
  const cells: string[][] = [];
  for (let i = 0; i < displayRows; i++) {
    const row = table.rows[i] ?? [];
    cells.push([formatValue(table.index[i] ?? null), ...row.map(formatValue)]);
  }

  const widths = header.map((name, col) => {
    let width = name.length;
    for (const line of cells) {
      width = Math.max(width, (line[col] ?? '').length);
    }
    return Math.min(width, maxWidth);
  });

  const fit = (text: string, width: number): string =>
    (text.length > width ? `${text.substring(0, width - 1)}…` : text).padEnd(width);

  lines.push(header.map((name, i) => fit(name, widths[i] ?? 0)).join(' │ '));
  lines.push(widths.map((w) => '─'.repeat(w)).join('─┼─'));
  for (const line of cells) {
    lines.push(line.map((text, i) => fit(text, widths[i] ?? 0)).join(' │ '));
  }

  if (rowCount > displayRows) {
    lines.push('');
    lines.push(`... (${rowCount - displayRows} more rows)`);
  }

  return lines.join('\n');
}
