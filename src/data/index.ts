export { DataTable } from './table';
export { DataGrouping } from './grouping';
export { formatTable, formatValue } from './print';
export type { PrintOptions } from './print';
